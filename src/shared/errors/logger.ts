/**
 * Error Logger
 *
 * Keeps a bounded history of errors for diagnostics and mirrors each entry
 * to the structured application log.
 */

import { createComponentLogger } from '../logging/logger';
import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity } from './types';

const log = createComponentLogger('errors');

/**
 * Error logger class for managing error logs
 */
export class ErrorLogger {
  private static logs: ErrorInfo[] = [];
  private static maxLogs = 1000;

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error): void {
    const errorInfo: ErrorInfo = error instanceof AppError
      ? error.toInfo()
      : {
          category: ErrorCategory.UNEXPECTED,
          severity: ErrorSeverity.CRITICAL,
          userMessage: 'An unexpected error occurred',
          technicalDetails: error.message,
          timestamp: new Date(),
          recoverable: false
        };

    this.logs.push(errorInfo);

    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const payload = {
      category: errorInfo.category,
      severity: errorInfo.severity,
      details: errorInfo.technicalDetails,
      context: errorInfo.context
    };

    if (errorInfo.recoverable) {
      log.warn(payload, errorInfo.userMessage);
    } else {
      log.error(payload, errorInfo.userMessage);
    }
  }

  /**
   * Get all logged errors
   */
  static getLogs(): ErrorInfo[] {
    return [...this.logs];
  }

  /**
   * Clear error logs
   */
  static clearLogs(): void {
    this.logs = [];
  }

  /**
   * Get logs by category
   */
  static getLogsByCategory(category: ErrorCategory): ErrorInfo[] {
    return this.logs.filter(log => log.category === category);
  }

  /**
   * Get logs by severity
   */
  static getLogsBySeverity(severity: ErrorSeverity): ErrorInfo[] {
    return this.logs.filter(log => log.severity === severity);
  }
}
