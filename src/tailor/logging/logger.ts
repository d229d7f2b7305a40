/**
 * Generation Logger
 *
 * Audit trail of selection, candidate, fallback, judging and ATS scoring
 * events. Entries are kept in memory for export and mirrored to the
 * structured application log.
 */

import { ErrorLogger } from '../../shared/errors/logger';
import { AppError } from '../../shared/errors/types';
import { createComponentLogger } from '../../shared/logging/logger';
import type {
  Candidate,
  CandidateFailure,
  CandidateScore,
  ContentSet,
  FallbackReason,
  GenerationMode,
  ScoreReport
} from '../types';

const log = createComponentLogger('audit');

export enum LogType {
  SELECTION = 'SELECTION',
  CANDIDATE = 'CANDIDATE',
  FALLBACK = 'FALLBACK',
  JUDGING = 'JUDGING',
  SCORING = 'SCORING',
  ERROR = 'ERROR',
  INFO = 'INFO'
}

export interface LogEntry {
  type: LogType;
  timestamp: Date;
  message: string;
  runId?: string;
  context?: Record<string, unknown>;
}

export class GenerationLogger {
  private static logs: LogEntry[] = [];
  private static maxLogs = 5000;
  private static enabled = true;

  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  static logSelection(runId: string, contentSet: ContentSet): void {
    if (!this.enabled) return;

    const bullets = contentSet.experience.flatMap(entry => entry.bullets);
    this.addLog({
      type: LogType.SELECTION,
      timestamp: new Date(),
      runId,
      message: `Selected content for variant ${contentSet.variantId}`,
      context: {
        variant: contentSet.variantId,
        entries: contentSet.experience.length,
        bullets: bullets.length,
        byReason: {
          emphasized: bullets.filter(b => b.reason === 'emphasized').length,
          keyword: bullets.filter(b => b.reason === 'keyword').length,
          fill: bullets.filter(b => b.reason === 'fill').length
        },
        skillCategories: contentSet.skills.map(group => group.category),
        keywords: contentSet.keywords
      }
    });
  }

  static logCandidate(runId: string, candidate: Candidate, durationMs?: number): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.CANDIDATE,
      timestamp: new Date(),
      runId,
      message: `Candidate ${candidate.index} generated (${candidate.mode})`,
      context: {
        index: candidate.index,
        mode: candidate.mode,
        template: candidate.template,
        format: candidate.format,
        length: candidate.text.length,
        durationMs
      }
    });
  }

  static logCandidateFailure(runId: string, failure: CandidateFailure): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.CANDIDATE,
      timestamp: new Date(),
      runId,
      message: `Candidate ${failure.index} failed: ${failure.code}`,
      context: { ...failure }
    });
  }

  static logFallback(runId: string, reason: FallbackReason): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.FALLBACK,
      timestamp: new Date(),
      runId,
      message: `Falling back to deterministic render: ${reason.kind}`,
      context: {
        kind: reason.kind,
        codes: reason.failures.map(f => f.code)
      }
    });
  }

  static logJudging(runId: string, scores: CandidateScore[], winner: number): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.JUDGING,
      timestamp: new Date(),
      runId,
      message: `Judge selected candidate ${winner} of ${scores.length}`,
      context: {
        winner,
        scores: scores.map(s => ({ index: s.index, total: s.total }))
      }
    });
  }

  static logScoring(report: ScoreReport): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.SCORING,
      timestamp: new Date(),
      message: `ATS score ${report.total}/${report.maxTotal} (${report.band})`,
      context: {
        total: report.total,
        band: report.band,
        extractor: report.extractor,
        breakdown: Object.fromEntries(report.categories.map(c => [c.category, c.score])),
        missingKeywords: report.missingKeywords.slice(0, 10),
        topSuggestion: report.suggestions[0]?.message
      }
    });
  }

  static logRunComplete(
    runId: string,
    mode: GenerationMode | 'fallback',
    degraded: boolean,
    durationMs: number
  ): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.INFO,
      timestamp: new Date(),
      runId,
      message: `Generation run complete (${mode}${degraded ? ', degraded' : ''})`,
      context: { mode, degraded, durationMs }
    });
  }

  static logError(error: AppError | Error, runId?: string, context?: Record<string, unknown>): void {
    ErrorLogger.logError(error);

    if (!this.enabled) return;

    this.addLog({
      type: LogType.ERROR,
      timestamp: new Date(),
      runId,
      message: error.message,
      context: {
        ...context,
        error:
          error instanceof AppError
            ? { category: error.category, severity: error.severity, recoverable: error.recoverable }
            : { name: error.name }
      }
    });
  }

  static getLogs(): LogEntry[] {
    return [...this.logs];
  }

  static getLogsByType(type: LogType): LogEntry[] {
    return this.logs.filter(entry => entry.type === type);
  }

  static getLogsForRun(runId: string): LogEntry[] {
    return this.logs.filter(entry => entry.runId === runId);
  }

  static getRecentLogs(count: number): LogEntry[] {
    return this.logs.slice(-count);
  }

  static clearLogs(): void {
    this.logs = [];
  }

  static exportLogs(): string {
    return JSON.stringify(this.logs, null, 2);
  }

  private static addLog(entry: LogEntry): void {
    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    log.debug({ type: entry.type, runId: entry.runId, ...entry.context }, entry.message);
  }
}
