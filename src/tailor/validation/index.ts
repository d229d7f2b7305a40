export * from './schemas';
export * from './validator';
export * from './errorFormatter';
