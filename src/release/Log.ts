/**
 * Logging seam for the publish run, so it can be driven outside of an
 * Actions runner
 */
export interface Log {
  debug(...parts: unknown[]): void;
  info(...parts: unknown[]): void;
  warn(...parts: unknown[]): void;
  error(...parts: unknown[]): void;
  /** Runs fn with its output collapsed under a heading */
  group<T>(name: string, fn: () => Promise<T>): Promise<T>;
}
