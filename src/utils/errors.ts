// Error taxonomy shared by fetch client, resolver and jobs

export class NetworkError extends Error {
  readonly url: string;
  readonly status: number | null;
  readonly attempts: number;

  constructor(message: string, options: { url: string; status?: number | null; attempts: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'NetworkError';
    this.url = options.url;
    this.status = options.status ?? null;
    this.attempts = options.attempts;
  }
}

export interface StrategyFailure {
  strategy: string;
  message: string;
}

export class ResolutionError extends Error {
  readonly tourId: string;
  readonly failures: StrategyFailure[];

  constructor(tourId: string, failures: StrategyFailure[]) {
    const detail = failures.map(f => `${f.strategy}: ${f.message}`).join('; ');
    super(`Could not resolve tour ${tourId}${detail ? ` (${detail})` : ''}`);
    this.name = 'ResolutionError';
    this.tourId = tourId;
    this.failures = failures;
  }
}

/**
 * Aborts a whole job. `statusCode` is the answer the HTTP layer gives
 * when the failure is detected before the job starts.
 */
export class JobFatalError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number = 500, cause?: unknown) {
    super(message, { cause });
    this.name = 'JobFatalError';
    this.statusCode = statusCode;
  }
}

/**
 * A file under the output directory could not be written. Fatal to the job
 * that hits it, unlike a tour that fails to resolve.
 */
export class PersistenceError extends JobFatalError {
  readonly path: string;

  constructor(filePath: string, cause: unknown) {
    super(`Could not write ${filePath}: ${errorMessage(cause)}`, 500, cause);
    this.name = 'PersistenceError';
    this.path = filePath;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
