/**
 * Job status tracking, one store per job category.
 *
 * A worker receives a JobContext when its job starts and reports through it.
 * Starting another job in the same category aborts the previous context's
 * signal and bumps the generation; anything the superseded worker reports
 * afterwards is dropped. Every mutation is synchronous, so a reader on the
 * event loop never sees a half-applied update.
 */

import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../crawler/komoot/utils/logger.js';
import type { JobCategory, JobState, JobStatusSnapshot } from '../types/jobs.js';
import { logTime } from '../utils/timestamp.js';

function emptyRecord<R>(): JobStatusSnapshot<R> {
  return {
    job_id: null,
    status: 'idle',
    progress: 0,
    found: 0,
    completed: 0,
    error: null,
    log: [],
    results: [],
    next_chunk: null,
  };
}

export class JobStatusStore<R> {
  readonly category: JobCategory;
  private record: JobStatusSnapshot<R>;
  private generation: number;
  private controller: AbortController | null;
  private logger: Logger;

  constructor(category: JobCategory) {
    this.category = category;
    this.record = emptyRecord<R>();
    this.generation = 0;
    this.controller = null;
    this.logger = new Logger(category === 'tours' ? 'TourJobs' : 'CollectionJobs');
  }

  get currentGeneration(): number {
    return this.generation;
  }

  isRunning(): boolean {
    return this.record.status === 'running';
  }

  /**
   * Resets the record and hands out the context for a new job.
   * A job still running in this category is superseded.
   */
  start(): JobContext<R> {
    if (this.controller) {
      if (this.isRunning()) {
        this.logger.warn(`Superseding running ${this.category} job (generation ${this.generation})`);
      }
      this.controller.abort();
    }

    this.generation++;
    this.controller = new AbortController();
    const jobId = uuidv4();
    this.record = { ...emptyRecord<R>(), job_id: jobId, status: 'running' };
    return new JobContext<R>(this, jobId, this.generation, this.controller.signal, this.logger.child(jobId.slice(0, 8)));
  }

  /**
   * Applies `mutate` if `generation` is still current; returns whether it did
   */
  apply(generation: number, mutate: (record: JobStatusSnapshot<R>) => void): boolean {
    if (generation !== this.generation) {
      return false;
    }
    mutate(this.record);
    return true;
  }

  snapshot(): JobStatusSnapshot<R> {
    return structuredClone(this.record);
  }

  /**
   * Back to idle. Refused while a job is running.
   */
  clear(): boolean {
    if (this.isRunning()) return false;
    this.record = emptyRecord<R>();
    return true;
  }
}

export class JobContext<R> {
  readonly jobId: string;
  readonly generation: number;
  readonly signal: AbortSignal;
  private store: JobStatusStore<R>;
  private logger: Logger;

  constructor(store: JobStatusStore<R>, jobId: string, generation: number, signal: AbortSignal, logger: Logger) {
    this.store = store;
    this.jobId = jobId;
    this.generation = generation;
    this.signal = signal;
    this.logger = logger;
  }

  /** False once a newer job took over the category */
  get active(): boolean {
    return this.store.currentGeneration === this.generation && !this.signal.aborted;
  }

  log(message: string): void {
    if (this.store.apply(this.generation, record => record.log.push(`[${logTime()}] ${message}`))) {
      this.logger.info(message);
    }
  }

  setFound(found: number): void {
    this.store.apply(this.generation, record => {
      record.found = found;
      record.progress = found > 0 ? Math.min(1, record.completed / found) : 0;
    });
  }

  /**
   * Counts one finished item, appending its result if any
   */
  itemDone(result?: R): void {
    this.store.apply(this.generation, record => {
      record.completed++;
      if (result !== undefined) record.results.push(result);
      record.progress = record.found > 0 ? Math.min(1, record.completed / record.found) : 0;
    });
  }

  setResults(results: R[]): void {
    this.store.apply(this.generation, record => {
      record.results = results;
    });
  }

  complete(): void {
    this.finish('completed', null);
  }

  /**
   * More of the sequence remains; the caller resumes at `nextChunk`
   */
  chunkCompleted(nextChunk: number): void {
    this.store.apply(this.generation, record => {
      record.next_chunk = nextChunk;
    });
    this.finish('chunk_completed', null);
  }

  /**
   * Job-fatal failure. Results gathered so far are kept.
   */
  fail(message: string): void {
    this.log(`Error: ${message}`);
    this.finish('error', message);
  }

  private finish(status: JobState, error: string | null): void {
    this.store.apply(this.generation, record => {
      record.status = status;
      record.error = error;
      if (status !== 'error') record.progress = 1;
    });
  }
}
