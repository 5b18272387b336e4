// Job status types

export type JobCategory = 'tours' | 'collections';

export type JobState = 'idle' | 'running' | 'completed' | 'error' | 'chunk_completed';

export interface JobStatusSnapshot<R> {
  /** Id of the job the record belongs to, null while idle */
  job_id: string | null;
  status: JobState;
  /** 0.0 - 1.0 */
  progress: number;
  found: number;
  completed: number;
  error: string | null;
  log: string[];
  results: R[];
  next_chunk: number | null;
}

/**
 * Row reported for every processed tour, by tour jobs and by
 * collection download jobs
 */
export interface TourResultRow {
  id: string;
  name: string;
  date: string | null;
  sport: string | null;
  type: string | null;
  distance_km: number | null;
  duration: number | null;
  elevation_up: number | null;
  elevation_down: number | null;
  url: string;
  filename: string | null;
  skipped: boolean;
  images: string[];
  source: string;
  collection_id?: string;
  collection_name?: string;
}

export interface GpxOptions {
  includePoi: boolean;
  skipExisting: boolean;
  idFilename: boolean;
  addDate: boolean;
  /** -1 unlimited, 0 id only */
  maxTitleLength: number;
  /** -1 unlimited */
  maxDescLength: number;
}

export const DEFAULT_GPX_OPTIONS: GpxOptions = {
  includePoi: true,
  skipExisting: true,
  idFilename: false,
  addDate: false,
  maxTitleLength: -1,
  maxDescLength: -1,
};
