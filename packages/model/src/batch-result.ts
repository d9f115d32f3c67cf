/**
 * Lifecycle of a batch run.
 */
export type BatchStatus =
  | 'idle'
  | 'running'
  | 'completed'
  | 'cancelled'
  | 'failed';

/**
 * A file written for one identity.
 *
 * Ownership passes to the filesystem once written; the splitter never
 * modifies or removes it.
 */
export interface OutputArtifact {
  /** Roster entry the pages were routed to */
  identity: string;

  /** Absolute or output-root-relative path of the written file */
  path: string;

  /** File name component of `path` */
  fileName: string;

  /** 0-based source page indices copied into the file, in output order */
  pageIndices: readonly number[];
}

/**
 * Aggregate statistics of a batch run.
 *
 * Returned for completed and cancelled runs; a `failed` result travels inside
 * the error that aborted the run. `processedPages` tells how far it got.
 */
export interface BatchResult {
  status: Exclude<BatchStatus, 'idle' | 'running'>;

  /** Page count of the source document */
  totalPages: number;

  /** Pages visited before completion or cancellation */
  processedPages: number;

  identifiedPages: number;

  unidentifiedPages: number;

  /** Distinct identities found, in order of first appearance */
  identitiesFound: readonly string[];

  /** Files written during the run, in page order */
  artifacts: readonly OutputArtifact[];

  /** Recoverable per-page errors, in page order */
  errors: readonly string[];
}
