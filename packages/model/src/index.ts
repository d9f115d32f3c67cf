export type { Roster } from './roster';
export type { Period } from './period';
export type {
  AcquisitionMethod,
  MatchMethod,
  MatchResult,
  PageRecord,
} from './page-record';
export type {
  BatchResult,
  BatchStatus,
  OutputArtifact,
} from './batch-result';
export type { ProcessingOptions } from './processing-options';
