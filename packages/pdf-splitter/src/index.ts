export { BatchProcessor } from './core/batch-processor';
export type {
  BatchProcessorOptions,
  BatchRequest,
  PageProcessedCallback,
  ProgressCallback,
} from './core/batch-processor';
export { PayslipSplitter } from './core/payslip-splitter';
export type { SplitOutcome, SplitRequest } from './core/payslip-splitter';
export {
  DEFAULT_PATHS,
  IDENTITY_MATCHER,
  PAGE_ROUTER,
  TEXT_ACQUIRER,
  UNMATCHED_PAGE_LOG,
} from './config/constants';
export {
  processingOptionsSchema,
  resolveProcessingOptions,
} from './config/processing-options';
export type { ProcessingOptionsInput } from './config/processing-options';
export {
  loadSettings,
  resolvePaths,
  settingsSchema,
  toProcessingOptions,
} from './config/settings';
export type { ResolvedPaths, Settings } from './config/settings';
export { PdfSourceDocument } from './document/pdf-source-document';
export type {
  SourceDocument,
  SourceDocumentOpener,
} from './document/source-document';
export { BatchAbortedError } from './errors/batch-aborted-error';
export { ConfigurationError } from './errors/configuration-error';
export { PageRoutingError } from './errors/page-routing-error';
export { PeriodValidationError } from './errors/period-validation-error';
export { SourceDocumentError } from './errors/source-document-error';
export type { SourceDocumentErrorCode } from './errors/source-document-error';
export {
  formatUnmatchedRecord,
  UnmatchedPageLog,
} from './logs/unmatched-page-log';
export type {
  UnmatchedPageLogOptions,
  UnmatchedPageSink,
} from './logs/unmatched-page-log';
export { IdentityMatcher } from './matchers/identity-matcher';
export type {
  MatchingOptions,
  ScoredCandidate,
} from './matchers/identity-matcher';
export { plainRatioScorer, tokenSetScorer } from './matchers/similarity';
export type { SimilarityScorer } from './matchers/similarity';
export { DocumentSecurer } from './processors/document-securer';
export { mergePdfFiles } from './processors/pdf-merger';
export type { PdfMergeResult } from './processors/pdf-merger';
export { TesseractOcrEngine } from './processors/tesseract-ocr-engine';
export type { OcrEngine } from './processors/tesseract-ocr-engine';
export {
  DirectTextStage,
  OcrTextStage,
  TextAcquirer,
} from './processors/text-acquirer';
export type {
  AcquiredText,
  PageTextStage,
  TextAcquirerStages,
  TextAcquisitionOptions,
} from './processors/text-acquirer';
export { loadRosterFile, normalizeRoster } from './roster/roster';
export {
  PageRouter,
  resolvePageSelection,
  toPathSegment,
} from './routers/page-router';
export type {
  PageRange,
  PageRouterOptions,
  PageSelection,
} from './routers/page-router';
export { formatPeriodLabel, parsePeriod } from './utils/period';
export { backupSource } from './utils/source-backup';
export { TextNormalizer } from './utils/text-normalizer';
export {
  formatCompactTimestamp,
  formatLogTimestamp,
} from './utils/timestamp';
