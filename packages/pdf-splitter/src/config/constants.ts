/**
 * Configuration constants for TextAcquirer
 */
export const TEXT_ACQUIRER = {
  /**
   * Minimum trimmed length of direct text before OCR is attempted
   */
  OCR_TEXT_THRESHOLD: 50,

  /**
   * Render scale applied before OCR
   */
  OCR_UPSCALE_FACTOR: 2,

  /**
   * Tesseract language used when none is configured (Portuguese payslips)
   */
  OCR_LANGUAGE: 'por',

  /**
   * PDF user-space resolution; render DPI is this times the scale factor
   */
  BASE_DPI: 72,
} as const;

/**
 * Configuration constants for IdentityMatcher
 */
export const IDENTITY_MATCHER = {
  /**
   * Minimum fuzzy score accepted as a match (inclusive)
   */
  FUZZY_SCORE_THRESHOLD: 75,

  /**
   * Number of top fuzzy candidates kept
   */
  FUZZY_CANDIDATE_LIMIT: 5,
} as const;

/**
 * Configuration constants for PageRouter
 */
export const PAGE_ROUTER = {
  /**
   * Fixed document label placed between identity and period in file names
   */
  DOCUMENT_LABEL: 'Payslip',

  /**
   * Output file extension
   */
  EXTENSION: '.pdf',

  /**
   * Upper bound on `-N` suffixes tried when a file name is taken
   */
  MAX_NAME_ATTEMPTS: 1000,
} as const;

/**
 * Configuration constants for UnmatchedPageLog
 */
export const UNMATCHED_PAGE_LOG = {
  /**
   * Log file name inside the logs directory
   */
  FILE_NAME: 'unmatched_pages.log',

  /**
   * Characters of page text kept per record
   */
  TEXT_PREVIEW_LENGTH: 500,
} as const;

/**
 * Default directories used when settings leave them empty
 */
export const DEFAULT_PATHS = {
  OUTPUT_DIR: './output',
  LOGS_DIR: './logs',
  BACKUP_DIR: './backup',
} as const;
