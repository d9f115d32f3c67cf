/**
 * How a page's text was obtained.
 * - direct: the PDF text layer
 * - ocr: optical character recognition on a rendered bitmap
 */
export type AcquisitionMethod = 'direct' | 'ocr';

/**
 * Which matching pass produced an identity.
 */
export type MatchMethod = 'exact' | 'fuzzy' | 'none';

/**
 * Outcome of matching one page's text against a roster
 */
export interface MatchResult {
  /** Matched roster entry, or null when the page is unidentified */
  identity: string | null;

  method: MatchMethod;

  /** Similarity score (0-100), present only for fuzzy matches */
  score?: number;
}

/**
 * Per-page classification record.
 *
 * Created for every processed page and folded into the batch statistics.
 */
export interface PageRecord extends MatchResult {
  /** 0-based page index within the source document */
  pageIndex: number;

  /** Extracted text, possibly empty */
  text: string;

  acquisitionMethod: AcquisitionMethod;
}
