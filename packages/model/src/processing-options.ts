/**
 * Tuning knobs for one batch run.
 */
export interface ProcessingOptions {
  /**
   * Run the fuzzy pass when the exact pass finds nothing
   */
  useFuzzyMatching: boolean;

  /**
   * Minimum trimmed length of the direct text layer; shorter pages go to OCR
   */
  ocrTextThreshold: number;

  /**
   * Minimum fuzzy score (0-100, inclusive) accepted as a match
   */
  fuzzyScoreThreshold: number;

  /**
   * Number of top-scoring fuzzy candidates considered
   */
  fuzzyCandidateLimit: number;

  /**
   * Render scale for OCR; 2 renders at twice the page's native resolution
   */
  ocrUpscaleFactor: number;

  /**
   * OCR language code (Tesseract traineddata name, e.g. "por", "eng", "por+eng")
   */
  ocrLanguage: string;
}
