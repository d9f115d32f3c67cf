import * as fuzz from 'fuzzball';

/**
 * Scores how well a page text matches one roster name, 0-100.
 *
 * Must be deterministic: equal inputs give equal scores, so fuzzy ties resolve
 * the same way on every run.
 */
export type SimilarityScorer = (text: string, name: string) => number;

/**
 * Order-insensitive token-set similarity.
 *
 * Compares the intersection of word sets against each side's remainder, so a
 * short name fully contained in a long noisy page scores 100 while unrelated
 * words on the page do not dilute it.
 */
export const tokenSetScorer: SimilarityScorer = (text, name) =>
  fuzz.token_set_ratio(text, name);

/**
 * Sequence similarity of the whole strings (no tokenization).
 *
 * Stricter than `tokenSetScorer`; useful when pages carry little besides the
 * name.
 */
export const plainRatioScorer: SimilarityScorer = (text, name) =>
  fuzz.ratio(text, name);
