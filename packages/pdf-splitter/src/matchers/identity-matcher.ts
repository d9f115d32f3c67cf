import type { LoggerMethods } from '@paysplit/logger';
import type { MatchResult, ProcessingOptions, Roster } from '@paysplit/model';

import type { SimilarityScorer } from './similarity';

import { TextNormalizer } from '../utils/text-normalizer';
import { tokenSetScorer } from './similarity';

/** Options IdentityMatcher reads */
export type MatchingOptions = Pick<
  ProcessingOptions,
  'useFuzzyMatching' | 'fuzzyScoreThreshold' | 'fuzzyCandidateLimit'
>;

/** A roster entry with its fuzzy score */
export interface ScoredCandidate {
  name: string;
  score: number;
  /** Index in the roster, used to break ties */
  rosterIndex: number;
}

const unknown = (): MatchResult => ({ identity: null, method: 'none' });

/**
 * IdentityMatcher
 *
 * Decides which roster entry, if any, a page belongs to. Strategies run in a
 * fixed order and the first hit wins:
 *
 * 1. Exact: first roster name (in roster order) contained in the page text,
 *    case-insensitive, after NFC and whitespace normalization of both sides
 * 2. Fuzzy (opt-in): score every name, keep the top `fuzzyCandidateLimit`
 *    (ties in roster order) and accept the best if it reaches
 *    `fuzzyScoreThreshold`
 *
 * Empty or whitespace-only text is UNKNOWN without running either pass.
 * The identity returned is the roster entry's match key (NFC, collapsed
 * whitespace, upper case), whatever form the entry was given in.
 */
export class IdentityMatcher {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly scorer: SimilarityScorer = tokenSetScorer,
  ) {}

  identify(text: string, roster: Roster, options: MatchingOptions): MatchResult {
    const normalizedText = TextNormalizer.normalize(text);
    if (!normalizedText) {
      return unknown();
    }

    const exact = this.findExact(normalizedText.toUpperCase(), roster);
    if (exact !== null) {
      this.logger.debug(`[IdentityMatcher] Exact match: ${exact}`);
      return { identity: exact, method: 'exact' };
    }

    if (options.useFuzzyMatching) {
      const candidates = this.rankCandidates(
        normalizedText,
        roster,
        options.fuzzyCandidateLimit,
      );
      const best = candidates[0];

      if (best && best.score >= options.fuzzyScoreThreshold) {
        this.logger.debug(
          `[IdentityMatcher] Fuzzy match: ${best.name} (score: ${best.score})`,
        );
        return {
          identity: TextNormalizer.toMatchKey(best.name),
          method: 'fuzzy',
          score: best.score,
        };
      }

      if (best) {
        this.logger.debug(
          `[IdentityMatcher] Best fuzzy candidate ${best.name} scored ${best.score}, below ${options.fuzzyScoreThreshold}`,
        );
      }
    }

    this.logger.warn('[IdentityMatcher] No roster entry matched the page text');
    return unknown();
  }

  /**
   * Score every roster name and return the top `limit`, highest first.
   * Equal scores keep roster order.
   */
  rankCandidates(text: string, roster: Roster, limit: number): ScoredCandidate[] {
    return roster
      .map((name, rosterIndex) => {
        const score = this.scorer(text, name);
        return {
          name,
          score: Number.isFinite(score) ? score : 0,
          rosterIndex,
        };
      })
      .sort((a, b) => b.score - a.score || a.rosterIndex - b.rosterIndex)
      .slice(0, Math.max(0, limit));
  }

  private findExact(textKey: string, roster: Roster): string | null {
    for (const name of roster) {
      const nameKey = TextNormalizer.toMatchKey(name);
      if (nameKey && textKey.includes(nameKey)) {
        return nameKey;
      }
    }
    return null;
  }
}
