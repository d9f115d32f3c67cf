/**
 * Ordered list of known person names used as matching candidates.
 *
 * Entries are trimmed, upper-cased, non-empty and distinct. Order matters:
 * the exact pass and fuzzy tie-breaking both resolve by roster position.
 */
export type Roster = readonly string[];
