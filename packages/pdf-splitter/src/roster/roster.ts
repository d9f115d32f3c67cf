import type { LoggerMethods } from '@paysplit/logger';
import type { Roster } from '@paysplit/model';

import { uniq } from 'es-toolkit';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import { TextNormalizer } from '../utils/text-normalizer';

/**
 * Canonical roster from raw names: normalized, upper-cased, blanks dropped,
 * duplicates dropped keeping the first occurrence.
 */
export function normalizeRoster(names: Iterable<string>): Roster {
  const cleaned: string[] = [];
  for (const name of names) {
    const key = TextNormalizer.toMatchKey(name);
    if (key) {
      cleaned.push(key);
    }
  }
  return Object.freeze(uniq(cleaned));
}

/**
 * Read a roster file with one name per line (UTF-8).
 *
 * A missing file yields an empty roster.
 */
export async function loadRosterFile(
  rosterPath: string,
  logger: LoggerMethods,
): Promise<Roster> {
  if (!existsSync(rosterPath)) {
    logger.warn(`[Roster] Roster file not found: ${rosterPath}`);
    return Object.freeze([]);
  }

  const content = await readFile(rosterPath, 'utf8');
  const roster = normalizeRoster(content.split(/\r?\n/));
  logger.info(`[Roster] Loaded ${roster.length} names from ${rosterPath}`);
  return roster;
}
