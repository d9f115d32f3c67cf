import type { LoggerMethods } from '@paysplit/logger';
import type { ProcessingOptions } from '@paysplit/model';

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { ConfigurationError } from '../errors/configuration-error';
import { DEFAULT_PATHS, IDENTITY_MATCHER, TEXT_ACQUIRER } from './constants';
import { resolveProcessingOptions } from './processing-options';

/**
 * Zod schema for the settings file.
 *
 * Sections other than `processing` and `paths` (appearance, e-mail, ...) belong
 * to other parts of the application and are dropped.
 */
export const settingsSchema = z.object({
  processing: z
    .object({
      ocrThreshold: z
        .number()
        .int()
        .min(0)
        .default(TEXT_ACQUIRER.OCR_TEXT_THRESHOLD),
      fuzzyMatchThreshold: z
        .number()
        .min(0)
        .max(100)
        .default(IDENTITY_MATCHER.FUZZY_SCORE_THRESHOLD),
      useFuzzyMatching: z.boolean().default(false),
      backupOriginals: z.boolean().default(true),
      ocrLanguage: z.string().min(1).default(TEXT_ACQUIRER.OCR_LANGUAGE),
    })
    .default({}),
  paths: z
    .object({
      outputDir: z.string().default(''),
      logsDir: z.string().default(''),
      backupDir: z.string().default(''),
    })
    .default({}),
});

export type Settings = z.infer<typeof settingsSchema>;

/** Directories a run reads from settings, with empty entries defaulted */
export interface ResolvedPaths {
  outputDir: string;
  logsDir: string;
  backupDir: string;
}

/**
 * Load and validate a JSON settings file.
 *
 * A missing file yields the defaults; missing keys are filled in.
 *
 * @throws ConfigurationError when the file is not JSON or a value is invalid
 */
export async function loadSettings(
  settingsPath: string,
  logger: LoggerMethods,
): Promise<Settings> {
  if (!existsSync(settingsPath)) {
    logger.info(
      `[Settings] Settings file not found, using defaults: ${settingsPath}`,
    );
    return settingsSchema.parse({});
  }

  const raw = await readFile(settingsPath, 'utf8');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Settings file is not valid JSON: ${settingsPath}`,
      { cause: error },
    );
  }

  const parsed = settingsSchema.safeParse(json);
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(
      `Invalid settings in ${settingsPath}`,
      parsed.error,
    );
  }

  logger.debug(`[Settings] Loaded settings from ${settingsPath}`);
  return parsed.data;
}

/**
 * Map the `processing` section onto ProcessingOptions.
 */
export function toProcessingOptions(settings: Settings): ProcessingOptions {
  return resolveProcessingOptions({
    useFuzzyMatching: settings.processing.useFuzzyMatching,
    ocrTextThreshold: settings.processing.ocrThreshold,
    fuzzyScoreThreshold: settings.processing.fuzzyMatchThreshold,
    ocrLanguage: settings.processing.ocrLanguage,
  });
}

/**
 * Directories from the `paths` section, empty entries replaced by defaults.
 */
export function resolvePaths(settings: Settings): ResolvedPaths {
  return {
    outputDir: settings.paths.outputDir || DEFAULT_PATHS.OUTPUT_DIR,
    logsDir: settings.paths.logsDir || DEFAULT_PATHS.LOGS_DIR,
    backupDir: settings.paths.backupDir || DEFAULT_PATHS.BACKUP_DIR,
  };
}
