/**
 * Output Validator
 *
 * Judges whether output artifacts are worth keeping.
 *
 * Two thresholds are applied on purpose:
 * - batch skip: some artifact in the partition folder holds at least half of
 *   the partition's expected words
 * - file salvage: a freshly produced artifact holds at least one word
 *
 * @module pipeline/output-validator
 */

import { BATCH_SKIP_THRESHOLD, SALVAGE_MIN_ITEMS } from '../config/defaults.js';
import { FinalOutputSchema } from '../schemas/entry.js';
import { isOutputArtifactName } from '../storage/paths.js';
import { listFiles, readJson } from '../storage/atomic.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';

/**
 * Result of inspecting one artifact.
 */
export interface ArtifactCheck {
  valid: boolean;
  /** Entries in the artifact; 0 when it could not be parsed */
  count: number;
}

/**
 * Parse an artifact and count its entries.
 *
 * @throws Error when the file is unreadable or not an entry array
 */
export async function countArtifactEntries(filePath: string): Promise<number> {
  const raw = await readJson(filePath);
  const parsed = FinalOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Not a list of entries: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data.length;
}

/**
 * Check whether a single artifact holds at least `minItems` entries.
 * Any failure yields `{ valid: false, count: 0 }`.
 */
export async function isValidArtifact(filePath: string, minItems: number = SALVAGE_MIN_ITEMS): Promise<ArtifactCheck> {
  try {
    const count = await countArtifactEntries(filePath);
    return { valid: count >= minItems, count };
  } catch {
    return { valid: false, count: 0 };
  }
}

/**
 * Find the output artifacts in a folder.
 */
export function findArtifacts(location: string): Promise<string[]> {
  return listFiles(location, isOutputArtifactName);
}

/**
 * Whether a folder already holds usable output for a partition.
 *
 * Unparseable artifacts are logged and skipped rather than failing the check.
 *
 * @param expectedCount - Words the partition should contain
 */
export async function hasValidOutput(
  location: string,
  expectedCount: number,
  logger: Logger = silentLogger
): Promise<boolean> {
  const artifacts = await findArtifacts(location);
  const threshold = expectedCount * BATCH_SKIP_THRESHOLD;

  for (const artifact of artifacts) {
    let count: number;
    try {
      count = await countArtifactEntries(artifact);
    } catch (error) {
      logger.warn(`Error reading ${artifact}: ${errorMessage(error)}`);
      continue;
    }

    if (count >= threshold) {
      logger.debug(`Found valid output: ${artifact} with ${count} words`);
      return true;
    }
    logger.debug(`Output file ${artifact} has only ${count} words (expected ${expectedCount})`);
  }

  return false;
}
