import type { DependencyRecord, Logger } from '../../types/index.js';
import { formatPackageKey, requireFormulaUrl } from '../../utils/formula-url.js';

export interface RequirementsParseOptions {
  /** Where the entries came from, for diagnostics */
  origin: string;
  logger: Logger;
  /**
   * Mark each entry's own constraint as already sourced. Used for pinned
   * lists fetched from a dependency: they are already a closure.
   */
  markSourced?: boolean;
}

/**
 * Strip comments and blank lines from a requirements file.
 */
export function readRequirementLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Turn dependency entries into fresh records keyed by `organisation/name`.
 * The first entry for a key wins; later duplicates are reported and dropped.
 */
export function parseRequirementEntries(
  entries: string[],
  options: RequirementsParseOptions
): Map<string, DependencyRecord> {
  const records = new Map<string, DependencyRecord>();

  for (const entry of entries) {
    const spec = requireFormulaUrl(entry, options.origin);
    const key = formatPackageKey(spec.key);

    if (records.has(key)) {
      options.logger.warn(`Skipping duplicate dependency ${key} in ${options.origin}`, { entry });
      continue;
    }

    records.set(key, {
      key: spec.key,
      source: spec.source,
      constraint: spec.constraint,
      sourcedConstraints: options.markSourced ? [spec.constraint] : [],
      resolvedSha: null,
      resolvedTag: null
    });
  }

  return records;
}

export function parseRequirementsText(
  content: string,
  options: RequirementsParseOptions
): Map<string, DependencyRecord> {
  return parseRequirementEntries(readRequirementLines(content), options);
}

export function formatRequirementLine(source: string, tag: string): string {
  return `${source}==${tag}`;
}
