/**
 * metadata.yml parsing.
 *
 * A manifest is a mapping with an optional `formula: org/name` identity, a
 * `dependencies` list of clone URLs with constraints, and an optional
 * `exports` list of directories to link into the salt root.
 */

import * as yaml from 'js-yaml';
import type { Logger, PackageKey } from '../../types/index.js';
import { ConfigError } from '../../utils/errors.js';
import { parsePackageKey } from '../../utils/formula-url.js';

export interface FormulaManifest {
  key: PackageKey | null;
  dependencies: string[];
  exports?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadMapping(content: string, origin: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${origin}: ${error instanceof Error ? error.message : String(error)}`, { origin });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Manifest ${origin} is not a mapping`, { origin });
  }
  return parsed;
}

function readStringList(data: Record<string, unknown>, field: string, origin: string): string[] {
  const value = data[field];
  if (value === null || value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`Field "${field}" in ${origin} must be a list`, { origin, field });
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw new ConfigError(`Entry ${index} of "${field}" in ${origin} must be a string`, { origin, field });
    }
    return item;
  });
}

function readKey(data: Record<string, unknown>, origin: string): PackageKey | null {
  const formula = data.formula;
  if (formula === undefined || formula === null) {
    return null;
  }
  if (typeof formula !== 'string') {
    throw new ConfigError(`Field "formula" in ${origin} must be a string`, { origin });
  }
  return parsePackageKey(formula);
}

function readExports(data: Record<string, unknown>, origin: string): string[] | undefined {
  return data.exports === undefined ? undefined : readStringList(data, 'exports', origin);
}

/**
 * Parse the root manifest. A missing dependency list is allowed (a formula
 * with nothing to fetch) but reported.
 */
export function parseRootManifest(content: string, origin: string, logger: Logger): FormulaManifest {
  const data = loadMapping(content, origin);
  const key = readKey(data, origin);
  if (!key) {
    logger.debug(`No formula name in ${origin}, treating it as a deploy repository`);
  }

  if (!('dependencies' in data)) {
    logger.warn(`No dependencies found in ${origin}`);
  }

  return {
    key,
    dependencies: readStringList(data, 'dependencies', origin),
    exports: readExports(data, origin)
  };
}

/**
 * Parse a dependency's manifest fetched from its remote. The `dependencies`
 * key is required; an empty value means a leaf formula.
 */
export function parseRemoteManifest(content: string, origin: string): FormulaManifest {
  const data = loadMapping(content, origin);
  if (!('dependencies' in data)) {
    throw new ConfigError(`Manifest ${origin} has no "dependencies" key`, { origin });
  }
  return {
    key: readKey(data, origin),
    dependencies: readStringList(data, 'dependencies', origin),
    exports: readExports(data, origin)
  };
}

/**
 * Read just the export list of a checked-out formula, tolerating a missing
 * or partial manifest.
 */
export function parseManifestExports(content: string, origin: string): string[] | undefined {
  return readExports(loadMapping(content, origin), origin);
}
