/**
 * Formula source parsing.
 * Supports:
 * - SSH clone URLs (git@github.com:org/name.git)
 * - HTTPS clone URLs (https://github.com/org/name.git)
 * Either form may carry a trailing constraint, e.g. `git@github.com:org/name.git>=v1.2.0`.
 */

import type { PackageKey } from '../types/index.js';
import { ConfigError, ConstraintFormatError } from './errors.js';
import { parseConstraint } from '../core/versioning/constraint.js';
import { REMOTE_DEFAULTS } from '../constants/index.js';

/**
 * A dependency line split into identity, canonical source and constraint.
 */
export interface FormulaSpec {
  key: PackageKey;
  /** Canonical SSH clone URL, constraint removed */
  source: string;
  host: string;
  constraint: string;
}

const SSH_PATTERN = /^git@([^:]+):([^/\s]+)\/([^/\s]+?)\.git(.*)$/;
const HTTPS_PATTERN = /^https?:\/\/([^/]+)\/([^/\s]+)\/([^/\s]+?)\.git(.*)$/;

export function formatPackageKey(key: PackageKey): string {
  return `${key.organisation}/${key.name}`;
}

/**
 * Parse an `org/name` identity, as used by the manifest's `formula:` key.
 */
export function parsePackageKey(input: string): PackageKey {
  const parts = input.trim().split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ConfigError(
      `Bad formula name "${input}", expected "<organisation>/<formula-name>"`,
      { input }
    );
  }
  return { organisation: parts[0], name: parts[1] };
}

export function buildSourceUrl(key: PackageKey, host: string = REMOTE_DEFAULTS.GIT_HOST): string {
  return `git@${host}:${key.organisation}/${key.name}.git`;
}

/**
 * Parse a formula dependency entry.
 * Returns null if the input is not a recognized clone URL.
 */
export function parseFormulaUrl(input: string): FormulaSpec | null {
  const trimmed = input.trim();
  const match = SSH_PATTERN.exec(trimmed) ?? HTTPS_PATTERN.exec(trimmed);
  if (!match) {
    return null;
  }

  const [, host, organisation, name, rest] = match;
  const key = { organisation, name };
  return {
    key,
    source: buildSourceUrl(key, host),
    host,
    constraint: rest.trim()
  };
}

/**
 * Like parseFormulaUrl, but a malformed entry is a configuration error and
 * a trailing constraint must start with a comparator and name a tag.
 */
export function requireFormulaUrl(input: string, origin: string): FormulaSpec {
  const spec = parseFormulaUrl(input);
  if (!spec) {
    throw new ConfigError(
      `Unrecognized dependency "${input}" in ${origin}, expected "git@<host>:<organisation>/<name>.git[<constraint>]"`,
      { input, origin }
    );
  }
  if (spec.constraint && !parseConstraint(spec.constraint).comparator) {
    throw new ConstraintFormatError(
      `Unrecognized constraint "${spec.constraint}" for ${formatPackageKey(spec.key)} in ${origin}`,
      { package: formatPackageKey(spec.key), constraint: spec.constraint, origin, entry: input }
    );
  }
  return spec;
}
