/**
 * Tag classification for formula repositories.
 *
 * Formula tags follow `vMAJOR.MINOR.PATCH`, with an optional prerelease
 * postfix either semver style (`v1.2.3-rc.1`) or appended directly with a
 * conventional marker (`v1.2.3rc1`). Anything else is "not a release".
 */

import semver from 'semver';
import type { SemverTag } from '../../types/index.js';

const RELEASE_PATTERN = /^v(\d+)\.(\d+)\.(\d+)$/;
const PRERELEASE_PATTERN = /^v(\d+)\.(\d+)\.(\d+)-(.+)$/;
const LENIENT_PRERELEASE_PATTERN = /^v(\d+)\.(\d+)\.(\d+)((?:alpha|beta|rc|pre|dev|a|b)\.?\d*)$/;

const EMPTY_TAG: SemverTag = { major: null, minor: null, patch: null, postfix: null };

/**
 * A SemverTag whose numeric fields are known to be set.
 */
export interface ParsedSemverTag {
  major: number;
  minor: number;
  patch: number;
  postfix: string | null;
}

/**
 * Split a tag into its semver components; all fields are null when the tag
 * is not version-shaped.
 */
export function parseSemverTag(tag: string): SemverTag {
  const trimmed = tag.trim();
  for (const pattern of [RELEASE_PATTERN, PRERELEASE_PATTERN, LENIENT_PRERELEASE_PATTERN]) {
    const match = pattern.exec(trimmed);
    if (match) {
      return {
        major: Number(match[1]),
        minor: Number(match[2]),
        patch: Number(match[3]),
        postfix: match[4] ?? null
      };
    }
  }
  return { ...EMPTY_TAG };
}

export function toParsedSemverTag(tag: SemverTag): ParsedSemverTag | null {
  if (tag.major === null || tag.minor === null || tag.patch === null) {
    return null;
  }
  return { major: tag.major, minor: tag.minor, patch: tag.patch, postfix: tag.postfix };
}

export function isTagRelease(tag: string): boolean {
  const parsed = toParsedSemverTag(parseSemverTag(tag));
  return parsed !== null && !parsed.postfix;
}

export function isTagPrerelease(tag: string): boolean {
  const parsed = toParsedSemverTag(parseSemverTag(tag));
  return parsed !== null && Boolean(parsed.postfix);
}

/**
 * Parse a bare version (no leading `v`), as stored in sorted tag lists.
 */
export function parseTagVersion(version: string): ParsedSemverTag | null {
  return toParsedSemverTag(parseSemverTag(`v${version}`));
}

/**
 * Parse a requested version, accepting partial forms such as `1.1`.
 */
export function parseRequestedVersion(version: string): ParsedSemverTag | null {
  const exact = parseTagVersion(version);
  if (exact) {
    return exact;
  }
  const coerced = semver.coerce(version);
  if (!coerced) {
    return null;
  }
  return { major: coerced.major, minor: coerced.minor, patch: coerced.patch, postfix: null };
}

function comparePostfix(a: string, b: string): number {
  const left = a.split('.');
  const right = b.split('.');
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    if (left[i] === undefined) return -1;
    if (right[i] === undefined) return 1;
    const diff = semver.compareIdentifiers(left[i], right[i]);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/**
 * Order two parsed tags; a prerelease sorts before its release.
 */
export function compareSemverTags(a: ParsedSemverTag, b: ParsedSemverTag): number {
  if (a.major !== b.major) return a.major < b.major ? -1 : 1;
  if (a.minor !== b.minor) return a.minor < b.minor ? -1 : 1;
  if (a.patch !== b.patch) return a.patch < b.patch ? -1 : 1;
  if (a.postfix === b.postfix) return 0;
  if (!a.postfix) return 1;
  if (!b.postfix) return -1;
  return comparePostfix(a.postfix, b.postfix);
}

/**
 * Sort bare versions ascending, dropping the ones that are not version-shaped.
 */
export function sortTagVersions(versions: string[]): string[] {
  const parsed = versions
    .map(version => ({ version, tag: parseTagVersion(version) }))
    .filter((entry): entry is { version: string; tag: ParsedSemverTag } => entry.tag !== null);
  parsed.sort((a, b) => compareSemverTags(a.tag, b.tag));
  return parsed.map(entry => entry.version);
}

/**
 * Highest version of a list of bare versions, releases only unless asked.
 */
export function getLatestTag(versions: string[], includePrereleases = false): string | null {
  const sorted = sortTagVersions(versions);
  for (let i = sorted.length - 1; i >= 0; i--) {
    const candidate = sorted[i];
    if (includePrereleases || isTagRelease(`v${candidate}`)) {
      return candidate;
    }
  }
  return null;
}
