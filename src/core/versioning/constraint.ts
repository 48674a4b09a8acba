import type { VersionConstraint } from '../../types/index.js';
import { parseSemverTag } from './semver-tag.js';

const CONSTRAINT_PATTERN = /^([=><]+)\s*(.*)$/;

function neutralConstraint(raw: string): VersionConstraint {
  return { raw, comparator: '', tag: '', version: null, postfix: null };
}

/**
 * Parse `<comparator><tag>`, e.g. `>=v1.2.0` or `==develop`.
 * Strings that are not of that shape yield an unconstrained result.
 */
export function parseConstraint(raw: string): VersionConstraint {
  const trimmed = raw.trim();
  const match = CONSTRAINT_PATTERN.exec(trimmed);
  if (!match) {
    return neutralConstraint(trimmed);
  }

  const comparator = match[1];
  const tag = match[2].trim();
  if (!tag) {
    return neutralConstraint(trimmed);
  }

  return {
    raw: trimmed,
    comparator,
    tag,
    version: tag.startsWith('v') ? tag.slice(1) : null,
    postfix: parseSemverTag(tag).postfix
  };
}

export function formatConstraint(constraint: Pick<VersionConstraint, 'comparator' | 'tag'>): string {
  return constraint.comparator ? `${constraint.comparator}${constraint.tag}` : '';
}

export function isConstrained(constraint: VersionConstraint): boolean {
  return constraint.comparator !== '';
}
