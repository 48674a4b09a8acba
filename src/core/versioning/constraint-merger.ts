import type { VersionConstraint } from '../../types/index.js';
import { ConstraintFormatError, ConstraintResolutionError, type ConstraintContext } from '../../utils/errors.js';
import { formatConstraint, parseConstraint } from './constraint.js';
import { compareSemverTags, parseRequestedVersion, type ParsedSemverTag } from './semver-tag.js';

function parseStrict(raw: string, context: ConstraintContext): VersionConstraint {
  const parsed = parseConstraint(raw);
  if (!parsed.comparator) {
    throw new ConstraintFormatError(`Unrecognized constraint "${raw}"`, { ...context, constraint: raw });
  }
  return parsed;
}

function versionOf(constraint: VersionConstraint): ParsedSemverTag | null {
  return constraint.version === null ? null : parseRequestedVersion(constraint.version);
}

/**
 * Order two bounds by version, coercing partial versions such as `v1.9`.
 * Tags that are not versions compare as strings.
 */
function compareBounds(next: VersionConstraint, existing: VersionConstraint): number {
  const left = versionOf(next);
  const right = versionOf(existing);
  if (left && right) {
    return compareSemverTags(left, right);
  }
  const a = next.tag;
  const b = existing.tag;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Merge a newly discovered constraint into the one already recorded for the
 * same package. Equality pins are sticky: the current `==` wins over anything,
 * then a new `==`. Bounds of the same direction tighten; opposite bounds are
 * not reconciled.
 */
export function resolveConstraints(
  newConstraint: string,
  currentConstraint: string,
  context: ConstraintContext = {}
): string {
  const incoming = newConstraint.trim();
  const current = currentConstraint.trim();

  if (!incoming && !current) {
    return '';
  }
  if (!incoming) {
    return current;
  }
  if (!current) {
    return incoming;
  }

  const next = parseStrict(incoming, context);
  const existing = parseStrict(current, context);

  if (existing.comparator === '==') {
    return formatConstraint(existing);
  }
  if (next.comparator === '==') {
    return formatConstraint(next);
  }
  if (next.comparator !== existing.comparator) {
    throw new ConstraintResolutionError(
      `Contradictory constraints "${incoming}" and "${current}"`,
      { ...context, constraint: `${incoming}, ${current}` }
    );
  }

  const order = compareBounds(next, existing);
  if (next.comparator === '>=') {
    return formatConstraint(order > 0 ? next : existing);
  }
  if (next.comparator === '<=') {
    return formatConstraint(order < 0 ? next : existing);
  }

  throw new ConstraintFormatError(
    `Cannot merge constraints "${incoming}" and "${current}"`,
    { ...context, constraint: `${incoming}, ${current}` }
  );
}
