import type { Logger, ResolvedRevision } from '../../types/index.js';
import type { RemoteRepository, RemoteTag } from '../remote/types.js';
import { ConstraintResolutionError, type ConstraintContext } from '../../utils/errors.js';
import { REMOTE_DEFAULTS } from '../../constants/index.js';
import { isSha } from '../../utils/git.js';
import { parseConstraint } from '../versioning/constraint.js';
import {
  compareSemverTags,
  getLatestTag,
  isTagPrerelease,
  parseRequestedVersion,
  parseTagVersion,
  sortTagVersions,
  type ParsedSemverTag
} from '../versioning/semver-tag.js';

export interface ConstraintResolverOptions {
  remote: RemoteRepository;
  logger: Logger;
  /** Let inequality constraints and the default pick select prereleases */
  includePrereleases?: boolean;
  /** Branch used when no tag satisfies an empty constraint */
  defaultBranch?: string;
}

interface TagIndex {
  /** Ascending bare versions of the version-shaped tags */
  versions: string[];
  /** Every tag by name, including the ones that are not version-shaped */
  byName: Map<string, RemoteTag>;
}

/**
 * Picks the single revision of a repository that satisfies a constraint.
 */
export class ConstraintResolver {
  private readonly remote: RemoteRepository;
  private readonly logger: Logger;
  private readonly includePrereleases: boolean;
  private readonly defaultBranch: string;

  constructor(options: ConstraintResolverOptions) {
    this.remote = options.remote;
    this.logger = options.logger;
    this.includePrereleases = options.includePrereleases ?? false;
    this.defaultBranch = options.defaultBranch ?? REMOTE_DEFAULTS.DEFAULT_BRANCH;
  }

  /**
   * Resolve a constraint to a tag, branch or commit.
   * Returns null only for an empty constraint on a repository with no release tag.
   */
  async resolveConstraintToObject(
    organisation: string,
    name: string,
    constraint: string
  ): Promise<ResolvedRevision | null> {
    const parsed = parseConstraint(constraint);
    const context: ConstraintContext = { package: `${organisation}/${name}`, constraint };
    this.logger.debug(`Resolving ${organisation}/${name} "${constraint}"`);

    if (parsed.comparator && parsed.version === null) {
      return this.resolveReference(organisation, name, parsed.tag, context);
    }

    const index = await this.loadTags(organisation, name);

    if (!parsed.comparator) {
      const latest = getLatestTag(index.versions, this.includePrereleases);
      if (latest === null) {
        this.logger.debug(`No release tag found for ${organisation}/${name}`);
        return null;
      }
      return this.tagRevision(index, latest, context);
    }

    const requestedVersion = parsed.version ?? '';
    if (index.versions.length === 0) {
      throw new ConstraintResolutionError('Repository has no version tags', context);
    }

    switch (parsed.comparator) {
      case '==': {
        if (!index.versions.includes(requestedVersion)) {
          throw new ConstraintResolutionError(
            `Version ${requestedVersion} not found in tags ${index.versions.join(', ')}`,
            context
          );
        }
        return this.tagRevision(index, requestedVersion, context);
      }
      case '>=':
        return this.tagRevision(index, this.scanAtLeast(index.versions, this.requested(requestedVersion, context), context), context);
      case '<=':
        return this.tagRevision(index, this.scanAtMost(index.versions, this.requested(requestedVersion, context), context), context);
      default:
        throw new ConstraintResolutionError(`Unknown comparator "${parsed.comparator}"`, context);
    }
  }

  /**
   * Resolve a constraint, falling back to the default branch when the
   * repository has no tag to offer an unconstrained dependency.
   */
  async resolveRevision(organisation: string, name: string, constraint: string): Promise<ResolvedRevision> {
    const revision = await this.resolveConstraintToObject(organisation, name, constraint);
    if (revision) {
      return revision;
    }

    this.logger.info(`No release tag for ${organisation}/${name}, using branch ${this.defaultBranch}`);
    const branch = await this.remote.getBranch(organisation, name, this.defaultBranch);
    if (!branch) {
      throw new ConstraintResolutionError(
        `No release tag and no ${this.defaultBranch} branch`,
        { package: `${organisation}/${name}`, constraint }
      );
    }
    return { name: branch.name, commitSha: branch.commitSha, kind: 'branch' };
  }

  private async resolveReference(
    organisation: string,
    name: string,
    ref: string,
    context: ConstraintContext
  ): Promise<ResolvedRevision> {
    const branch = await this.remote.getBranch(organisation, name, ref);
    if (branch) {
      return { name: branch.name, commitSha: branch.commitSha, kind: 'branch' };
    }

    if (isSha(ref)) {
      const commit = await this.remote.getCommit(organisation, name, ref);
      if (commit) {
        return { name: ref, commitSha: commit.sha, kind: 'commit' };
      }
    }

    throw new ConstraintResolutionError(`No branch or commit named "${ref}"`, context);
  }

  private async loadTags(organisation: string, name: string): Promise<TagIndex> {
    const tags = await this.remote.listTags(organisation, name);
    const byName = new Map<string, RemoteTag>();
    const bareVersions: string[] = [];

    for (const tag of tags) {
      byName.set(tag.name, tag);
      if (tag.name.startsWith('v')) {
        bareVersions.push(tag.name.slice(1));
      }
    }

    return { versions: sortTagVersions(bareVersions), byName };
  }

  private requested(version: string, context: ConstraintContext): ParsedSemverTag {
    const requested = parseRequestedVersion(version);
    if (!requested) {
      throw new ConstraintResolutionError(`Cannot compare against version "${version}"`, context);
    }
    return requested;
  }

  private acceptable(version: string): boolean {
    if (this.includePrereleases || !isTagPrerelease(`v${version}`)) {
      return true;
    }
    this.logger.debug(`Skipping prerelease v${version}`);
    return false;
  }

  /**
   * Highest acceptable version at or above the requested one. Reaching a
   * candidate below the requested version ends the scan with an error.
   */
  private scanAtLeast(versions: string[], requested: ParsedSemverTag, context: ConstraintContext): string {
    for (let i = versions.length - 1; i >= 0; i--) {
      const candidate = parseTagVersion(versions[i]);
      if (!candidate) continue;
      if (compareSemverTags(candidate, requested) < 0) {
        throw new ConstraintResolutionError(
          `No release at or above the requested version (highest remaining is ${versions[i]})`,
          context
        );
      }
      if (this.acceptable(versions[i])) {
        return versions[i];
      }
    }
    throw new ConstraintResolutionError('No release at or above the requested version', context);
  }

  private scanAtMost(versions: string[], requested: ParsedSemverTag, context: ConstraintContext): string {
    for (let i = versions.length - 1; i >= 0; i--) {
      const candidate = parseTagVersion(versions[i]);
      if (!candidate) continue;
      if (compareSemverTags(candidate, requested) <= 0 && this.acceptable(versions[i])) {
        return versions[i];
      }
    }
    throw new ConstraintResolutionError('No release at or below the requested version', context);
  }

  private tagRevision(index: TagIndex, version: string, context: ConstraintContext): ResolvedRevision {
    const tag = index.byName.get(`v${version}`);
    if (!tag) {
      throw new ConstraintResolutionError(`Tag v${version} disappeared from the tag list`, context);
    }
    return { name: tag.name, commitSha: tag.commitSha, kind: 'tag' };
  }
}
