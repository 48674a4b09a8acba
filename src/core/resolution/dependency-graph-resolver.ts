/**
 * Dependency graph resolution.
 *
 * Walks formula manifests depth-first from the root (or from a pinned
 * requirements file), merging every constraint found for a package into a
 * single record, then pins each record to one revision. The walk owns the
 * `dependencies` map and is its only writer.
 *
 * A `(package, constraint)` pair is fetched at most once per run: the
 * constraint is added to the record's `sourcedConstraints` once it has been
 * looked up, and a record whose current constraint is already sourced is
 * skipped. This also ends every cycle; the root is never entered at all.
 */

import { join } from 'path';

import type {
  DependencyGraph,
  DependencyRecord,
  Logger,
  PackageKey,
  ResolvedDependency,
  ResolvedRevision,
  RootMetadata
} from '../../types/index.js';
import type { RemoteRepository } from '../remote/types.js';
import { ConfigError } from '../../utils/errors.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { formatPackageKey } from '../../utils/formula-url.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { resolveConstraints } from '../versioning/constraint-merger.js';
import { ConstraintResolver } from './constraint-resolver.js';
import { parseRemoteManifest, parseRootManifest } from './manifest.js';
import {
  formatRequirementLine,
  parseRequirementEntries,
  parseRequirementsText,
  readRequirementLines
} from './requirements.js';

export interface DependencyGraphResolverOptions {
  rootDir: string;
  remote: RemoteRepository;
  logger: Logger;
  constraintResolver?: ConstraintResolver;
  includePrereleases?: boolean;
  defaultBranch?: string;
  metadataFile?: string;
  requirementsFile?: string;
}

export interface UpdateDependenciesOptions {
  /** Re-derive from the root manifest even when a lockfile was loaded */
  ignoreLocalRequirements?: boolean;
  /** Read dependencies' manifests, never their pinned requirements files */
  ignoreDependencyRequirements?: boolean;
}

function cloneRecord(record: DependencyRecord): DependencyRecord {
  return {
    ...record,
    key: { ...record.key },
    sourcedConstraints: [...record.sourcedConstraints]
  };
}

export class DependencyGraphResolver {
  private readonly rootDir: string;
  private readonly remote: RemoteRepository;
  private readonly logger: Logger;
  private readonly constraintResolver: ConstraintResolver;
  private readonly metadataFile: string;
  private readonly requirementsFile: string;

  private rootMetadata: RootMetadata | null = null;
  private localRequirements: Map<string, DependencyRecord> | null = null;
  private dependencies = new Map<string, DependencyRecord>();
  private revisions = new Map<string, ResolvedRevision>();
  private resolved = false;

  constructor(options: DependencyGraphResolverOptions) {
    this.rootDir = options.rootDir;
    this.remote = options.remote;
    this.logger = options.logger;
    this.metadataFile = options.metadataFile ?? FILE_PATTERNS.METADATA_YML;
    this.requirementsFile = options.requirementsFile ?? FILE_PATTERNS.REQUIREMENTS_TXT;
    this.constraintResolver = options.constraintResolver ?? new ConstraintResolver({
      remote: options.remote,
      logger: options.logger,
      includePrereleases: options.includePrereleases,
      defaultBranch: options.defaultBranch
    });
  }

  /**
   * Read the root manifest: its identity and declared dependencies.
   */
  async loadLocalMetadata(): Promise<RootMetadata> {
    const path = join(this.rootDir, this.metadataFile);
    if (!(await exists(path))) {
      throw new ConfigError(`Manifest not found: ${path}`, { path });
    }

    const manifest = parseRootManifest(await readTextFile(path), path, this.logger);
    const dependencies = parseRequirementEntries(manifest.dependencies, { origin: path, logger: this.logger });

    this.rootMetadata = { key: manifest.key, dependencies, exports: manifest.exports };
    this.logger.debug(`Loaded ${dependencies.size} root dependencies from ${path}`);
    return this.rootMetadata;
  }

  /**
   * Read the pinned requirements file, if there is one with entries.
   */
  async loadLocalRequirements(): Promise<boolean> {
    const path = join(this.rootDir, this.requirementsFile);
    if (!(await exists(path))) {
      this.logger.debug(`No requirements file at ${path}`);
      this.localRequirements = null;
      return false;
    }

    const records = parseRequirementsText(await readTextFile(path), { origin: path, logger: this.logger });
    if (records.size === 0) {
      this.logger.warn(`Requirements file ${path} is empty`);
      this.localRequirements = null;
      return false;
    }

    this.localRequirements = records;
    this.logger.debug(`Loaded ${records.size} pinned requirements from ${path}`);
    return true;
  }

  /**
   * Rebuild the dependency map from scratch and pin every entry.
   */
  async updateDependencies(options: UpdateDependenciesOptions = {}): Promise<DependencyGraph> {
    await this.remote.ensureAuthenticated();

    const root = this.rootMetadata ?? await this.loadLocalMetadata();
    this.dependencies = new Map();
    this.revisions = new Map();
    this.resolved = false;

    const seed = !options.ignoreLocalRequirements && this.localRequirements
      ? this.localRequirements
      : root.dependencies;
    this.logger.info(seed === root.dependencies
      ? 'Resolving dependencies from the manifest'
      : 'Resolving dependencies from the requirements file');

    for (const [key, record] of seed) {
      if (this.isRoot(key)) {
        this.logger.debug(`Ignoring root formula ${key} in its own dependencies`);
        continue;
      }
      this.dependencies.set(key, cloneRecord(record));
    }

    await this.fetchDependencies([...this.dependencies.values()], options.ignoreDependencyRequirements ?? false);
    await this.finalize();

    this.resolved = true;
    return { root: root.key, dependencies: this.dependencies };
  }

  /**
   * Depth-first walk over `base`, which holds records of the global map.
   */
  async fetchDependencies(base: DependencyRecord[], ignoreDependencyRequirements: boolean): Promise<void> {
    for (const record of base) {
      const key = formatPackageKey(record.key);
      const constraint = record.constraint;

      const existing = this.dependencies.get(key);
      if (existing && existing.sourcedConstraints.includes(constraint)) {
        this.logger.debug(`Already sourced ${key} "${constraint}"`);
        continue;
      }
      if (this.isRoot(key)) {
        this.logger.debug(`Skipping root formula ${key}`);
        continue;
      }

      const found = await this.fetchRemoteDependencies(record, ignoreDependencyRequirements);
      this.markSourced(record, constraint);

      if (found) {
        const merged = this.addDependenciesFromMetadata(found);
        await this.fetchDependencies(merged, ignoreDependencyRequirements);
      } else {
        this.logger.debug(`No requirements or manifest for ${key}, treating it as a leaf`);
      }
    }
  }

  /**
   * Merge discovered entries into the global map. Returns the merged records
   * of every non-root entry.
   */
  addDependenciesFromMetadata(entries: Map<string, DependencyRecord>): DependencyRecord[] {
    const merged: DependencyRecord[] = [];

    for (const [key, entry] of entries) {
      if (this.isRoot(key)) {
        this.logger.debug(`Ignoring dependency on root formula ${key}`);
        continue;
      }

      const current = this.dependencies.get(key);
      if (!current) {
        const record = cloneRecord(entry);
        this.dependencies.set(key, record);
        merged.push(record);
        continue;
      }

      const constraint = resolveConstraints(entry.constraint, current.constraint, { package: key });
      if (constraint !== current.constraint) {
        this.logger.debug(`Constraint for ${key}: "${current.constraint}" + "${entry.constraint}" -> "${constraint}"`);
      }
      current.constraint = constraint;
      current.sourcedConstraints = [...current.sourcedConstraints, ...entry.sourcedConstraints];
      merged.push(current);
    }

    return merged;
  }

  getRootMetadata(): RootMetadata | null {
    return this.rootMetadata;
  }

  getDependencies(): ReadonlyMap<string, DependencyRecord> {
    return this.dependencies;
  }

  getResolvedDependencies(): Map<string, ResolvedDependency> {
    if (!this.resolved) {
      throw new Error('Dependencies have not been resolved, run updateDependencies first');
    }

    const result = new Map<string, ResolvedDependency>();
    for (const [key, record] of this.dependencies) {
      if (record.resolvedSha === null || record.resolvedTag === null) {
        throw new Error(`Dependency ${key} has no resolved revision`);
      }
      result.set(key, {
        key,
        organisation: record.key.organisation,
        name: record.key.name,
        source: record.source,
        sha: record.resolvedSha,
        tag: record.resolvedTag
      });
    }
    return result;
  }

  /**
   * Lockfile lines for the resolved set, sorted.
   */
  getRequirementsLines(): string[] {
    return [...this.getResolvedDependencies().values()]
      .map(dependency => formatRequirementLine(dependency.source, dependency.tag))
      .sort();
  }

  /**
   * Checkout directory names that no resolved dependency accounts for.
   */
  getOrphanedDirectories(existingNames: string[]): string[] {
    const wanted = new Set([...this.getResolvedDependencies().values()].map(dependency => dependency.name));
    return existingNames.filter(name => !wanted.has(name)).sort();
  }

  private isRoot(key: string): boolean {
    const rootKey = this.rootMetadata?.key;
    return rootKey !== null && rootKey !== undefined && formatPackageKey(rootKey) === key;
  }

  private markSourced(record: DependencyRecord, constraint: string): void {
    const key = formatPackageKey(record.key);
    const current = this.dependencies.get(key);
    if (!current) {
      this.dependencies.set(key, { ...cloneRecord(record), sourcedConstraints: [constraint] });
      return;
    }
    if (!current.sourcedConstraints.includes(constraint)) {
      current.sourcedConstraints.push(constraint);
    }
  }

  private async revisionFor(key: PackageKey, constraint: string): Promise<ResolvedRevision> {
    const cacheKey = `${formatPackageKey(key)}|${constraint}`;
    const cached = this.revisions.get(cacheKey);
    if (cached) {
      return cached;
    }
    const revision = await this.constraintResolver.resolveRevision(key.organisation, key.name, constraint);
    this.revisions.set(cacheKey, revision);
    return revision;
  }

  /**
   * Entries declared by a dependency at its resolved revision: its pinned
   * requirements file when present and allowed, otherwise its manifest.
   * Null when it has neither.
   */
  private async fetchRemoteDependencies(
    record: DependencyRecord,
    ignoreDependencyRequirements: boolean
  ): Promise<Map<string, DependencyRecord> | null> {
    const { organisation, name } = record.key;
    const revision = await this.revisionFor(record.key, record.constraint);
    this.logger.info(`Fetching ${organisation}/${name} at ${revision.name}`);

    if (!ignoreDependencyRequirements) {
      const text = await this.remote.fetchFile(organisation, name, revision.commitSha, this.requirementsFile);
      if (text !== null && readRequirementLines(text).length > 0) {
        return parseRequirementsText(text, {
          origin: `${organisation}/${name}:${this.requirementsFile}`,
          logger: this.logger,
          markSourced: true
        });
      }
    }

    const manifestText = await this.remote.fetchFile(organisation, name, revision.commitSha, this.metadataFile);
    if (manifestText === null) {
      return null;
    }

    const origin = `${organisation}/${name}:${this.metadataFile}`;
    const manifest = parseRemoteManifest(manifestText, origin);
    return parseRequirementEntries(manifest.dependencies, { origin, logger: this.logger });
  }

  private async finalize(): Promise<void> {
    for (const record of this.dependencies.values()) {
      const revision = await this.revisionFor(record.key, record.constraint);
      record.resolvedSha = revision.commitSha;
      record.resolvedTag = revision.name;
    }
  }
}
