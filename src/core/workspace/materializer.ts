/**
 * Local workspace materialization.
 *
 * Layout under `<rootDir>/<vendorDir>`:
 *   <cloneDir>/<formula-name>   git checkouts pinned to the resolved sha
 *   <saltRoot>/<export>         relative symlinks into the checkouts
 *   <saltRoot>/_modules/<file>  (and the other dynamic module dirs) per-file links
 *
 * The salt root only ever holds links, so it is rebuilt on every run.
 */

import { dirname, join, relative } from 'path';

import type { Logger, ResolvedDependency } from '../../types/index.js';
import { FileSystemError } from '../../utils/errors.js';
import {
  createSymlink,
  ensureDir,
  exists,
  isDirectory,
  isOccupied,
  listDirectories,
  listEntries,
  readTextFile,
  remove,
  renamePath,
  writeTextFile
} from '../../utils/fs.js';
import { GitCheckout, runGit, type GitRunner } from '../../utils/git.js';
import { DYNAMIC_MODULE_DIRS, FILE_PATTERNS, FORMULA_SUFFIX, WORKSPACE_DIRS } from '../../constants/index.js';
import { parseManifestExports } from '../resolution/manifest.js';

export interface MaterializerOptions {
  rootDir: string;
  logger: Logger;
  vendorDir?: string;
  cloneDir?: string;
  saltRoot?: string;
  requirementsFile?: string;
  /** Extra attempts for clone and fetch */
  gitRetries?: number;
  git?: GitRunner;
}

export interface InstallResult {
  updated: number;
  unchanged: number;
}

export interface WriteRequirementsOptions {
  overwrite?: boolean;
  backup?: boolean;
}

export class LocalWorkspaceMaterializer {
  readonly vendorPath: string;
  readonly clonesPath: string;
  readonly saltRootPath: string;
  readonly requirementsPath: string;

  private readonly logger: Logger;
  private readonly gitRetries: number;
  private readonly git: GitCheckout;

  constructor(options: MaterializerOptions) {
    this.vendorPath = join(options.rootDir, options.vendorDir ?? WORKSPACE_DIRS.VENDOR);
    this.clonesPath = join(this.vendorPath, options.cloneDir ?? WORKSPACE_DIRS.CLONES);
    this.saltRootPath = join(this.vendorPath, options.saltRoot ?? WORKSPACE_DIRS.SALT_ROOT);
    this.requirementsPath = join(options.rootDir, options.requirementsFile ?? FILE_PATTERNS.REQUIREMENTS_TXT);
    this.logger = options.logger;
    this.gitRetries = options.gitRetries ?? 0;
    this.git = new GitCheckout(options.git ?? runGit);
  }

  /**
   * Create the vendor tree, rebuilding the salt root. With `overwrite` the
   * checkouts are discarded too.
   */
  async prepareDirectories(overwrite = false): Promise<void> {
    await ensureDir(this.vendorPath);

    if (await isOccupied(this.saltRootPath)) {
      this.logger.debug(`Deleting salt root ${this.saltRootPath}`);
      await remove(this.saltRootPath);
    }
    await ensureDir(this.saltRootPath);

    if (overwrite && await exists(this.clonesPath)) {
      this.logger.debug(`Deleting checkouts in ${this.clonesPath}`);
      await remove(this.clonesPath);
    }
    await ensureDir(this.clonesPath);
  }

  async listCheckouts(): Promise<string[]> {
    if (!(await isDirectory(this.clonesPath))) {
      return [];
    }
    return listDirectories(this.clonesPath);
  }

  /**
   * Bring every checkout to its resolved sha.
   */
  async installDependencies(resolved: Map<string, ResolvedDependency>): Promise<InstallResult> {
    const result: InstallResult = { updated: 0, unchanged: 0 };

    for (const dependency of this.ordered(resolved)) {
      const directory = join(this.clonesPath, dependency.name);
      const cloned = !(await exists(directory));

      if (cloned) {
        this.logger.info(`Cloning ${dependency.source}`);
        await this.withRetries(`clone ${dependency.name}`, () => this.git.clone(dependency.source, directory));
      }

      const head = await this.git.head(directory);
      if (head === dependency.sha) {
        if (cloned) {
          result.updated++;
        } else {
          this.logger.debug(`${dependency.name} already at ${dependency.tag} (${dependency.sha})`);
          result.unchanged++;
        }
        continue;
      }

      if (!cloned) {
        await this.withRetries(`fetch ${dependency.name}`, () => this.git.fetch(directory));
      }
      await this.git.checkout(directory, dependency.sha);
      this.logger.info(`Updated ${dependency.name} to ${dependency.tag} (${dependency.sha})`);
      result.updated++;
    }

    return result;
  }

  async removeCheckouts(names: string[]): Promise<void> {
    for (const name of names) {
      this.logger.info(`Removing checkout of unused formula ${name}`);
      await remove(join(this.clonesPath, name));
    }
  }

  /**
   * Link every formula's exports, and its dynamic modules, into the salt root.
   */
  async updateRootLinks(resolved: Map<string, ResolvedDependency>): Promise<void> {
    for (const dependency of this.ordered(resolved)) {
      const checkout = join(this.clonesPath, dependency.name);
      const exports = await this.formulaExports(dependency.name);

      for (const exported of exports) {
        const candidates = [
          { source: join(checkout, exported), target: join(this.saltRootPath, exported) },
          { source: checkout, target: join(this.saltRootPath, dependency.name) }
        ];

        const candidate = await this.firstExisting(candidates);
        if (!candidate) {
          throw new FileSystemError(`Could not find export "${exported}" of formula ${dependency.name}`, {
            formula: dependency.name,
            export: exported
          });
        }
        if (await isOccupied(candidate.target)) {
          throw new FileSystemError(`Link target ${candidate.target} conflicts with something else`, {
            formula: dependency.name,
            target: candidate.target
          });
        }

        await createSymlink(relative(dirname(candidate.target), candidate.source), candidate.target);
        this.logger.debug(`Linked ${candidate.source} to ${candidate.target}`);
      }

      await this.linkDynamicModules(dependency.name);
    }
  }

  /**
   * Write the lockfile. An existing file is kept unless `overwrite`; with
   * `backup` it is first renamed to `<file>.last`.
   */
  async writeRequirements(lines: string[], options: WriteRequirementsOptions = {}): Promise<boolean> {
    const path = this.requirementsPath;

    if (await exists(path)) {
      if (!options.overwrite) {
        this.logger.warn(`${path} exists, not writing`);
        return false;
      }
      if (options.backup) {
        const backupPath = `${path}${FILE_PATTERNS.REQUIREMENTS_BACKUP_SUFFIX}`;
        await renamePath(path, backupPath);
        this.logger.info(`Renamed ${path} to ${backupPath}`);
      }
    }

    await writeTextFile(path, `${lines.join('\n')}\n`);
    this.logger.debug(`Wrote ${path}`);
    return true;
  }

  private ordered(resolved: Map<string, ResolvedDependency>): ResolvedDependency[] {
    return [...resolved.values()].sort((a, b) => a.key.localeCompare(b.key));
  }

  private async withRetries(label: string, operation: () => Promise<void>): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        await operation();
        return;
      } catch (error) {
        if (attempt >= this.gitRetries) {
          throw error;
        }
        this.logger.warn(`${label} failed, retrying (${attempt + 1}/${this.gitRetries})`, error);
      }
    }
  }

  private async formulaExports(name: string): Promise<string[]> {
    const fallback = [name.endsWith(FORMULA_SUFFIX) ? name.slice(0, -FORMULA_SUFFIX.length) : name];
    const manifestPath = join(this.clonesPath, name, FILE_PATTERNS.METADATA_YML);
    if (!(await exists(manifestPath))) {
      return fallback;
    }
    return parseManifestExports(await readTextFile(manifestPath), manifestPath) ?? fallback;
  }

  private async firstExisting<T extends { source: string }>(candidates: T[]): Promise<T | null> {
    for (const candidate of candidates) {
      if (await exists(candidate.source)) {
        return candidate;
      }
    }
    return null;
  }

  private async linkDynamicModules(name: string): Promise<void> {
    const checkout = join(this.clonesPath, name);

    for (const moduleDir of DYNAMIC_MODULE_DIRS) {
      const sourceDir = join(checkout, moduleDir);
      if (!(await isDirectory(sourceDir))) {
        continue;
      }

      const targetDir = join(this.saltRootPath, moduleDir);
      await ensureDir(targetDir);
      const relativeSource = relative(targetDir, sourceDir);

      for (const entry of await listEntries(sourceDir)) {
        const linked = await createSymlink(join(relativeSource, entry), join(targetDir, entry));
        if (!linked) {
          this.logger.warn(`Not linking ${moduleDir}/${entry} of ${name}, a link already exists`);
        }
      }
    }
  }
}
