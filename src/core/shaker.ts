/**
 * Shake orchestration: resolve the formula graph, then check out and link
 * every formula and record the pins in the lockfile.
 *
 * - refresh: seed from the existing lockfile, falling back to the manifest
 * - update: ignore the lockfile and re-derive everything from the manifest
 */

import { resolve } from 'path';

import type { CommandResult, Logger, ShakeOptions } from '../types/index.js';
import type { RemoteRepository } from './remote/types.js';
import type { GitRunner } from '../utils/git.js';
import { ConfigManager } from './config.js';
import { GitHubRepository } from './remote/github-repository.js';
import { DependencyGraphResolver } from './resolution/index.js';
import { LocalWorkspaceMaterializer } from './workspace/materializer.js';
import { resolveOutput, type OutputPort } from './ports/index.js';

export type ShakeMode = 'refresh' | 'update';

export interface ShakeContext {
  logger: Logger;
  output?: OutputPort;
  remote?: RemoteRepository;
  git?: GitRunner;
  env?: NodeJS.ProcessEnv;
}

export interface ShakeSummary {
  mode: ShakeMode;
  simulated: boolean;
  requirements: string[];
  updated: number;
  unchanged: number;
  removed: string[];
}

export async function runShake(
  mode: ShakeMode,
  options: ShakeOptions,
  context: ShakeContext
): Promise<CommandResult<ShakeSummary>> {
  const { logger } = context;
  const output = resolveOutput(context);
  const rootDir = resolve(options.rootDir ?? '.');

  const config = await new ConfigManager(rootDir, logger, context.env).load();
  const remote = context.remote ?? new GitHubRepository({
    token: config.token,
    apiBaseUrl: config.apiBaseUrl,
    maxTagCount: config.maxTagCount,
    logger
  });

  const resolver = new DependencyGraphResolver({
    rootDir,
    remote,
    logger,
    includePrereleases: options.includePrereleases ?? config.includePrereleases,
    defaultBranch: config.defaultBranch
  });

  await resolver.loadLocalMetadata();
  if (mode === 'refresh') {
    const pinned = await resolver.loadLocalRequirements();
    output.step(pinned
      ? 'Refreshing dependencies from the stored formula requirements'
      : 'No stored formula requirements, resolving from metadata');
  } else {
    output.step('Updating, all dependencies will be re-calculated from the metadata');
  }

  const spinner = output.spinner();
  spinner.start('Resolving formula dependencies');
  try {
    await resolver.updateDependencies({
      ignoreLocalRequirements: mode === 'update',
      ignoreDependencyRequirements: options.ignoreDependencyRequirements ?? false
    });
  } catch (error) {
    spinner.stop('Dependency resolution failed');
    throw error;
  }
  const requirements = resolver.getRequirementsLines();
  spinner.stop(`Resolved ${requirements.length} formula dependencies`);

  if (options.simulate) {
    output.note(requirements.join('\n') || '(no dependencies)', 'Simulation mode, no changes made');
    return {
      success: true,
      data: { mode, simulated: true, requirements, updated: 0, unchanged: 0, removed: [] }
    };
  }

  const materializer = new LocalWorkspaceMaterializer({
    rootDir,
    logger,
    vendorDir: config.vendorDir,
    cloneDir: config.cloneDir,
    saltRoot: config.saltRoot,
    gitRetries: config.gitRetries,
    git: context.git
  });

  const resolved = resolver.getResolvedDependencies();
  await materializer.prepareDirectories(mode === 'update');

  output.step('Installing dependencies');
  const install = await materializer.installDependencies(resolved);
  const removed = resolver.getOrphanedDirectories(await materializer.listCheckouts());
  await materializer.removeCheckouts(removed);
  if (removed.length > 0) {
    output.warn(`Removed checkouts of unused formulas: ${removed.join(', ')}`);
  }
  await materializer.updateRootLinks(resolved);

  await materializer.writeRequirements(requirements, { overwrite: true, backup: true });
  output.info(`Pinned ${requirements.length} formulas in ${materializer.requirementsPath}`);
  output.success(`Installed ${resolved.size} formulas (${install.updated} updated, ${install.unchanged} unchanged)`);

  return {
    success: true,
    data: { mode, simulated: false, requirements, updated: install.updated, unchanged: install.unchanged, removed }
  };
}
