import { join } from 'path';
import type { Logger } from '../types/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { ConfigError } from '../utils/errors.js';
import { FILE_PATTERNS, REMOTE_DEFAULTS, WORKSPACE_DIRS } from '../constants/index.js';

/**
 * Configuration for a shake run.
 * Defaults, overridden by `<rootDir>/shaker.jsonc`; the token always comes
 * from the environment.
 */
export interface ShakerConfig {
  vendorDir: string;
  cloneDir: string;
  saltRoot: string;
  apiBaseUrl: string;
  maxTagCount: number;
  defaultBranch: string;
  gitRetries: number;
  includePrereleases: boolean;
  token?: string;
}

type FileConfig = Partial<Omit<ShakerConfig, 'token'>>;

export const DEFAULT_CONFIG: Omit<ShakerConfig, 'token'> = {
  vendorDir: WORKSPACE_DIRS.VENDOR,
  cloneDir: WORKSPACE_DIRS.CLONES,
  saltRoot: WORKSPACE_DIRS.SALT_ROOT,
  apiBaseUrl: REMOTE_DEFAULTS.API_BASE_URL,
  maxTagCount: REMOTE_DEFAULTS.MAX_TAG_COUNT,
  defaultBranch: REMOTE_DEFAULTS.DEFAULT_BRANCH,
  gitRetries: 2,
  includePrereleases: false
};

const STRING_FIELDS = ['vendorDir', 'cloneDir', 'saltRoot', 'apiBaseUrl', 'defaultBranch'] as const;
const COUNT_FIELDS = ['maxTagCount', 'gitRetries'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check the shape of a parsed config file and keep the known fields.
 */
export function validateFileConfig(raw: unknown, origin: string): FileConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Configuration ${origin} must be an object`, { origin });
  }

  const config: FileConfig = {};
  for (const field of STRING_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigError(`"${field}" in ${origin} must be a non-empty string`, { origin, field });
    }
    config[field] = value;
  }
  for (const field of COUNT_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new ConfigError(`"${field}" in ${origin} must be a non-negative integer`, { origin, field });
    }
    config[field] = value;
  }
  if (raw.includePrereleases !== undefined) {
    if (typeof raw.includePrereleases !== 'boolean') {
      throw new ConfigError(`"includePrereleases" in ${origin} must be a boolean`, { origin, field: 'includePrereleases' });
    }
    config.includePrereleases = raw.includePrereleases;
  }
  return config;
}

export class ConfigManager {
  private config: ShakerConfig | null = null;

  constructor(
    private readonly rootDir: string,
    private readonly logger: Logger,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async load(): Promise<ShakerConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = join(this.rootDir, FILE_PATTERNS.CONFIG_JSONC);
    let fileConfig: FileConfig = {};
    if (await exists(configPath)) {
      this.logger.debug(`Loading config from: ${configPath}`);
      fileConfig = validateFileConfig(await readJsonOrJsoncFile(configPath), configPath);
    } else {
      this.logger.debug('Config file not found, using defaults');
    }

    this.config = {
      ...DEFAULT_CONFIG,
      ...fileConfig,
      token: this.env[REMOTE_DEFAULTS.TOKEN_ENV] || undefined
    };
    return this.config;
  }
}
