/**
 * Shared constants for the formula-shaker CLI.
 * Single source of truth for file names, directory names and remote defaults.
 */

export const FILE_PATTERNS = {
  METADATA_YML: 'metadata.yml',
  REQUIREMENTS_TXT: 'formula-requirements.txt',
  REQUIREMENTS_BACKUP_SUFFIX: '.last',
  CONFIG_JSONC: 'shaker.jsonc'
} as const;

export const WORKSPACE_DIRS = {
  VENDOR: 'vendor',
  CLONES: 'formula-repos',
  SALT_ROOT: '_root'
} as const;

/**
 * Directories of salt extension modules, linked file by file into the salt root.
 */
export const DYNAMIC_MODULE_DIRS = [
  '_modules',
  '_grains',
  '_renderers',
  '_returners',
  '_states'
] as const;

export const REMOTE_DEFAULTS = {
  GIT_HOST: 'github.com',
  API_BASE_URL: 'https://api.github.com',
  TOKEN_ENV: 'GITHUB_TOKEN',
  MAX_TAG_COUNT: 1000,
  PAGE_SIZE: 100,
  DEFAULT_BRANCH: 'master'
} as const;

export const FORMULA_SUFFIX = '-formula';
