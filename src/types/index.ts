/**
 * Common types and interfaces for the formula-shaker CLI
 */

// Package identity

export interface PackageKey {
  organisation: string;
  name: string;
}

// Constraint types

/** Comparators understood by the resolver; parsing may yield others. */
export type Comparator = '==' | '>=' | '<=';

export interface VersionConstraint {
  /** The constraint as written, e.g. `>=v1.2.0`; empty when unconstrained */
  raw: string;
  /** `''` means "no constraint, take the latest stable tag" */
  comparator: string;
  tag: string;
  /** Tag with its leading `v` stripped; null when the tag has none */
  version: string | null;
  postfix: string | null;
}

export interface SemverTag {
  major: number | null;
  minor: number | null;
  patch: number | null;
  postfix: string | null;
}

// Dependency graph types

export interface DependencyRecord {
  key: PackageKey;
  /** Canonical clone URL, e.g. git@github.com:org/name.git */
  source: string;
  constraint: string;
  /** Constraint strings already fetched for this package during the run */
  sourcedConstraints: string[];
  resolvedSha: string | null;
  resolvedTag: string | null;
}

export interface RootMetadata {
  /** Null for a deploy repository without a `formula:` key */
  key: PackageKey | null;
  dependencies: Map<string, DependencyRecord>;
  exports?: string[];
}

export interface DependencyGraph {
  root: PackageKey | null;
  dependencies: Map<string, DependencyRecord>;
}

export interface ResolvedRevision {
  name: string;
  commitSha: string;
  kind: 'tag' | 'branch' | 'commit';
}

export interface ResolvedDependency {
  key: string;
  organisation: string;
  name: string;
  source: string;
  sha: string;
  tag: string;
}

// Command option types

export interface ShakeOptions {
  rootDir?: string;
  verbose?: boolean;
  debug?: boolean;
  simulate?: boolean;
  ignoreDependencyRequirements?: boolean;
  includePrereleases?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class ShakerError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ShakerError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  CONFIG_ERROR = 'CONFIG_ERROR',
  CONSTRAINT_FORMAT = 'CONSTRAINT_FORMAT',
  CONSTRAINT_RESOLUTION = 'CONSTRAINT_RESOLUTION',
  REMOTE_CONNECTION = 'REMOTE_CONNECTION',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  GIT_ERROR = 'GIT_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
