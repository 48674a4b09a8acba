/**
 * GitHub REST client for formula repositories.
 *
 * Authenticates with a bearer token (GITHUB_TOKEN by default). Lookups that
 * the API answers with 404 are reported as null; authentication failures and
 * every other non-success status raise RemoteConnectionError.
 */

import type { Logger } from '../../types/index.js';
import { RemoteConnectionError } from '../../utils/errors.js';
import { REMOTE_DEFAULTS } from '../../constants/index.js';
import type { RemoteBranch, RemoteCommit, RemoteRepository, RemoteTag } from './types.js';

export type FetchFunction = typeof fetch;

export interface GitHubRepositoryOptions {
  token?: string;
  apiBaseUrl?: string;
  /** Upper bound on the tags listed per repository */
  maxTagCount?: number;
  pageSize?: number;
  logger: Logger;
  fetchFn?: FetchFunction;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readCommitSha(value: unknown): string | null {
  if (!isRecord(value)) return null;
  return typeof value.sha === 'string' ? value.sha : null;
}

function toRemoteTag(value: unknown): RemoteTag | null {
  if (!isRecord(value) || typeof value.name !== 'string') return null;
  const commitSha = readCommitSha(value.commit);
  return commitSha ? { name: value.name, commitSha } : null;
}

export class GitHubRepository implements RemoteRepository {
  private readonly token?: string;
  private readonly apiBaseUrl: string;
  private readonly maxTagCount: number;
  private readonly pageSize: number;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFunction;

  constructor(options: GitHubRepositoryOptions) {
    this.token = options.token || undefined;
    this.apiBaseUrl = (options.apiBaseUrl ?? REMOTE_DEFAULTS.API_BASE_URL).replace(/\/+$/, '');
    this.maxTagCount = options.maxTagCount ?? REMOTE_DEFAULTS.MAX_TAG_COUNT;
    this.pageSize = options.pageSize ?? REMOTE_DEFAULTS.PAGE_SIZE;
    this.logger = options.logger;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async ensureAuthenticated(): Promise<void> {
    if (!this.token) {
      throw new RemoteConnectionError(
        `No GitHub token found, set ${REMOTE_DEFAULTS.TOKEN_ENV} for access to formula repositories`
      );
    }
  }

  async listTags(organisation: string, name: string): Promise<RemoteTag[]> {
    const tags: RemoteTag[] = [];
    let page = 1;

    while (tags.length < this.maxTagCount) {
      const path = `/repos/${organisation}/${name}/tags?per_page=${this.pageSize}&page=${page}`;
      const body = await this.getJson(path);
      if (body === null) {
        throw new RemoteConnectionError(`Repository ${organisation}/${name} not found`, { organisation, name });
      }
      if (!Array.isArray(body)) {
        throw new RemoteConnectionError(`Unexpected tag list for ${organisation}/${name}`, { organisation, name });
      }

      for (const entry of body) {
        const tag = toRemoteTag(entry);
        if (tag) {
          tags.push(tag);
        }
      }

      if (body.length < this.pageSize) {
        break;
      }
      page++;
    }

    this.logger.debug(`Listed ${tags.length} tags for ${organisation}/${name}`);
    return tags.slice(0, this.maxTagCount);
  }

  async getBranch(organisation: string, name: string, branch: string): Promise<RemoteBranch | null> {
    const body = await this.getJson(`/repos/${organisation}/${name}/branches/${encodeURIComponent(branch)}`);
    if (!isRecord(body) || typeof body.name !== 'string') {
      return null;
    }
    const commitSha = readCommitSha(body.commit);
    return commitSha ? { name: body.name, commitSha } : null;
  }

  async getCommit(organisation: string, name: string, ref: string): Promise<RemoteCommit | null> {
    const body = await this.getJson(`/repos/${organisation}/${name}/commits/${encodeURIComponent(ref)}`);
    const sha = readCommitSha(body);
    return sha ? { sha } : null;
  }

  async fetchFile(organisation: string, name: string, ref: string, path: string): Promise<string | null> {
    const url = `/repos/${organisation}/${name}/contents/${path}?ref=${encodeURIComponent(ref)}`;
    const response = await this.request(url, 'application/vnd.github.raw');
    if (response === null) {
      this.logger.debug(`No ${path} in ${organisation}/${name} at ${ref}`);
      return null;
    }
    return response.text();
  }

  private async getJson(path: string): Promise<unknown> {
    const response = await this.request(path, 'application/vnd.github+json');
    if (response === null) {
      return null;
    }
    const body: unknown = await response.json();
    return body;
  }

  private async request(path: string, accept: string): Promise<Response | null> {
    const url = `${this.apiBaseUrl}${path}`;
    const headers: Record<string, string> = {
      'Accept': accept,
      'X-GitHub-Api-Version': '2022-11-28'
    };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, { headers });
    } catch (error) {
      throw new RemoteConnectionError(`Could not reach ${url}`, {
        url,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    this.logger.debug(`GET ${url} -> ${response.status}`);

    if (response.status === 404) {
      return null;
    }
    if (response.status === 401 || response.status === 403) {
      throw new RemoteConnectionError(
        `GitHub refused access to ${url} (HTTP ${response.status}), check ${REMOTE_DEFAULTS.TOKEN_ENV}`,
        { url, status: response.status }
      );
    }
    if (!response.ok) {
      throw new RemoteConnectionError(`GitHub request failed: ${url} (HTTP ${response.status})`, {
        url,
        status: response.status
      });
    }
    return response;
  }
}
