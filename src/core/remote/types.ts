/**
 * Contract between the resolver and a formula hosting provider.
 */

export interface RemoteTag {
  name: string;
  commitSha: string;
}

export interface RemoteBranch {
  name: string;
  commitSha: string;
}

export interface RemoteCommit {
  sha: string;
}

export interface RemoteRepository {
  /** Throws RemoteConnectionError when no credential is configured. */
  ensureAuthenticated(): Promise<void>;

  listTags(organisation: string, name: string): Promise<RemoteTag[]>;

  /** Null when the branch does not exist. */
  getBranch(organisation: string, name: string, branch: string): Promise<RemoteBranch | null>;

  /** Null when the ref does not name a commit. */
  getCommit(organisation: string, name: string, ref: string): Promise<RemoteCommit | null>;

  /** Raw file contents at a ref, or null when the file is absent. */
  fetchFile(organisation: string, name: string, ref: string, path: string): Promise<string | null>;
}
