import { downloadFileToCacheDir } from '@huggingface/hub';

/** Fetches single files out of hub repositories */
export interface HubClient {
  /**
   * Download `filePath` from `repoId` into the local hub cache, reusing a cached copy when the
   * revision has not changed.
   *
   * @returns location of the file inside the cache
   */
  fetch(repoId: string, filePath: string, revision?: string): Promise<string>;
}

export interface HuggingFaceHubClientOptions {
  accessToken?: string;
  cacheDir?: string;
  /** Replaces the global fetch for every request made to the hub */
  fetch?: typeof fetch;
}

export class HuggingFaceHubClient implements HubClient {
  accessToken?: string;
  cacheDir?: string;
  private readonly fetchFn?: typeof fetch;

  constructor(opts: HuggingFaceHubClientOptions = {}) {
    this.accessToken = opts.accessToken;
    this.cacheDir = opts.cacheDir;
    this.fetchFn = opts.fetch;
  }

  fetch(repoId: string, filePath: string, revision?: string): Promise<string> {
    return downloadFileToCacheDir({
      repo: { type: 'model', name: repoId },
      path: filePath,
      revision,
      cacheDir: this.cacheDir,
      accessToken: this.accessToken,
      fetch: this.fetchFn,
    });
  }
}
