import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GitClient } from '../clients/git.client';
import { HttpClient } from '../clients/http.client';
import { HubClient } from '../clients/hub.client';
import { InstallContext } from '../fetch/types';
import { logger } from '../log';

logger.level = 'silent';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'zoo-test-'));
}

/** Remote repository state shared by every clone made through a `FakeGit` */
export class FakeGit implements GitClient {
  /** Commit the remote default branch points at */
  remoteHead: string;
  /** Operations in the order they were run */
  calls: string[] = [];
  heads = new Map<string, string>();
  failOn: string | null = null;

  constructor(remoteHead = '1111111111111111111111111111111111111111') {
    this.remoteHead = remoteHead;
  }

  private record(op: string): void {
    this.calls.push(op);
    if (this.failOn === op.split(':')[0]) throw new Error(`${op} failed`);
  }

  async clone(url: string, dest: string, recursive: boolean): Promise<void> {
    this.record(`clone:${url}:${recursive ? 'recursive' : 'flat'}`);
    await fs.mkdir(path.join(dest, '.git'), { recursive: true });
    this.heads.set(dest, this.remoteHead);
  }

  async pull(repo: string): Promise<void> {
    this.record('pull');
    this.heads.set(repo, this.remoteHead);
  }

  async checkout(repo: string, revision: string): Promise<void> {
    this.record(`checkout:${revision}`);
    this.heads.set(repo, revision);
  }

  async submoduleUpdate(_repo: string, recursive: boolean): Promise<void> {
    this.record(`submodule:${recursive ? 'recursive' : 'flat'}`);
  }

  async headCommit(repo: string): Promise<string> {
    const head = this.heads.get(repo);
    if (head == null) throw new Error(`not a git repository: ${repo}`);
    return head;
  }
}

/** Hub client serving files out of a folder standing in for the hub cache */
export class FakeHub implements HubClient {
  cacheDir: string;
  requests: { repoId: string; filePath: string; revision?: string }[] = [];
  /** Delay before a fetch resolves, used to observe overlapping fetches */
  delayMs = 0;
  active = 0;
  maxActive = 0;

  constructor(cacheDir: string) {
    this.cacheDir = cacheDir;
  }

  async fetch(repoId: string, filePath: string, revision?: string): Promise<string> {
    this.requests.push({ repoId, filePath, revision });
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      const cached = path.join(this.cacheDir, repoId.replace('/', '--'), filePath);
      await fs.mkdir(path.dirname(cached), { recursive: true });
      await fs.writeFile(cached, `weights of ${repoId}/${filePath}`);
      return cached;
    } finally {
      this.active--;
    }
  }
}

/** HTTP client answering from a table of canned responses */
export class FakeHttp implements HttpClient {
  routes = new Map<string, () => Response>();
  requests: { url: string; headers: Record<string, string> }[] = [];

  on(url: string, body: string | null, init: ResponseInit = {}): this {
    this.routes.set(url, () => new Response(body, init));
    return this;
  }

  async get(url: string, headers: Record<string, string>): Promise<Response> {
    this.requests.push({ url, headers });
    const route = this.routes.get(url);
    if (route == null) throw new TypeError('fetch failed');
    return route();
  }
}

export function makeContext(parts: Partial<InstallContext> & { cacheDir?: string } = {}): InstallContext {
  return {
    logger,
    hub: parts.hub ?? new FakeHub(parts.cacheDir ?? os.tmpdir()),
    git: parts.git ?? new FakeGit(),
    http: parts.http ?? new FakeHttp(),
    noSymlinks: parts.noSymlinks ?? false,
  };
}
