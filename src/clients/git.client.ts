import { simpleGit } from 'simple-git';

/** The git operations the installer needs, all run against a working directory */
export interface GitClient {
  clone(url: string, dest: string, recursive: boolean): Promise<void>;
  /** Pull the default branch of `origin` */
  pull(repo: string): Promise<void>;
  checkout(repo: string, revision: string): Promise<void>;
  submoduleUpdate(repo: string, recursive: boolean): Promise<void>;
  headCommit(repo: string): Promise<string>;
}

export class SimpleGitClient implements GitClient {
  async clone(url: string, dest: string, recursive: boolean): Promise<void> {
    await simpleGit().clone(url, dest, recursive ? ['--recursive'] : []);
  }

  async pull(repo: string): Promise<void> {
    await simpleGit(repo).pull('origin');
  }

  async checkout(repo: string, revision: string): Promise<void> {
    await simpleGit(repo).checkout(revision);
  }

  async submoduleUpdate(repo: string, recursive: boolean): Promise<void> {
    await simpleGit(repo).submoduleUpdate(recursive ? ['--init', '--recursive'] : ['--init']);
  }

  async headCommit(repo: string): Promise<string> {
    const hash = await simpleGit(repo).revparse(['HEAD']);
    return hash.trim();
  }
}
