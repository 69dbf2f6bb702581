import * as path from 'path';
import { GitError } from '../errors';
import { repoNameFromSrc } from '../filename';
import { pathExists } from '../fs.util';
import { GitResource } from '../manifest';
import { FetchStrategy, refOf } from './types';

/**
 * Clone or update a repository at `installTo/<repo name>`.
 *
 * A missing repository is cloned recursively first. A pinned revision is then checked out,
 * otherwise the default branch is pulled. Submodules are always updated afterwards.
 */
export const fetchGit: FetchStrategy<Readonly<GitResource>> = async (resource, installTo, ctx) => {
  const ref = refOf(resource);
  const { src, revision } = resource;
  const repoPath = path.join(installTo, repoNameFromSrc(src));
  const git = ctx.git;

  if (resource.renameTo != null) {
    ctx.logger.warn({ ...ref, renameTo: resource.renameTo }, 'Git:RenameUnsupported');
  }

  try {
    const exists = await pathExists(repoPath);
    if (!exists) {
      ctx.logger.info({ ...ref, src, path: repoPath }, 'Git:Clone');
      await git.clone(src, repoPath, true);
    }

    if (revision != null) await git.checkout(repoPath, revision);
    else await git.pull(repoPath);
    await git.submoduleUpdate(repoPath, true);

    const commit = await git.headCommit(repoPath);
    ctx.logger.info(
      { ...ref, path: repoPath, commit, revision, cloned: !exists },
      revision == null ? 'Git:Pull' : 'Git:Checkout',
    );
    ctx.logger.debug({ ...ref, path: repoPath }, 'Git:Submodules:Updated');
    return { status: 'installed', path: repoPath };
  } catch (err) {
    return { status: 'failed', error: new GitError(ref, src, revision, err) };
  }
};
