import { promises as fs } from 'fs';
import * as path from 'path';
import { HubFetchError } from '../errors';
import { formatSize, splitHubSource } from '../filename';
import { isFsError, moveFile, pathExists } from '../fs.util';
import { LogType } from '../log';
import { HubResource } from '../manifest';
import { FetchStrategy, refOf } from './types';

/**
 * Put a cached hub file at `destination`, either as a link into the cache or as a full copy.
 *
 * Links fall back to a copy when the platform refuses to create them (eg Windows without
 * developer mode).
 */
export async function placeCachedFile(
  cached: string,
  destination: string,
  noSymlinks: boolean,
  logger: LogType,
): Promise<'link' | 'copy'> {
  await fs.rm(destination, { force: true });
  if (noSymlinks) {
    await fs.copyFile(cached, destination);
    return 'copy';
  }
  const blob = await fs.realpath(cached);
  try {
    await fs.symlink(blob, destination);
    return 'link';
  } catch (e) {
    if (!isFsError(e) || e.code !== 'EPERM') throw e;
    logger.warn({ path: destination, blob }, 'Hub:Symlink:Unsupported');
    await fs.copyFile(blob, destination);
    return 'copy';
  }
}

export const fetchHub: FetchStrategy<Readonly<HubResource>> = async (resource, installTo, ctx) => {
  const ref = refOf(resource);
  const source = splitHubSource(resource.src);
  if (source == null) {
    const err = new Error('Hub sources must look like "owner/repo/path/to/file"');
    return { status: 'failed', error: new HubFetchError(ref, resource.src, err) };
  }

  const destination = path.join(installTo, source.repoFileName);
  const renamed = resource.renameTo == null ? null : path.join(installTo, resource.renameTo);

  if (renamed != null && (await pathExists(renamed))) {
    ctx.logger.info({ ...ref, file: source.repoFileName, path: renamed }, 'Hub:Skip:AlreadyExists');
    return { status: 'skipped', path: renamed };
  }

  ctx.logger.debug({ ...ref, repoId: source.repoId, file: source.repoFilePath, revision: resource.revision }, 'Hub:Fetch');
  try {
    const cached = await ctx.hub.fetch(source.repoId, source.repoFilePath, resource.revision);
    const mode = await placeCachedFile(cached, destination, ctx.noSymlinks, ctx.logger);

    const target = renamed ?? destination;
    if (renamed != null) await moveFile(destination, renamed);

    const stat = await fs.stat(target);
    ctx.logger.info({ ...ref, path: target, mode, size: formatSize(stat.size) }, 'Hub:Done');
    return { status: 'installed', path: target };
  } catch (err) {
    return { status: 'failed', error: new HubFetchError(ref, resource.src, err) };
  }
};
