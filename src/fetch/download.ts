import { createWriteStream, promises as fs } from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { msSince } from '../commands/common';
import { DownloadError, DownloadFailureReason, ResourceRef } from '../errors';
import { filenameFromHeaders, formatSize, slugify } from '../filename';
import { isFsError, moveFile, pathExists } from '../fs.util';
import { LogType } from '../log';
import { DownloadResource } from '../manifest';
import { FetchResult, FetchStrategy, InstallContext, refOf } from './types';

/** Some hosts refuse requests that do not look like they come from a browser */
export const UserAgent =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.134 Safari/537.36';

const HtmlContentTypes = ['text/html', 'application/xhtml+xml'];
const PartialExtension = '.part';
const ProgressIntervalMs = 1_000;

export const Hints = {
  html:
    'Received a web page instead of a file, the download probably needs authentication. ' +
    'For Civitai add "api_key: <your Civitai api key>" to the resource',
  auth: 'The server refused the request, add an "api_key" to the resource',
};

/** Name the file is stored under before any header is seen, derived from the last segment of `src` */
export function downloadFileName(src: string): string {
  return slugify(path.posix.basename(src)) || 'download';
}

function fail(ref: ResourceRef, reason: DownloadFailureReason, msg: string, opts?: ConstructorParameters<typeof DownloadError>[3]): FetchResult {
  return { status: 'failed', error: new DownloadError(ref, reason, msg, opts) };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Pass through stream that logs transfer progress at most once every `ProgressIntervalMs` */
function progressLogger(logger: LogType, ref: ResourceRef, file: string, total: number | null): Transform {
  let bytes = 0;
  let lastTick = performance.now();
  return new Transform({
    transform(chunk: Buffer, _encoding, callback): void {
      bytes += chunk.length;
      if (msSince(lastTick) >= ProgressIntervalMs) {
        lastTick = performance.now();
        const percent = total == null ? undefined : ((bytes / total) * 100).toFixed(1);
        logger.info({ ...ref, file, bytes, total, percent, size: formatSize(bytes) }, 'Download:Progress');
      }
      callback(null, chunk);
    },
  });
}

async function writeBody(response: Response, target: string, progress: Transform): Promise<void> {
  const output = createWriteStream(target);
  if (response.body == null) {
    await pipeline(Readable.from([]), output);
    return;
  }
  await pipeline(Readable.fromWeb(response.body), progress, output);
}

async function download(resource: Readonly<DownloadResource>, installTo: string, ctx: InstallContext): Promise<FetchResult> {
  const ref = refOf(resource);
  const filename = downloadFileName(resource.src);
  const destination = path.join(installTo, filename);
  const renamed = resource.renameTo == null ? null : path.join(installTo, resource.renameTo);
  ctx.logger.debug({ ...ref, src: resource.src, filename }, 'Download:Resolve');

  if ((await pathExists(destination)) || (renamed != null && (await pathExists(renamed)))) {
    ctx.logger.info({ ...ref, file: filename, path: renamed ?? destination }, 'Download:Skip:AlreadyExists');
    return { status: 'skipped', path: renamed ?? destination };
  }

  const headers: Record<string, string> = { 'User-Agent': UserAgent };
  if (resource.apiKey != null) headers['Authorization'] = `Bearer ${resource.apiKey}`;

  let response: Response;
  try {
    response = await ctx.http.get(resource.src, headers);
  } catch (err) {
    return fail(ref, 'network', `Error downloading file: ${errorMessage(err)}`, { cause: err });
  }

  if (!response.ok) {
    await response.body?.cancel();
    const hint = response.status === 401 || response.status === 403 ? Hints.auth : undefined;
    return fail(ref, 'status', `Server responded with ${response.status} ${response.statusText}`.trim(), {
      status: response.status,
      hint,
    });
  }

  const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
  if (HtmlContentTypes.some((t) => contentType.includes(t))) {
    await response.body?.cancel();
    return fail(ref, 'html', 'Received HTML response instead of file', { status: response.status, hint: Hints.html });
  }

  const disposition = response.headers.get('content-disposition');
  const finalName = filenameFromHeaders(response.headers) ?? filename;
  const target = path.join(installTo, finalName);
  const partial = target + PartialExtension;
  const length = Number(response.headers.get('content-length'));
  const total = Number.isFinite(length) && length > 0 ? length : null;
  ctx.logger.info({ ...ref, file: finalName, disposition, total }, 'Download:Start');

  const startTime = performance.now();
  try {
    await writeBody(response, partial, progressLogger(ctx.logger, ref, finalName, total));
    await moveFile(partial, target);
  } catch (err) {
    await fs.rm(partial, { force: true });
    if (isFsError(err)) return fail(ref, 'write', `Error writing file: ${err.message}`, { cause: err });
    return fail(ref, 'network', `Error downloading file: ${errorMessage(err)}`, { cause: err });
  }

  const stat = await fs.stat(target);
  ctx.logger.info(
    { ...ref, path: target, size: formatSize(stat.size), duration: msSince(startTime) },
    'Download:Done',
  );

  if (renamed == null) return { status: 'installed', path: target };
  await moveFile(target, renamed);
  ctx.logger.info({ ...ref, from: target, path: renamed }, 'Download:Renamed');
  return { status: 'installed', path: renamed };
}

/**
 * Download `src` over HTTP into `installTo`.
 *
 * Never throws, every failure is returned as a `DownloadError`.
 */
export const fetchDownload: FetchStrategy<Readonly<DownloadResource>> = async (resource, installTo, ctx) => {
  const ref = refOf(resource);
  if (resource.revision != null) {
    ctx.logger.warn({ ...ref, revision: resource.revision }, 'Download:RevisionUnsupported');
  }

  let result: FetchResult;
  try {
    result = await download(resource, installTo, ctx);
  } catch (err) {
    result = fail(ref, 'unexpected', `Unexpected error: ${errorMessage(err)}`, { cause: err });
  }

  if (result.status === 'failed') {
    const error = result.error;
    const hint = error instanceof DownloadError ? error.hint : undefined;
    ctx.logger.error({ ...ref, src: resource.src, err: error, hint }, 'Download:Failed');
  }
  return result;
};
