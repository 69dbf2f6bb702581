import { promises as fs } from 'fs';
import pLimit from 'p-limit';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { msSince } from './commands/common';
import { DownloadError, FetchError } from './errors';
import { fetchDownload } from './fetch/download';
import { fetchGit } from './fetch/git';
import { fetchHub } from './fetch/hub';
import { FetchResult, InstallContext } from './fetch/types';
import { Manifest, Resource } from './manifest';
import { Tracer } from './tracer';

export interface InstallOptions {
  /** Copy hub files instead of linking them to the cache */
  noSymlinks: boolean;
  /** Resources fetched at the same time, resources sharing a target folder never overlap */
  concurrency: number;
}

export type InstallDeps = Omit<InstallContext, 'noSymlinks'>;

export interface InstallSummary {
  /** Resources declared in the manifest */
  total: number;
  /** Resources completed, either fetched or already present */
  count: number;
  installed: number;
  skipped: number;
  /** A download failed and the remaining resources were not started */
  halted: boolean;
  failure?: DownloadError;
}

function dispatch(resource: Resource, installTo: string, ctx: InstallContext): Promise<FetchResult> {
  switch (resource.type) {
    case 'huggingface':
      return fetchHub(resource, installTo, ctx);
    case 'git':
      return fetchGit(resource, installTo, ctx);
    case 'download':
      return fetchDownload(resource, installTo, ctx);
  }
}

/**
 * Install every resource of a manifest, in declaration order.
 *
 * Failure policy differs by resource type: a failed download stops the run and the partial summary
 * is returned, while hub and git failures are thrown.
 */
export async function install(manifest: Manifest, opts: InstallOptions, deps: InstallDeps): Promise<InstallSummary> {
  const ctx: InstallContext = { ...deps, noSymlinks: opts.noSymlinks };
  const { logger } = ctx;
  const startTime = performance.now();

  const queue = manifest.groups.flatMap((g) => g.resources);
  const summary: InstallSummary = { total: queue.length, count: 0, installed: 0, skipped: 0, halted: false };
  logger.info(
    { path: manifest.path, name: manifest.name, version: manifest.version ?? 'N/A', total: queue.length },
    'Install:Start',
  );

  let stopped = false;
  const Q = pLimit(Math.max(1, opts.concurrency));
  /** Last task scheduled for each target folder */
  const folders = new Map<string, Promise<unknown>>();

  const installOne = async (resource: Resource, index: number): Promise<void> => {
    if (stopped) return;
    const installTo = path.resolve(resource.installTo);
    const { group, name, type } = resource;
    logger.info({ index: index + 1, total: queue.length, group, name, type, installTo }, 'Resource:Start');
    await fs.mkdir(installTo, { recursive: true });

    const span = Tracer.startSpan('install:' + resource.name);
    span.setAttribute('group', resource.group);
    span.setAttribute('type', resource.type);
    let result: FetchResult;
    try {
      result = await dispatch(resource, installTo, ctx);
      span.setAttribute('status', result.status);
    } finally {
      span.end();
    }

    if (result.status !== 'failed') {
      summary[result.status]++;
      summary.count++;
      return;
    }
    stopped = true;
    const error: FetchError = result.error;
    if (error instanceof DownloadError) {
      summary.halted = true;
      summary.failure = error;
      return;
    }
    throw error;
  };

  const tasks = queue.map((resource, index) => {
    const folder = path.resolve(resource.installTo);
    const previous = folders.get(folder);
    const task = Q(async () => {
      // Failures of the previous task are reported by that task
      if (previous) await previous.catch(() => undefined);
      return installOne(resource, index);
    });
    folders.set(folder, task);
    return task;
  });
  // Resources already started run to completion before a failure is rethrown
  const settled = await Promise.allSettled(tasks);
  const rejected = settled.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (rejected != null) throw rejected.reason;

  if (summary.halted) {
    logger.warn(
      { count: summary.count, total: summary.total, err: summary.failure, hint: summary.failure?.hint },
      'Install:Halted',
    );
  } else {
    const { count, installed, skipped } = summary;
    logger.info({ count, installed, skipped, duration: msSince(startTime) }, 'Install:Done');
  }
  return summary;
}
