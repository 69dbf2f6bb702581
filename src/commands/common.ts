import { boolean, extendType, flag, number, option, string } from 'cmd-ts';
import { performance } from 'perf_hooks';
import { ManifestFileName } from '../manifest.loader';

export const verbose = flag({
  long: 'verbose',
  type: boolean,
  defaultValue: () => false,
  description: 'Verbose logging',
});
export const file = option({
  long: 'file',
  short: 'f',
  type: string,
  defaultValue: () => ManifestFileName,
  defaultValueIsSerializable: true,
  description: 'Manifest file to use',
});

const PositiveInteger = extendType(number, {
  displayName: 'count',
  async from(n) {
    if (!Number.isInteger(n) || n < 1) throw new Error(`Expected a whole number of at least 1, got ${n}`);
    return n;
  },
});
export const concurrency = option({
  long: 'concurrency',
  type: PositiveInteger,
  defaultValue: () => 1,
  defaultValueIsSerializable: true,
  description: 'Number of resources to fetch at the same time',
});

/** Track ms since a performance.now() call limited to 4dp */
export function msSince(lastTick: number): number {
  return Number((performance.now() - lastTick).toFixed(4));
}
