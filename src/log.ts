import pino from 'pino';
import { PrettyTransform } from 'pretty-json-log';
import { PassThrough } from 'stream';
import { ulid } from 'ulid';

export const outputStream = new PassThrough();
/** Correlation id for every log line of this invocation */
export const RunId = ulid();
const prettyTransform = new PrettyTransform();

export const logger = pino(outputStream).child({ id: RunId });
export type LogType = pino.Logger;

if (process.stdout.isTTY) {
  outputStream.pipe(PrettyTransform.stream(process.stdout, prettyTransform));
} else {
  outputStream.pipe(process.stdout);
}

/** Show trace and debug output, both in the raw and the pretty printed stream */
export function setVerbose(isVerbose: boolean): void {
  if (!isVerbose) return;
  prettyTransform.pretty.level = 10;
  logger.level = 'trace';
}

setVerbose(process.argv.includes('--verbose'));
