import * as path from 'path';

/**
 * Make a string safe to use as a file name on every filesystem.
 *
 * Non ASCII characters are decomposed and dropped unless `allowUnicode` is set, anything that is
 * not a word character, whitespace or hyphen is removed, runs of whitespace and hyphens become a
 * single hyphen and leading or trailing hyphens and underscores are trimmed.
 *
 * @example
 * slugify('Ünïcode Model v2.safetensors') // 'unicode-model-v2safetensors'
 */
export function slugify(value: string, allowUnicode = false): string {
  let output = allowUnicode ? value.normalize('NFKC') : value.normalize('NFKD').replace(/[^\x00-\x7f]/g, '');
  output = output.toLowerCase();
  output = allowUnicode ? output.replace(/[^\p{L}\p{N}_\s-]/gu, '') : output.replace(/[^\w\s-]/g, '');
  return output.replace(/[-\s]+/g, '-').replace(/^[-_]+|[-_]+$/g, '');
}

/** Anything that can look up a header by name, eg a fetch `Headers` object */
export interface HeaderSource {
  get(name: string): string | null;
}

function unquote(value: string): string {
  return value.trim().replace(/^"(.*)"$/, '$1').trim();
}

/** Reduce a server supplied name to a bare file name so it always lands inside the target folder */
function toBaseName(value: string): string | undefined {
  const base = value.split(/[\\/]/).pop()?.trim();
  if (base == null || base === '' || base === '.' || base === '..') return undefined;
  return base;
}

/** Decode a RFC 5987 value such as `UTF-8''na%C3%AFve.bin` */
function decodeExtended(value: string): string | undefined {
  const raw = unquote(value);
  const sep = raw.indexOf("''");
  const encoded = sep === -1 ? raw : raw.slice(sep + 2);
  try {
    return decodeURIComponent(encoded);
  } catch {
    return undefined;
  }
}

/**
 * File name a server declared through `Content-Disposition`, if any.
 *
 * `filename*=` is preferred over `filename=` when both are present.
 */
export function filenameFromHeaders(headers: HeaderSource): string | undefined {
  const disposition = headers.get('content-disposition');
  if (disposition == null) return undefined;

  const extended = /filename\*\s*=\s*([^;]+)/i.exec(disposition);
  if (extended) {
    const decoded = decodeExtended(extended[1]);
    const name = decoded == null ? undefined : toBaseName(decoded);
    if (name) return name;
  }

  const plain = /filename\s*=\s*("[^"]*"|[^;]+)/i.exec(disposition);
  if (plain == null) return undefined;
  return toBaseName(unquote(plain[1]));
}

/** `https://host/org/tool.git` -> `tool` */
export function repoNameFromSrc(src: string): string {
  const base = path.posix.basename(src.replace(/[\\/]+$/, ''));
  if (base.endsWith('.git')) return base.slice(0, -'.git'.length);
  return base;
}

export interface HubSource {
  /** `owner/repo` */
  repoId: string;
  /** Path of the file inside the repository */
  repoFilePath: string;
  repoFileName: string;
}

/** Split `owner/repo/path/to/file` into its repository and file parts */
export function splitHubSource(src: string): HubSource | null {
  const parts = src.split('/');
  if (parts.length < 3 || parts.some((p) => p === '')) return null;
  const repoFilePath = parts.slice(2).join('/');
  return { repoId: parts.slice(0, 2).join('/'), repoFilePath, repoFileName: path.posix.basename(repoFilePath) };
}

const SizeUnits = ['KB', 'MB', 'GB', 'TB'];

/** Human readable size, `1536` -> `1.5 KB` */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} bytes`;
  let value = bytes;
  let unit = 'bytes';
  for (const next of SizeUnits) {
    if (value < 1024) break;
    value = value / 1024;
    unit = next;
  }
  return `${Number(value.toFixed(2))} ${unit}`;
}
