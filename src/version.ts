import * as fs from 'fs';
import { join } from 'path';

const RootDir = join(__dirname, '..');

function getGitHash(): string | null {
  const path = join(RootDir, '.git', 'HEAD');
  if (!fs.existsSync(path)) return null;
  const rev = fs.readFileSync(path).toString().trim();
  if (rev.indexOf(':') === -1) return rev;
  const refPath = join(RootDir, '.git', rev.substring(5).trim());
  if (!fs.existsSync(refPath)) return null;
  return fs.readFileSync(refPath).toString().trim();
}

function getPackageVersion(): string | null {
  const path = join(RootDir, 'package.json');
  if (!fs.existsSync(path)) return null;
  const pkg: unknown = JSON.parse(fs.readFileSync(path).toString());
  if (typeof pkg !== 'object' || pkg == null || !('version' in pkg)) return null;
  return typeof pkg.version === 'string' ? pkg.version : null;
}

export interface VersionInfo {
  hash: string | null;
  version: string | null;
}

let _version: VersionInfo | null = null;
export function getVersion(): VersionInfo {
  if (_version == null) _version = { hash: getGitHash(), version: getPackageVersion() };
  return _version;
}
