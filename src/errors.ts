import { ResourceType } from './manifest';

/** Identifies the resource an error belongs to */
export interface ResourceRef {
  group: string;
  name: string;
  type: ResourceType;
}

function describe(ref: ResourceRef): string {
  return `${ref.group}/${ref.name}`;
}

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/** The manifest could not be read or does not follow the zoo.yaml schema */
export class ManifestError extends Error {
  /** Path of the manifest file, when it was loaded from disk */
  path?: string;

  constructor(msg: string, path?: string) {
    super(path == null ? msg : `${msg} (${path})`);
    this.name = this.constructor.name;
    this.path = path;
  }
}

export class HubFetchError extends Error {
  readonly kind = 'hub';
  resource: ResourceRef;
  cause: unknown;

  constructor(resource: ResourceRef, src: string, cause: unknown) {
    super(`Failed to fetch "${src}" from the hub for ${describe(resource)}: ${causeMessage(cause)}`);
    this.name = this.constructor.name;
    this.resource = resource;
    this.cause = cause;
  }
}

export class GitError extends Error {
  readonly kind = 'git';
  resource: ResourceRef;
  src: string;
  revision?: string;
  cause: unknown;

  constructor(resource: ResourceRef, src: string, revision: string | undefined, cause: unknown) {
    const at = revision == null ? '' : ` at revision "${revision}"`;
    super(`Git failed for "${src}"${at} (${describe(resource)}): ${causeMessage(cause)}`);
    this.name = this.constructor.name;
    this.resource = resource;
    this.src = src;
    this.revision = revision;
    this.cause = cause;
  }
}

export type DownloadFailureReason = 'network' | 'status' | 'html' | 'write' | 'unexpected';

export class DownloadError extends Error {
  readonly kind = 'download';
  resource: ResourceRef;
  reason: DownloadFailureReason;
  /** Remediation shown to the user alongside the failure */
  hint?: string;
  /** HTTP status, when the server answered */
  status?: number;
  cause: unknown;

  constructor(
    resource: ResourceRef,
    reason: DownloadFailureReason,
    msg: string,
    opts: { hint?: string; status?: number; cause?: unknown } = {},
  ) {
    super(`${msg} (${describe(resource)})`);
    this.name = this.constructor.name;
    this.resource = resource;
    this.reason = reason;
    this.hint = opts.hint;
    this.status = opts.status;
    this.cause = opts.cause;
  }
}

/** Errors a fetch strategy can report for a single resource */
export type FetchError = HubFetchError | GitError | DownloadError;
