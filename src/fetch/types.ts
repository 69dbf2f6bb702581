import { GitClient } from '../clients/git.client';
import { HttpClient } from '../clients/http.client';
import { HubClient } from '../clients/hub.client';
import { FetchError, ResourceRef } from '../errors';
import { LogType } from '../log';
import { Resource } from '../manifest';

/** Everything a fetch strategy talks to, passed in so nothing reaches for module state */
export interface InstallContext {
  logger: LogType;
  hub: HubClient;
  git: GitClient;
  http: HttpClient;
  /** Copy hub files out of the cache rather than symlinking to them */
  noSymlinks: boolean;
}

export type FetchResult =
  | { status: 'installed' | 'skipped'; path: string }
  | { status: 'failed'; error: FetchError };

export type FetchStrategy<T extends Resource> = (
  resource: T,
  installTo: string,
  ctx: InstallContext,
) => Promise<FetchResult>;

export function refOf(resource: Resource): ResourceRef {
  return { group: resource.group, name: resource.name, type: resource.type };
}
