export const ResourceTypes = ['huggingface', 'git', 'download'] as const;
export type ResourceType = (typeof ResourceTypes)[number];

export interface Manifest {
  /** Path of the zoo.yaml this manifest was loaded from */
  path: string;
  name: string;
  version?: string;
  /** Resource groups in declaration order */
  groups: ResourceGroup[];
  scripts: Record<string, string>;
}

export interface ResourceGroup {
  name: string;
  resources: Resource[];
}

interface ResourceBase {
  /** Group the resource was declared in */
  group: string;
  name: string;
  src: string;
  /** Target directory as written in the manifest */
  installTo: string;
}

/** A single file inside a hub repository, `src` is `owner/repo/path/to/file` */
export interface HubResource extends ResourceBase {
  type: 'huggingface';
  revision?: string;
  renameTo?: string;
}

/** A git repository cloned into `installTo/<repo name>` */
export interface GitResource extends ResourceBase {
  type: 'git';
  revision?: string;
  /** Not supported for repositories, kept so it can be reported */
  renameTo?: string;
}

export interface DownloadResource extends ResourceBase {
  type: 'download';
  renameTo?: string;
  apiKey?: string;
  /** Not supported for downloads, kept so it can be reported */
  revision?: string;
}

export type Resource = Readonly<HubResource> | Readonly<GitResource> | Readonly<DownloadResource>;
