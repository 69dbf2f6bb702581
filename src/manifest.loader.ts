import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ManifestError } from './errors';
import { LogType } from './log';
import { Manifest, Resource, ResourceGroup, ResourceType, ResourceTypes } from './manifest';

export const ManifestFileName = 'zoo.yaml';

/** YAML happily turns `version: 1.0` or a numeric commit into a number, keep them as text */
const Scalar = z.union([z.string(), z.number()]).transform((v) => String(v));

const ManifestShape = z.object({
  name: Scalar,
  version: Scalar.nullish(),
  resources: z.record(z.string(), z.array(z.unknown()).nullable()).nullable(),
  scripts: z.record(z.string(), z.string()).nullish(),
});

/** Keys every resource needs, reported missing in this order */
const RequiredResourceKeys = ['name', 'src', 'type', 'install_to'] as const;

const ResourceShape = z.object({
  name: Scalar,
  src: z.string(),
  type: z.string(),
  install_to: z.string(),
  revision: Scalar.nullish(),
  rename_to: z.string().nullish(),
  api_key: z.string().nullish(),
});
type ResourceShape = z.infer<typeof ResourceShape>;

export type ValidationResult = { ok: true; manifest: Manifest } | { ok: false; error: ManifestError };

const KnownTypes: ReadonlySet<string> = new Set(ResourceTypes);

function isResourceType(t: string): t is ResourceType {
  return KnownTypes.has(t);
}

function isMapping(doc: unknown): doc is Record<string, unknown> {
  return typeof doc === 'object' && doc != null && !Array.isArray(doc);
}

/** Convert the first schema issue into a message naming the offending key */
function describeIssue(issue: z.ZodIssue, where: string): string {
  const key = String(issue.path[0] ?? '');
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    return `${where} must have '${key}' attribute`;
  }
  if (issue.path.length === 0) return `${where} must be a mapping`;
  if (key === 'resources' && issue.path.length > 1) {
    return `Group '${String(issue.path[1])}' must be a list of resources`;
  }
  if (key === 'scripts' && issue.path.length > 1) {
    return `Script '${String(issue.path[1])}' must be a shell command string`;
  }
  return `${where} has an invalid '${key}' attribute: ${issue.message}`;
}

function toResource(group: string, r: ResourceShape, type: ResourceType): Resource {
  const base = { group, name: r.name, src: r.src, installTo: r.install_to };
  const revision = r.revision ?? undefined;
  const renameTo = r.rename_to ?? undefined;
  switch (type) {
    case 'huggingface':
      return { ...base, type, revision, renameTo };
    case 'git':
      return { ...base, type, revision, renameTo };
    case 'download':
      return { ...base, type, renameTo, revision, apiKey: r.api_key ?? undefined };
  }
}

export class ManifestLoader {
  /**
   * Validate a parsed zoo.yaml document.
   *
   * Stops at the first problem found: top level `name`, then `resources`, then each resource in
   * declaration order checking `name`, `src`, `type` and `install_to` before the type itself.
   */
  static validate(doc: unknown, path: string): ValidationResult {
    const fail = (msg: string): ValidationResult => ({ ok: false, error: new ManifestError(msg, path) });

    if (doc == null) return fail('Manifest is empty');
    if (!isMapping(doc)) return fail('Manifest must be a mapping of keys');
    if (doc['name'] == null) return fail("Manifest is missing 'name'");
    if (!('resources' in doc)) return fail("Manifest is missing 'resources'");

    const top = ManifestShape.safeParse(doc);
    if (!top.success) return fail(describeIssue(top.error.issues[0], 'Manifest'));

    const groups: ResourceGroup[] = [];
    for (const [groupName, entries] of Object.entries(top.data.resources ?? {})) {
      const resources: Resource[] = [];
      const list = entries ?? [];
      for (let i = 0; i < list.length; i++) {
        const raw = list[i];
        const label = isMapping(raw) && typeof raw['name'] === 'string' ? ` "${raw['name']}"` : '';
        const where = `Resource ${groupName}[${i}]${label}`;

        if (!isMapping(raw)) return fail(`${where} must be a mapping`);
        const missing = RequiredResourceKeys.find((key) => raw[key] == null);
        if (missing != null) return fail(`${where} must have '${missing}' attribute`);

        const res = ResourceShape.safeParse(raw);
        if (!res.success) return fail(describeIssue(res.error.issues[0], where));
        if (!isResourceType(res.data.type)) return fail(`Unknown resource type: ${res.data.type} (${where})`);
        resources.push(toResource(groupName, res.data, res.data.type));
      }
      groups.push({ name: groupName, resources });
    }

    return {
      ok: true,
      manifest: {
        path,
        name: top.data.name,
        version: top.data.version ?? undefined,
        groups,
        scripts: top.data.scripts ?? {},
      },
    };
  }

  /** Parse YAML text into a validated manifest */
  static parse(text: string, path: string): Manifest {
    let doc: unknown;
    try {
      doc = yaml.load(text, { filename: path });
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ManifestError(`Manifest is not valid YAML: ${reason}`, path);
    }
    const result = ManifestLoader.validate(doc, path);
    if (!result.ok) throw result.error;
    return result.manifest;
  }

  static async load(fileName: string, log: LogType): Promise<Manifest> {
    let text: string;
    try {
      text = await fs.readFile(fileName, 'utf8');
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ManifestError(`Unable to read manifest: ${reason}`, fileName);
    }
    const manifest = ManifestLoader.parse(text, fileName);
    log.debug(
      { path: fileName, name: manifest.name, groups: manifest.groups.length, scripts: Object.keys(manifest.scripts) },
      'Manifest:Loaded',
    );
    return manifest;
  }
}
