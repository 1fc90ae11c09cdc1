import { ApiObject, App, Chart, Yaml } from 'cdk8s';

/** Relative file path → YAML text. Keys are inserted in sorted order. */
export type ManifestSet = Record<string, string>;

interface ObjectIdentity {
  kind: string;
  name: string;
}

function identity(object: unknown): ObjectIdentity | undefined {
  if (object === null || typeof object !== 'object') {
    return undefined;
  }
  const kind = 'kind' in object ? object.kind : undefined;
  const metadata = 'metadata' in object ? object.metadata : undefined;
  const name =
    metadata !== null && typeof metadata === 'object' && 'name' in metadata ? metadata.name : undefined;
  if (typeof kind !== 'string' || typeof name !== 'string') {
    return undefined;
  }
  return { kind, name };
}

/** `Deployment` named `contour` → `deployment-contour.yaml`. */
export function manifestFileName(object: unknown, index: number): string {
  const id = identity(object);
  if (!id) {
    return `object-${index}.yaml`;
  }
  const slug = `${id.kind}-${id.name}`.toLowerCase().replace(/[^a-z0-9.-]+/g, '-');
  return `${slug}.yaml`;
}

export function sortManifests(manifests: ManifestSet): ManifestSet {
  const sorted: ManifestSet = {};
  for (const key of Object.keys(manifests).sort()) {
    const value = manifests[key];
    if (value !== undefined) {
      sorted[key] = value;
    }
  }
  return sorted;
}

/**
 * Group rendered Kubernetes objects into files, one per kind and name.
 * Objects sharing a file name (same kind and name in different namespaces)
 * become a multi-document file in the order they were rendered.
 */
export function manifestsFromObjects(objects: readonly unknown[]): ManifestSet {
  const files = new Map<string, unknown[]>();
  objects.forEach((object, index) => {
    const file = manifestFileName(object, index);
    const docs = files.get(file) ?? [];
    docs.push(object);
    files.set(file, docs);
  });

  const manifests: ManifestSet = {};
  for (const [file, docs] of files) {
    manifests[file] = Yaml.stringify(...docs);
  }
  return sortManifests(manifests);
}

/** Object JSON for every API object under a chart, in synthesis order. */
export function chartObjects(chart: Chart): unknown[] {
  const objects: unknown[] = chart.toJson();
  return objects;
}

export const SYSTEM_NAMESPACES: readonly string[] = ['default', 'kube-system'];

export function namespaceManifest(name: string, labels: Record<string, string>): string {
  const chart = new Chart(new App(), 'namespace');
  new ApiObject(chart, 'namespace', {
    apiVersion: 'v1',
    kind: 'Namespace',
    metadata: {
      name,
      ...(Object.keys(labels).length > 0 ? { labels } : {}),
    },
  });
  return Yaml.stringify(...chartObjects(chart));
}
