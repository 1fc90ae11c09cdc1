/**
 * Raw manifest assets shipped with the package under `assets/components`.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { App, Chart, Include, Yaml } from 'cdk8s';

/**
 * Locate the `assets` directory: beside the package sources, or beside the
 * workspace root when running from a build output directory.
 */
export function findAssetsDir(start: string = __dirname): string | undefined {
  let dir = start;
  for (;;) {
    for (const candidate of [path.join(dir, 'assets'), path.join(dir, 'packages', 'keelson', 'assets')]) {
      if (fs.existsSync(path.join(candidate, 'components'))) {
        return candidate;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

function walkYamlFiles(root: string, dir: string = root): string[] {
  const files: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...walkYamlFiles(root, full));
    } else if (entry.isFile() && /\.ya?ml$/.test(entry.name)) {
      files.push(path.relative(root, full));
    }
  }
  return files;
}

/**
 * Load every YAML file under `dir` through cdk8s and serialize it again,
 * keyed by its path relative to `dir` (always with forward slashes).
 */
export function renderManifestDir(dir: string): Record<string, string> {
  const chart = new Chart(new App(), 'assets');
  const manifests: Record<string, string> = {};

  walkYamlFiles(dir).forEach((file, index) => {
    const include = new Include(chart, `file-${index}`, { url: path.join(dir, file) });
    const docs: unknown[] = include.apiObjects.map((object) => object.toJson());
    manifests[file.split(path.sep).join('/')] = Yaml.stringify(...docs);
  });

  return manifests;
}
