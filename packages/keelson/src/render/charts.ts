/**
 * Packaged charts: where a component's chart comes from and how it is
 * templated into manifests.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { App, Chart, Helm } from 'cdk8s';
import { parse } from 'yaml';
import { z } from 'zod';
import { ChartLoadError, describeError } from '../core/errors';
import { chartObjects, manifestsFromObjects, type ManifestSet } from './manifests';

export interface ChartReference {
  /** Chart name in `repository`, or a path to a chart directory. */
  chart: string;
  repository?: string;
  version?: string;
}

export interface ChartRenderRequest {
  chart: ChartReference;
  releaseName: string;
  namespace: string;
  values: Record<string, unknown>;
}

/** Templates a chart with values into manifests. Throws on failure. */
export interface ChartRenderer {
  render(request: ChartRenderRequest): ManifestSet;
}

const chartFileSchema = z.object({
  apiVersion: z.string().optional(),
  name: z.string().min(1),
  version: z.string().min(1),
});

/**
 * Resolves the chart for a component. A chart directory at
 * `<chartsDir>/<component>` wins over the component's remote default.
 */
export class ChartLoader {
  constructor(private readonly chartsDir?: string) {}

  load(component: string, fallback: ChartReference): ChartReference {
    if (!this.chartsDir) {
      return fallback;
    }

    const dir = path.resolve(this.chartsDir, component);
    const chartFile = path.join(dir, 'Chart.yaml');
    if (!fs.existsSync(chartFile)) {
      return fallback;
    }

    let parsed: unknown;
    try {
      parsed = parse(fs.readFileSync(chartFile, 'utf-8'));
    } catch (error) {
      throw new ChartLoadError(`reading ${chartFile}: ${describeError(error)}`, { cause: error });
    }

    const result = chartFileSchema.safeParse(parsed);
    if (!result.success) {
      const problems = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ChartLoadError(`invalid ${chartFile}: ${problems.join('; ')}`);
    }

    return { chart: dir, version: result.data.version };
  }
}

/**
 * Runs `helm template` through the cdk8s Helm construct and splits the
 * result into one file per object.
 */
export class HelmChartRenderer implements ChartRenderer {
  constructor(private readonly helmExecutable = 'helm') {}

  render(request: ChartRenderRequest): ManifestSet {
    const chart = new Chart(new App(), request.releaseName);
    new Helm(chart, 'helm', {
      chart: request.chart.chart,
      releaseName: request.releaseName,
      namespace: request.namespace,
      values: request.values,
      helmExecutable: this.helmExecutable,
      // Versions only select from a repository; a local chart directory is used as-is.
      ...(request.chart.repository ? { repo: request.chart.repository } : {}),
      ...(request.chart.repository && request.chart.version ? { version: request.chart.version } : {}),
    });
    return manifestsFromObjects(chartObjects(chart));
  }
}
