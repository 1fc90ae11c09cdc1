/**
 * Contour - Envoy based ingress controller.
 *
 * Hosts listed in `ingress_hosts` are published on the Envoy service as an
 * ExternalDNS hostname annotation.
 *
 * @example
 * ```yaml
 * components:
 *   contour:
 *     service_type: NodePort
 *     ingress_hosts: ["*.apps.example.com"]
 *     toleration:
 *       - key: node-role
 *         operator: Equal
 *         value: ingress
 *         effect: NoSchedule
 * ```
 */
import { defineSchema, t, type Decoded } from '../../config/schema';
import { BaseComponent, namespaceLabels, type ComponentMetadata } from '../../core/component';
import type { Diagnostic } from '../../core/diagnostics';
import { inPhase } from '../../core/errors';
import type { ChartReference } from '../../render/charts';
import type { ManifestSet } from '../../render/manifests';
import {
  nodeAffinitySchema,
  renderNodeAffinity,
  renderTolerations,
  tolerationSchema,
  validateNodeAffinity,
  validateTolerations,
} from '../../render/scheduling';
import { mergeValues, parseValuesOverride, type ChartValues } from '../../render/values';
import type { ComponentDependencies } from '../dependencies';

export const CONTOUR = 'contour';
export const CONTOUR_NAMESPACE = 'projectcontour';

export const CONTOUR_CHART: ChartReference = {
  chart: 'contour',
  repository: 'https://charts.bitnami.com/bitnami',
  version: '17.0.0',
};

export const SERVICE_TYPES = ['NodePort', 'LoadBalancer'] as const;

const EXTERNAL_DNS_HOSTNAME = 'external-dns.alpha.kubernetes.io/hostname';

export const contourSchema = defineSchema({
  enableMonitoring: t.bool(),
  ingressHosts: t.list(),
  nodeAffinity: t.blocks(nodeAffinitySchema),
  serviceType: t.string({ default: 'LoadBalancer', oneOf: SERVICE_TYPES }),
  tolerations: t.blocks(tolerationSchema, { attribute: 'toleration' }),
  values: t.string(),
});

export type ContourConfig = Decoded<typeof contourSchema>;

export class Contour extends BaseComponent<typeof contourSchema> {
  private overrides: ChartValues = {};

  constructor(private readonly deps: ComponentDependencies) {
    super(CONTOUR, contourSchema);
  }

  metadata(): ComponentMetadata {
    return {
      name: this.name,
      namespace: CONTOUR_NAMESPACE,
      namespaceLabels: namespaceLabels(CONTOUR_NAMESPACE),
    };
  }

  protected override validate(config: ContourConfig): Diagnostic[] {
    const overrides = parseValuesOverride(config.values);
    this.overrides = overrides.values;
    return [
      ...validateTolerations(config.tolerations, 'toleration'),
      ...validateNodeAffinity(config.nodeAffinity, 'node_affinity'),
      ...overrides.diagnostics,
    ];
  }

  protected async render(): Promise<ManifestSet> {
    const chart = await inPhase(this.name, 'load-chart', () => this.deps.charts.load(this.name, CONTOUR_CHART));
    const values = await inPhase(this.name, 'template', () => mergeValues(this.chartValues(), this.overrides));

    return inPhase(this.name, 'render', () =>
      this.deps.renderer.render({
        chart,
        releaseName: this.name,
        namespace: CONTOUR_NAMESPACE,
        values,
      }),
    );
  }

  private chartValues(): ChartValues {
    const { config } = this;
    const tolerations = renderTolerations(config.tolerations);
    const affinity = renderNodeAffinity(config.nodeAffinity);

    const scheduling: ChartValues = {
      ...(tolerations.length > 0 ? { tolerations } : {}),
      ...(affinity ? { affinity } : {}),
    };

    const serviceAnnotations: Record<string, string> = {};
    if (config.ingressHosts.length > 0) {
      serviceAnnotations[EXTERNAL_DNS_HOSTNAME] = config.ingressHosts.join(',');
    }

    return {
      contour: {
        ...scheduling,
      },
      envoy: {
        ...scheduling,
        service: {
          type: config.serviceType,
          ...(Object.keys(serviceAnnotations).length > 0 ? { annotations: serviceAnnotations } : {}),
        },
      },
      metrics: {
        serviceMonitor: {
          enabled: config.enableMonitoring,
        },
      },
    };
  }
}
