/**
 * ClusterAutoscaler - scales an Equinix Metal (Packet) worker pool.
 *
 * The worker boot payload is looked up at render time from the project's
 * device inventory, so rendering needs `PACKET_AUTH_TOKEN`.
 *
 * @example
 * ```yaml
 * components:
 *   cluster-autoscaler:
 *     cluster_name: demo
 *     worker_pool: pool-1
 *     max_workers: 6
 *     packet:
 *       project_id: p-1
 *       facility: ams1
 * ```
 */
import { parseDuration, formatDuration, MINUTE, type Duration } from '../../config/duration';
import { defineSchema, t, type Decoded } from '../../config/schema';
import { BaseComponent, namespaceLabels, type ComponentMetadata } from '../../core/component';
import { errorDiagnostic, type Diagnostic } from '../../core/diagnostics';
import { describeError, inPhase, InventoryError } from '../../core/errors';
import { findWorkerUserData } from '../../inventory/devices';
import type { ChartReference } from '../../render/charts';
import type { ManifestSet } from '../../render/manifests';
import { mergeValues, parseValuesOverride, type ChartValues } from '../../render/values';
import type { ComponentDependencies } from '../dependencies';

export const CLUSTER_AUTOSCALER = 'cluster-autoscaler';

export const CLUSTER_AUTOSCALER_CHART: ChartReference = {
  chart: 'cluster-autoscaler',
  repository: 'https://kubernetes.github.io/autoscaler',
  version: '9.37.0',
};

export const WORKER_CHANNELS = ['stable', 'beta', 'alpha', 'edge'] as const;

const packetSchema = defineSchema({
  projectId: t.string({ required: true }),
  facility: t.string({ required: true }),
  workerType: t.string({ default: 'baremetal_0' }),
  workerChannel: t.string({ default: 'stable', oneOf: WORKER_CHANNELS }),
});

export const clusterAutoscalerSchema = defineSchema({
  provider: t.variant({ default: 'packet', cases: { packet: packetSchema } }),
  workerPool: t.string({ required: true }),
  clusterName: t.string({ required: true }),
  namespace: t.string({ default: 'kube-system' }),
  minWorkers: t.number({ default: 1, integer: true, min: 0 }),
  maxWorkers: t.number({ default: 4, integer: true, min: 1 }),
  scaleDownUnneededTime: t.string({ default: '10m' }),
  scaleDownDelayAfterAdd: t.string({ default: '10m' }),
  scaleDownUnreadyTime: t.string({ default: '20m' }),
  serviceMonitor: t.bool({ default: false }),
  values: t.string(),
});

export type ClusterAutoscalerConfig = Decoded<typeof clusterAutoscalerSchema>;

type PacketConfig = Decoded<typeof packetSchema>;

interface ScaleDownTimes {
  unneeded: Duration;
  delayAfterAdd: Duration;
  unready: Duration;
}

const DEFAULT_TIMES: ScaleDownTimes = {
  unneeded: 10 * MINUTE,
  delayAfterAdd: 10 * MINUTE,
  unready: 20 * MINUTE,
};

interface PacketValues {
  config: PacketConfig;
  authToken: string;
  userData: string;
}

export class ClusterAutoscaler extends BaseComponent<typeof clusterAutoscalerSchema> {
  private times: ScaleDownTimes = { ...DEFAULT_TIMES };
  private overrides: ChartValues = {};

  constructor(private readonly deps: ComponentDependencies) {
    super(CLUSTER_AUTOSCALER, clusterAutoscalerSchema);
  }

  metadata(): ComponentMetadata {
    return {
      name: this.name,
      namespace: this.config.namespace,
      namespaceLabels: namespaceLabels(this.config.namespace),
    };
  }

  protected override validate(config: ClusterAutoscalerConfig): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    // Raw duration strings; an empty string keeps the default.
    const duration = (attribute: string, raw: string, fallback: Duration): Duration => {
      if (raw === '') {
        return fallback;
      }
      try {
        return parseDuration(raw);
      } catch (error) {
        diagnostics.push(
          errorDiagnostic(`error parsing '${attribute}'`, `error parsing '${attribute}': ${describeError(error)}`),
        );
        return fallback;
      }
    };

    this.times = {
      unneeded: duration('scale_down_unneeded_time', config.scaleDownUnneededTime, DEFAULT_TIMES.unneeded),
      delayAfterAdd: duration('scale_down_delay_after_add', config.scaleDownDelayAfterAdd, DEFAULT_TIMES.delayAfterAdd),
      unready: duration('scale_down_unready_time', config.scaleDownUnreadyTime, DEFAULT_TIMES.unready),
    };

    if (config.minWorkers > config.maxWorkers) {
      diagnostics.push(
        errorDiagnostic(
          "Invalid value for 'min_workers'",
          `'min_workers' (${config.minWorkers}) must not be greater than 'max_workers' (${config.maxWorkers})`,
        ),
      );
    }

    const overrides = parseValuesOverride(config.values);
    this.overrides = overrides.values;
    diagnostics.push(...overrides.diagnostics);

    return diagnostics;
  }

  protected async render(): Promise<ManifestSet> {
    const chart = await inPhase(this.name, 'load-chart', () => this.deps.charts.load(this.name, CLUSTER_AUTOSCALER_CHART));
    const packet = await inPhase(this.name, 'derive-values', () => this.derivePacketValues());
    const values = await inPhase(this.name, 'template', () => mergeValues(this.chartValues(packet), this.overrides));

    return inPhase(this.name, 'render', () =>
      this.deps.renderer.render({
        chart,
        releaseName: this.name,
        namespace: this.config.namespace,
        values,
      }),
    );
  }

  private async derivePacketValues(): Promise<PacketValues> {
    const provider = this.config.provider;
    if (!provider) {
      throw new InventoryError('no provider is configured');
    }

    const token = this.deps.settings.packetAuthToken;
    if (!token) {
      throw new InventoryError('PACKET_AUTH_TOKEN must be set to look up worker nodes');
    }

    const { projectId, facility } = provider.config;
    this.log.debug(`listing devices in project "${projectId}"`);
    const devices = await this.deps.inventory.listDevices(projectId);
    const userData = findWorkerUserData(this.config.clusterName, facility, devices);

    return {
      config: provider.config,
      authToken: Buffer.from(token, 'utf-8').toString('base64'),
      userData,
    };
  }

  private chartValues(packet: PacketValues): ChartValues {
    const { config, times } = this;
    return {
      cloudProvider: 'packet',
      nodeSelector: {
        'node.kubernetes.io/controller': 'true',
      },
      tolerations: [
        {
          effect: 'NoSchedule',
          key: 'node-role.kubernetes.io/master',
          operator: 'Exists',
        },
      ],
      rbac: {
        create: true,
      },
      cloudConfigPath: '/config',
      packetClusterName: config.clusterName,
      packetAuthToken: packet.authToken,
      packetCloudInit: packet.userData,
      packetProjectID: packet.config.projectId,
      packetFacility: packet.config.facility,
      packetOSChannel: packet.config.workerChannel,
      packetNodeType: packet.config.workerType,
      autoscalingGroups: [
        {
          name: config.workerPool,
          maxSize: config.maxWorkers,
          minSize: config.minWorkers,
        },
      ],
      extraArgs: {
        'scale-down-unneeded-time': formatDuration(times.unneeded),
        'scale-down-delay-after-add': formatDuration(times.delayAfterAdd),
        'scale-down-unready-time': formatDuration(times.unready),
      },
      podDisruptionBudget: [],
      ...(config.serviceMonitor
        ? {
            serviceMonitor: {
              enabled: true,
              namespace: config.namespace,
              selector: { release: 'prometheus-operator' },
            },
          }
        : {}),
    };
  }
}
