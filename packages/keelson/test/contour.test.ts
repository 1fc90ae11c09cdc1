import { describe, expect, it } from 'vitest';

import { toBody } from '../src/config/ast';
import { Contour, CONTOUR_CHART } from '../src/components/contour';
import { testDependencies } from './helpers';

describe('Contour', () => {
  it('uses the defaults without configuration', async () => {
    const deps = testDependencies();
    const component = new Contour(deps);

    expect(component.loadConfig(undefined)).toEqual([]);
    const manifests = await component.renderManifests();

    expect(Object.keys(manifests)).toEqual(['deployment-contour.yaml', 'namespace.yaml']);
    expect(deps.renderer.requests[0]?.chart).toEqual(CONTOUR_CHART);
    expect(deps.renderer.requests[0]?.namespace).toBe('projectcontour');
    expect(deps.renderer.lastValues()).toEqual({
      contour: {},
      envoy: { service: { type: 'LoadBalancer' } },
      metrics: { serviceMonitor: { enabled: false } },
    });
  });

  it('places Contour and Envoy with tolerations and node affinity', async () => {
    const deps = testDependencies();
    const component = new Contour(deps);

    const diagnostics = component.loadConfig(
      toBody({
        enable_monitoring: true,
        service_type: 'NodePort',
        ingress_hosts: ['a.example.com', 'b.example.com'],
        toleration: [{ key: 'role', operator: 'Equal', value: 'ingress', effect: 'NoSchedule' }],
        node_affinity: [{ key: 'role', operator: 'In', values: ['ingress'] }],
      }),
    );
    await component.renderManifests();

    expect(diagnostics).toEqual([]);
    const tolerations = [{ key: 'role', operator: 'Equal', value: 'ingress', effect: 'NoSchedule' }];
    const affinity = {
      nodeAffinity: {
        requiredDuringSchedulingIgnoredDuringExecution: {
          nodeSelectorTerms: [{ matchExpressions: [{ key: 'role', operator: 'In', values: ['ingress'] }] }],
        },
      },
    };
    expect(deps.renderer.lastValues()).toEqual({
      contour: { tolerations, affinity },
      envoy: {
        tolerations,
        affinity,
        service: {
          type: 'NodePort',
          annotations: { 'external-dns.alpha.kubernetes.io/hostname': 'a.example.com,b.example.com' },
        },
      },
      metrics: { serviceMonitor: { enabled: true } },
    });
  });

  it('reports every invalid setting together', () => {
    const component = new Contour(testDependencies());

    const diagnostics = component.loadConfig(
      toBody({
        service_type: 'ClusterIP',
        toleration: { key: 'role', operator: 'Exists', value: 'ingress' },
        node_affinity: { key: 'cpus', operator: 'Gt', values: ['many'] },
      }),
    );

    expect(diagnostics.map((d) => d.summary)).toEqual([
      'Unknown value "ClusterIP" for \'service_type\'',
      "Invalid toleration 'toleration[0]'",
      "Invalid node affinity 'node_affinity[0]'",
    ]);
  });

  it('rejects values that are not a YAML map', () => {
    const component = new Contour(testDependencies());

    const diagnostics = component.loadConfig(toBody({ values: '- a\n- b\n' }));

    expect(diagnostics).toEqual([
      {
        severity: 'error',
        summary: "error parsing 'values'",
        detail: "'values' must be a YAML map of chart values",
      },
    ]);
  });

  it('merges user values into the chart values', async () => {
    const deps = testDependencies();
    const component = new Contour(deps);

    component.loadConfig(toBody({ values: 'envoy:\n  service:\n    externalTrafficPolicy: Local\n' }));
    await component.renderManifests();

    expect(deps.renderer.lastValues()['envoy']).toEqual({
      service: { type: 'LoadBalancer', externalTrafficPolicy: 'Local' },
    });
  });
});
