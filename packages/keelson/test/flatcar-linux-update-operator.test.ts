import { describe, expect, it } from 'vitest';

import { toBody } from '../src/config/ast';
import { FlatcarLinuxUpdateOperator } from '../src/components/flatcar-linux-update-operator';
import { RenderError } from '../src/core/errors';
import { testDependencies } from './helpers';

describe('FlatcarLinuxUpdateOperator', () => {
  it('needs no configuration', () => {
    const component = new FlatcarLinuxUpdateOperator(testDependencies());

    expect(component.loadConfig(undefined)).toEqual([]);
    expect(component.loadConfig(toBody({}))).toEqual([]);
  });

  it('rejects unknown attributes', () => {
    const component = new FlatcarLinuxUpdateOperator(testDependencies());

    const diagnostics = component.loadConfig(toBody({ channel: 'beta' }));

    expect(diagnostics.map((d) => d.summary)).toEqual(['Unsupported argument']);
  });

  it('asks to be packaged as a release in the reboot-coordinator namespace', () => {
    const component = new FlatcarLinuxUpdateOperator(testDependencies());

    expect(component.metadata()).toEqual({
      name: 'flatcar-linux-update-operator',
      namespace: 'reboot-coordinator',
      namespaceLabels: { 'keelson.dev/namespace': 'reboot-coordinator' },
      helm: { releaseName: 'flatcar-linux-update-operator' },
    });
  });

  it('renders the packaged manifests', async () => {
    const component = new FlatcarLinuxUpdateOperator(testDependencies());
    component.loadConfig(undefined);

    const manifests = await component.renderManifests();

    expect(Object.keys(manifests)).toEqual(['namespace.yaml', 'rbac.yaml', 'update-agent.yaml', 'update-operator.yaml']);
    expect(manifests['update-operator.yaml']).toContain('kind: Deployment');
    expect(manifests['update-agent.yaml']).toContain('kind: DaemonSet');
    expect(manifests['rbac.yaml']).toContain('kind: ClusterRoleBinding');
    expect(manifests['namespace.yaml']).toContain('name: reboot-coordinator');
  });

  it('fails in load-chart without an assets directory', async () => {
    const { assetsDir: _assetsDir, ...deps } = testDependencies();
    const component = new FlatcarLinuxUpdateOperator(deps);
    component.loadConfig(undefined);

    const error = await component.renderManifests().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RenderError);
    expect(error).toMatchObject({ phase: 'load-chart' });
  });
});
