import { describe, expect, it } from 'vitest';

import { registerBuiltinComponents } from '../src/components';
import { parseConfig } from '../src/config/source';
import { ComponentNotLoadedError, UnknownComponentError } from '../src/core/errors';
import { ComponentRegistry } from '../src/core/registry';
import { loadComponents, loadFailed, renderComponents } from '../src/pipeline/pipeline';
import { testDependencies } from './helpers';

const CONFIG = `variables:
  cluster_name: demo
components:
  cluster-autoscaler:
    cluster_name: \${var.cluster_name}
    worker_pool: pool-1
    packet:
      project_id: p-1
      facility: ams1
  contour:
`;

function builtins(): ComponentRegistry {
  return registerBuiltinComponents(new ComponentRegistry(), testDependencies());
}

describe('registerBuiltinComponents', () => {
  it('registers every built-in component', () => {
    expect(builtins().names()).toEqual(['cluster-autoscaler', 'contour', 'flatcar-linux-update-operator']);
  });
});

describe('loadComponents', () => {
  it('loads every component of the file with its variables', () => {
    const result = loadComponents(builtins(), parseConfig(CONFIG, 'cluster.yaml'));

    expect(loadFailed(result)).toBe(false);
    expect(result.components.map((entry) => [entry.name, entry.diagnostics])).toEqual([
      ['cluster-autoscaler', []],
      ['contour', []],
    ]);
  });

  it('loads a requested component missing from the file without a body', () => {
    const result = loadComponents(builtins(), parseConfig('components: {}\n'), ['cluster-autoscaler']);

    expect(loadFailed(result)).toBe(true);
    expect(result.components[0]?.diagnostics.map((d) => d.summary)).toEqual(['component requires configuration']);
  });

  it('resolves every name before loading anything', () => {
    const registry = builtins();

    expect(() => loadComponents(registry, parseConfig(CONFIG), ['contour', 'countour'])).toThrow(UnknownComponentError);
    return expect(registry.get('contour').renderManifests()).rejects.toThrow(ComponentNotLoadedError);
  });

  it('lets extra variables override the file', () => {
    const registry = builtins();
    const result = loadComponents(registry, parseConfig(CONFIG), ['cluster-autoscaler'], { cluster_name: 'other' });

    expect(loadFailed(result)).toBe(false);
    return expect(registry.get('cluster-autoscaler').renderManifests()).rejects.toThrow(
      'cluster "other" must have at least one worker node but no worker was found',
    );
  });

  it('carries file diagnostics', () => {
    const result = loadComponents(builtins(), parseConfig('components: [', 'broken.yaml'));

    expect(loadFailed(result)).toBe(true);
    expect(result.components).toEqual([]);
  });
});

describe('renderComponents', () => {
  it('renders components in order', async () => {
    const registry = builtins();
    const result = loadComponents(registry, parseConfig(CONFIG));

    const rendered = await renderComponents(result.components.map((entry) => entry.component));

    expect([...rendered.keys()]).toEqual(['cluster-autoscaler', 'contour']);
    expect(Object.keys(rendered.get('contour') ?? {})).toEqual(['deployment-contour.yaml', 'namespace.yaml']);
  });
});
