/**
 * Component registry, configuration loader and manifest renderer for
 * Kubernetes cluster add-ons.
 *
 * @example
 * ```typescript
 * import { builtinRegistry, loadComponents, readConfigFile, renderComponents } from 'keelson';
 *
 * const file = readConfigFile('cluster.yaml');
 * const result = loadComponents(builtinRegistry(), file);
 * const manifests = await renderComponents(result.components.map((entry) => entry.component));
 * ```
 */
export * from './core';
export * from './config';
export * from './render';
export * from './inventory';
export * from './infra';
export * from './dns';
export * from './components';
export * from './pipeline';
export * from './utils';
