import { ComponentRegistry } from '../core/registry';
import { ClusterAutoscaler } from './cluster-autoscaler';
import { Contour } from './contour';
import { defaultDependencies, type ComponentDependencies } from './dependencies';
import { FlatcarLinuxUpdateOperator } from './flatcar-linux-update-operator';

export * from './cluster-autoscaler';
export * from './contour';
export * from './dependencies';
export * from './flatcar-linux-update-operator';

/**
 * Register the built-in components, always in this order:
 * cluster-autoscaler, contour, flatcar-linux-update-operator.
 */
export function registerBuiltinComponents(
  registry: ComponentRegistry,
  deps: ComponentDependencies = defaultDependencies(),
): ComponentRegistry {
  registry.register('cluster-autoscaler', new ClusterAutoscaler(deps));
  registry.register('contour', new Contour(deps));
  registry.register('flatcar-linux-update-operator', new FlatcarLinuxUpdateOperator(deps));
  return registry;
}

let defaultRegistry: ComponentRegistry | undefined;

/** Process-wide registry holding the built-in components, created on first use. */
export function builtinRegistry(): ComponentRegistry {
  defaultRegistry ??= registerBuiltinComponents(new ComponentRegistry());
  return defaultRegistry;
}
