/**
 * Orchestration over the registry: load configuration for a set of
 * components, then render them. Knows nothing component-specific.
 */
import type { PlainValue } from '../config/ast';
import { createEvalContext } from '../config/expressions';
import type { ConfigFile } from '../config/source';
import type { Component } from '../core/component';
import { hasErrors, type Diagnostic } from '../core/diagnostics';
import type { ComponentRegistry } from '../core/registry';
import type { ManifestSet } from '../render/manifests';
import { createLogger } from '../utils/logger';

const log = createLogger('pipeline');

export interface ComponentLoadResult {
  name: string;
  component: Component;
  diagnostics: Diagnostic[];
}

export interface LoadResult {
  /** Problems with the configuration file itself. */
  diagnostics: Diagnostic[];
  components: ComponentLoadResult[];
}

export function loadFailed(result: LoadResult): boolean {
  return hasErrors(result.diagnostics) || result.components.some((entry) => hasErrors(entry.diagnostics));
}

/**
 * Load configuration for `names` (default: every component in the file, in
 * file order). All names are resolved before anything is loaded, so an
 * unknown name throws UnknownComponentError without touching any component.
 * A requested component missing from the file is loaded with no body.
 */
export function loadComponents(
  registry: ComponentRegistry,
  file: ConfigFile,
  names: readonly string[] = [...file.components.keys()],
  extraVariables: Record<string, PlainValue> = {},
): LoadResult {
  const resolved = names.map((name) => ({ name, component: registry.get(name) }));
  const ctx = createEvalContext({ ...file.variables, ...extraVariables });

  const components = resolved.map(({ name, component }) => {
    const diagnostics = component.loadConfig(file.components.get(name), ctx);
    log.debug(`${name}: ${diagnostics.length} diagnostic(s)`);
    return { name, component, diagnostics };
  });

  return { diagnostics: [...file.diagnostics], components };
}

/**
 * Render components one after another, in order. The first failure
 * rejects; nothing rendered before it is returned.
 */
export async function renderComponents(components: readonly Component[]): Promise<Map<string, ManifestSet>> {
  const rendered = new Map<string, ManifestSet>();
  for (const component of components) {
    log.info(`rendering ${component.name}`);
    rendered.set(component.name, await component.renderManifests());
  }
  return rendered;
}
