/**
 * BaseComponent - Foundation class for all keelson components.
 *
 * Decodes configuration against the component schema, runs the component's
 * own validation, and guards rendering behind a successful load.
 *
 * @example
 * ```typescript
 * const schema = defineSchema({ replicas: t.number({ default: 2 }) });
 *
 * export class MyComponent extends BaseComponent<typeof schema> {
 *   constructor() {
 *     super('my-component', schema);
 *   }
 *
 *   metadata(): ComponentMetadata {
 *     return { name: this.name, namespace: 'my-component', namespaceLabels: {} };
 *   }
 *
 *   protected async render(): Promise<ManifestSet> {
 *     // this.config.replicas is a number here
 *   }
 * }
 * ```
 */
import { decodeBody, defaults } from '../config/decode';
import { createEvalContext, type EvalContext } from '../config/expressions';
import { hasRequiredFields, type Decoded, type Schema } from '../config/schema';
import type { ConfigBody } from '../config/ast';
import { namespaceManifest, sortManifests, SYSTEM_NAMESPACES, type ManifestSet } from '../render/manifests';
import { createLogger, type Logger } from '../utils/logger';
import { CONFIG_ABSENT, hasErrors, type Diagnostic } from './diagnostics';
import { ComponentNotLoadedError, RenderError } from './errors';

export const NAMESPACE_LABEL = 'keelson.dev/namespace';

/** Packaging hint: wrap the rendered manifests as a chart release when applying. */
export interface HelmMetadata {
  releaseName: string;
}

export interface ComponentMetadata {
  name: string;
  namespace: string;
  namespaceLabels: Record<string, string>;
  helm?: HelmMetadata;
}

export interface Component {
  readonly name: string;
  /**
   * Replace the component configuration with `body` decoded against its
   * schema. `undefined` means no configuration block was given. Returns every
   * problem found; never throws for configuration mistakes.
   */
  loadConfig(body: ConfigBody | undefined, ctx?: EvalContext): Diagnostic[];
  /** Requires a prior loadConfig without errors. Resolves to the full manifest set or rejects. */
  renderManifests(): Promise<ManifestSet>;
  metadata(): ComponentMetadata;
}

export function namespaceLabels(namespace: string): Record<string, string> {
  return { [NAMESPACE_LABEL]: namespace };
}

export abstract class BaseComponent<S extends Schema> implements Component {
  /** Decoded configuration; only loadConfig replaces it. */
  protected config: Decoded<S>;
  protected readonly log: Logger;
  private loaded = false;

  constructor(
    public readonly name: string,
    protected readonly schema: S,
  ) {
    this.config = defaults(schema);
    this.log = createLogger(name);
  }

  loadConfig(body: ConfigBody | undefined, ctx: EvalContext = createEvalContext()): Diagnostic[] {
    this.loaded = false;
    this.config = defaults(this.schema);

    if (body === undefined) {
      if (hasRequiredFields(this.schema)) {
        return [{ ...CONFIG_ABSENT }];
      }
      const diagnostics = this.validate(this.config);
      this.loaded = !hasErrors(diagnostics);
      return diagnostics;
    }

    const { value, diagnostics } = decodeBody(body, this.schema, ctx);
    diagnostics.push(...this.validate(value));
    this.config = value;
    this.loaded = !hasErrors(diagnostics);

    this.log.debug(`configuration loaded with ${diagnostics.length} diagnostic(s)`);
    return diagnostics;
  }

  async renderManifests(): Promise<ManifestSet> {
    if (!this.loaded) {
      throw new ComponentNotLoadedError(this.name);
    }

    let manifests: ManifestSet;
    try {
      manifests = await this.render();
    } catch (error) {
      throw error instanceof RenderError ? error : new RenderError(this.name, 'render', error);
    }

    const { namespace, namespaceLabels: labels } = this.metadata();
    if (!SYSTEM_NAMESPACES.includes(namespace) && manifests['namespace.yaml'] === undefined) {
      manifests = { ...manifests, 'namespace.yaml': namespaceManifest(namespace, labels) };
    }

    const sorted = sortManifests(manifests);
    this.log.debug(`rendered ${Object.keys(sorted).length} manifest file(s)`);
    return sorted;
  }

  abstract metadata(): ComponentMetadata;

  /**
   * Domain checks after decoding: allow-lists beyond the schema, cross-field
   * rules, conversion of raw strings such as durations. May store derived
   * values on the component. Must not perform network calls.
   */
  protected validate(_config: Decoded<S>): Diagnostic[] {
    return [];
  }

  protected abstract render(): Promise<ManifestSet>;
}
