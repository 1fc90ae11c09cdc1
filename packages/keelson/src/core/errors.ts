/**
 * Error types raised outside of configuration decoding.
 *
 * Decode and validation problems never throw; they are returned as
 * diagnostics. Everything here aborts the current operation.
 */

export class KeelsonError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised when a component name is not in the registry. Kept apart from
 * configuration errors: it usually means a typo in the component name.
 */
export class UnknownComponentError extends KeelsonError {
  constructor(public readonly component: string, public readonly known: readonly string[]) {
    super(
      known.length > 0
        ? `unknown component "${component}" (available: ${known.join(', ')})`
        : `unknown component "${component}"`,
    );
  }
}

export class DuplicateComponentError extends KeelsonError {
  constructor(public readonly component: string) {
    super(`component "${component}" is already registered`);
  }
}

export class ComponentNotLoadedError extends KeelsonError {
  constructor(public readonly component: string) {
    super(`component "${component}" has no valid configuration loaded; call loadConfig first and fix all errors`);
  }
}

export type RenderPhase = 'load-chart' | 'derive-values' | 'template' | 'render';

/**
 * Failure while rendering manifests. Names the component and the phase
 * that failed; the original error is kept as `cause`.
 */
export class RenderError extends KeelsonError {
  constructor(
    public readonly component: string,
    public readonly phase: RenderPhase,
    cause: unknown,
  ) {
    super(`${component}: ${phase}: ${describeError(cause)}`, { cause });
  }
}

export class DuplicateDeviceError extends KeelsonError {
  constructor(public readonly hostname: string, public readonly facility: string) {
    super(`having two devices with the same name ("${hostname}") in the same facility ("${facility}") is not supported`);
  }
}

export class WorkerNotFoundError extends KeelsonError {
  constructor(public readonly clusterName: string) {
    super(`cluster "${clusterName}" must have at least one worker node but no worker was found`);
  }
}

export class InventoryError extends KeelsonError {}

export class ChartLoadError extends KeelsonError {}

export class OutputReadError extends KeelsonError {}

export class ConfigSourceError extends KeelsonError {}

export class DnsError extends KeelsonError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run `fn` and rethrow any failure as a RenderError for the given phase.
 * RenderErrors pass through untouched so nested phases keep the innermost one.
 */
export async function inPhase<T>(component: string, phase: RenderPhase, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof RenderError) {
      throw error;
    }
    throw new RenderError(component, phase, error);
  }
}
