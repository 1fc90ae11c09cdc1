/**
 * Shared `toleration` and `node_affinity` blocks and their Kubernetes form.
 *
 * @example
 * ```yaml
 * toleration:
 *   - key: node-role
 *     operator: Equal
 *     value: ingress
 *     effect: NoSchedule
 * node_affinity:
 *   - key: node-role
 *     operator: In
 *     values: [ingress]
 * ```
 */
import { errorDiagnostic, type Diagnostic } from '../core/diagnostics';
import { defineSchema, t, type Decoded } from '../config/schema';

export const TOLERATION_OPERATORS = ['Equal', 'Exists'] as const;
export const TAINT_EFFECTS = ['NoSchedule', 'PreferNoSchedule', 'NoExecute'] as const;
export const NODE_SELECTOR_OPERATORS = ['In', 'NotIn', 'Exists', 'DoesNotExist', 'Gt', 'Lt'] as const;

export const tolerationSchema = defineSchema({
  key: t.string(),
  operator: t.string({ oneOf: TOLERATION_OPERATORS }),
  value: t.string(),
  effect: t.string({ oneOf: TAINT_EFFECTS }),
  tolerationSeconds: t.number({ integer: true, min: 0 }),
});

export const nodeAffinitySchema = defineSchema({
  key: t.string({ required: true }),
  operator: t.string({ required: true, oneOf: NODE_SELECTOR_OPERATORS }),
  values: t.list(),
});

export type Toleration = Decoded<typeof tolerationSchema>;
export type NodeAffinity = Decoded<typeof nodeAffinitySchema>;

export function validateTolerations(tolerations: readonly Toleration[], attribute: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  tolerations.forEach((toleration, index) => {
    const path = `${attribute}[${index}]`;
    if (toleration.operator === 'Exists' && toleration.value !== '') {
      diagnostics.push(
        errorDiagnostic(`Invalid toleration '${path}'`, `'${path}.value' must be empty when operator is 'Exists'`),
      );
    }
    if (toleration.key === '' && toleration.operator !== 'Exists') {
      diagnostics.push(
        errorDiagnostic(`Invalid toleration '${path}'`, `'${path}.operator' must be 'Exists' when key is empty`),
      );
    }
    if (toleration.tolerationSeconds > 0 && toleration.effect !== 'NoExecute') {
      diagnostics.push(
        errorDiagnostic(
          `Invalid toleration '${path}'`,
          `'${path}.toleration_seconds' is only valid with effect 'NoExecute'`,
        ),
      );
    }
  });
  return diagnostics;
}

export function validateNodeAffinity(affinity: readonly NodeAffinity[], attribute: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  affinity.forEach((term, index) => {
    const path = `${attribute}[${index}]`;
    const count = term.values.length;
    switch (term.operator) {
      case 'In':
      case 'NotIn':
        if (count === 0) {
          diagnostics.push(
            errorDiagnostic(`Invalid node affinity '${path}'`, `'${path}.values' must not be empty for operator '${term.operator}'`),
          );
        }
        break;
      case 'Exists':
      case 'DoesNotExist':
        if (count > 0) {
          diagnostics.push(
            errorDiagnostic(`Invalid node affinity '${path}'`, `'${path}.values' must be empty for operator '${term.operator}'`),
          );
        }
        break;
      case 'Gt':
      case 'Lt':
        if (count !== 1 || !/^-?\d+$/.test(term.values[0] ?? '')) {
          diagnostics.push(
            errorDiagnostic(
              `Invalid node affinity '${path}'`,
              `'${path}.values' must hold exactly one integer for operator '${term.operator}'`,
            ),
          );
        }
        break;
    }
  });
  return diagnostics;
}

export function renderTolerations(tolerations: readonly Toleration[]): Array<Record<string, string | number>> {
  return tolerations.map((toleration) => {
    const out: Record<string, string | number> = {};
    if (toleration.key) out['key'] = toleration.key;
    if (toleration.operator) out['operator'] = toleration.operator;
    if (toleration.value) out['value'] = toleration.value;
    if (toleration.effect) out['effect'] = toleration.effect;
    if (toleration.tolerationSeconds > 0) out['tolerationSeconds'] = toleration.tolerationSeconds;
    return out;
  });
}

/** Node affinity terms as a `requiredDuringSchedulingIgnoredDuringExecution` affinity. */
export function renderNodeAffinity(affinity: readonly NodeAffinity[]): Record<string, unknown> | undefined {
  if (affinity.length === 0) {
    return undefined;
  }
  return {
    nodeAffinity: {
      requiredDuringSchedulingIgnoredDuringExecution: {
        nodeSelectorTerms: [
          {
            matchExpressions: affinity.map((term) => ({
              key: term.key,
              operator: term.operator,
              ...(term.values.length > 0 ? { values: [...term.values] } : {}),
            })),
          },
        ],
      },
    },
  };
}
