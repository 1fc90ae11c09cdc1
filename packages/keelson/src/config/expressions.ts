/**
 * `${var.name}` expressions inside configuration strings.
 *
 * A string that is exactly one expression takes the referenced value as-is,
 * keeping its type (`${var.max}` can feed a number field). Any other string
 * interpolates each expression as text. `$${` produces a literal `${`.
 *
 * @example
 * ```typescript
 * const ctx = createEvalContext({ cluster_name: 'demo' });
 * evaluateNode({ type: 'scalar', value: '${var.cluster_name}-workers' }, ctx, 'worker_pool');
 * // node: { type: 'scalar', value: 'demo-workers' }
 * ```
 */
import { errorDiagnostic, type Diagnostic } from '../core/diagnostics';
import { toNode, type ConfigNode, type PlainValue } from './ast';

export interface EvalContext {
  readonly variables: Readonly<Record<string, PlainValue>>;
}

export function createEvalContext(variables: Record<string, PlainValue> = {}): EvalContext {
  return { variables };
}

type TemplatePart = { literal: string } | { reference: string };

const REFERENCE = /^var(\.[A-Za-z_][A-Za-z0-9_-]*)+$/;

function parseTemplate(text: string): { parts: TemplatePart[]; error?: string } {
  const parts: TemplatePart[] = [];
  let literal = '';
  let i = 0;

  while (i < text.length) {
    if (text.startsWith('$${', i)) {
      literal += '${';
      i += 3;
      continue;
    }
    if (text.startsWith('${', i)) {
      const end = text.indexOf('}', i + 2);
      if (end === -1) {
        return { parts, error: `unterminated template expression starting at offset ${i}` };
      }
      if (literal) {
        parts.push({ literal });
        literal = '';
      }
      parts.push({ reference: text.slice(i + 2, end).trim() });
      i = end + 1;
      continue;
    }
    literal += text[i];
    i += 1;
  }

  if (literal || parts.length === 0) {
    parts.push({ literal });
  }
  return { parts };
}

function lookup(reference: string, ctx: EvalContext): PlainValue | undefined {
  const [, ...path] = reference.split('.');
  let current: PlainValue | undefined = ctx.variables;
  for (const segment of path) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined;
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
}

/**
 * Evaluate every expression inside `node`, recursing into lists and maps.
 * Failed expressions leave the original node in place and add a diagnostic.
 */
export function evaluateNode(
  node: ConfigNode,
  ctx: EvalContext,
  path: string,
): { node: ConfigNode; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];

  if (node.type === 'list') {
    const items = node.items.map((item, index) => {
      const result = evaluateNode(item, ctx, `${path}[${index}]`);
      diagnostics.push(...result.diagnostics);
      return result.node;
    });
    return { node: { ...node, items }, diagnostics };
  }

  if (node.type === 'map') {
    const entries = node.entries.map((entry) => {
      const result = evaluateNode(entry.value, ctx, `${path}.${entry.key}`);
      diagnostics.push(...result.diagnostics);
      return { ...entry, value: result.node };
    });
    return { node: { ...node, entries }, diagnostics };
  }

  if (typeof node.value !== 'string' || !node.value.includes('${')) {
    return { node, diagnostics };
  }

  const { parts, error } = parseTemplate(node.value);
  if (error) {
    diagnostics.push(errorDiagnostic(`Invalid expression in '${path}'`, error, node.range));
    return { node, diagnostics };
  }

  const resolved: PlainValue[] = [];
  for (const part of parts) {
    if ('literal' in part) {
      resolved.push(part.literal);
      continue;
    }
    if (!REFERENCE.test(part.reference)) {
      diagnostics.push(
        errorDiagnostic(
          `Unsupported expression in '${path}'`,
          `"${part.reference}" is not a variable reference; use var.<name>`,
          node.range,
        ),
      );
      continue;
    }
    const value = lookup(part.reference, ctx);
    if (value === undefined) {
      diagnostics.push(
        errorDiagnostic(
          `Unknown variable in '${path}'`,
          `there is no variable named "${part.reference.slice('var.'.length)}"`,
          node.range,
        ),
      );
      continue;
    }
    resolved.push(value);
  }

  if (diagnostics.length > 0) {
    return { node, diagnostics };
  }

  const [single] = parts;
  if (parts.length === 1 && single !== undefined && 'reference' in single) {
    const value = toNode(resolved[0] ?? null);
    return { node: node.range ? { ...value, range: node.range } : value, diagnostics };
  }

  let text = '';
  for (const value of resolved) {
    if (value !== null && typeof value === 'object') {
      diagnostics.push(
        errorDiagnostic(
          `Invalid template interpolation value in '${path}'`,
          'cannot include a list or map in a string template',
          node.range,
        ),
      );
      return { node, diagnostics };
    }
    text += value === null ? '' : String(value);
  }
  return { node: { ...node, value: text }, diagnostics };
}
