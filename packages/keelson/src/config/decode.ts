/**
 * Generic decoder: binds a configuration body to any schema.
 *
 * Decoding never stops at the first problem. Every attribute is bound or
 * reported, then required-field checks run over the whole body, so a single
 * call reports every mistake it can see.
 */
import { errorDiagnostic, type Diagnostic, type SourceRange } from '../core/diagnostics';
import { describeNode, emptyBody, type ConfigBody, type ConfigNode, type MapEntry } from './ast';
import { evaluateNode, type EvalContext } from './expressions';
import {
  attributeName,
  type Decoded,
  type FieldSpec,
  type NumberField,
  type Schema,
  type StringField,
  type VariantField,
} from './schema';

export interface DecodeResult<S extends Schema> {
  value: Decoded<S>;
  diagnostics: Diagnostic[];
}

type Bound = { ok: true; value: unknown } | { ok: false };

const UNSET: Bound = { ok: false };

// The decoder assembles values field by field from the schema; this is the
// one place the assembled record is claimed to match the schema's type.
function asDecoded<S extends Schema>(record: Record<string, unknown>): Decoded<S> {
  return record as Decoded<S>;
}

function fieldDefault(field: FieldSpec): unknown {
  switch (field.kind) {
    case 'string':
      return field.default ?? '';
    case 'number':
      return field.default ?? 0;
    case 'bool':
      return field.default ?? false;
    case 'list':
      return [...(field.default ?? [])];
    case 'map':
      return { ...(field.default ?? {}) };
    case 'block':
      return undefined;
    case 'blocks':
      return [];
    case 'variant': {
      const tag = field.default;
      const schema = tag !== undefined ? field.cases[tag] : undefined;
      return tag !== undefined && schema ? { tag, config: defaults(schema) } : undefined;
    }
  }
}

/** Fresh default values for a schema. */
export function defaults<S extends Schema>(schema: S): Decoded<S> {
  const out: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(schema)) {
    out[key] = fieldDefault(field);
  }
  return asDecoded<S>(out);
}

function join(prefix: string, name: string): string {
  return prefix ? `${prefix}.${name}` : name;
}

function rangeOf(entry: MapEntry | undefined, fallback?: SourceRange): SourceRange | undefined {
  return entry?.range ?? entry?.value.range ?? fallback;
}

function isNull(node: ConfigNode): boolean {
  return node.type === 'scalar' && node.value === null;
}

function typeMismatch(path: string, expected: string, node: ConfigNode, range?: SourceRange): Diagnostic {
  return errorDiagnostic(
    `Incorrect value type for '${path}'`,
    `Inappropriate value for attribute "${path}": ${expected} is required, got ${describeNode(node)}.`,
    range,
  );
}

function distance(a: string, b: string): number {
  const row = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    let previous = row[0] ?? 0;
    row[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const current = row[j] ?? 0;
      const substitution = previous + (a[i - 1] === b[j - 1] ? 0 : 1);
      row[j] = Math.min(current + 1, (row[j - 1] ?? 0) + 1, substitution);
      previous = current;
    }
  }
  return row[b.length] ?? 0;
}

function suggest(name: string, candidates: readonly string[]): string | undefined {
  let best: string | undefined;
  let bestDistance = 3;
  for (const candidate of candidates) {
    const d = distance(name, candidate);
    if (d < bestDistance) {
      best = candidate;
      bestDistance = d;
    }
  }
  return best;
}

class BodyDecoder {
  readonly diagnostics: Diagnostic[] = [];

  constructor(private readonly ctx: EvalContext) {}

  decode<S extends Schema>(body: ConfigBody, schema: S, prefix: string): Decoded<S> {
    const entries = new Map<string, MapEntry>();
    for (const entry of body.entries) {
      if (entries.has(entry.key)) {
        this.diagnostics.push(
          errorDiagnostic(
            'Duplicate argument',
            `'${join(prefix, entry.key)}' was already set; each argument may be set only once`,
            rangeOf(entry, body.range),
          ),
        );
        continue;
      }
      entries.set(entry.key, entry);
    }

    const known = new Set<string>();
    for (const [key, field] of Object.entries(schema)) {
      known.add(attributeName(key, field));
      if (field.kind === 'variant') {
        Object.keys(field.cases).forEach((name) => known.add(name));
      }
    }

    for (const entry of entries.values()) {
      if (known.has(entry.key)) {
        continue;
      }
      const hint = suggest(entry.key, [...known]);
      this.diagnostics.push(
        errorDiagnostic(
          'Unsupported argument',
          `An argument named "${join(prefix, entry.key)}" is not expected here.` +
            (hint ? ` Did you mean "${hint}"?` : ''),
          rangeOf(entry, body.range),
        ),
      );
    }

    const out: Record<string, unknown> = {};
    const missing: Array<{ path: string; range?: SourceRange; empty?: boolean }> = [];

    for (const [key, field] of Object.entries(schema)) {
      const name = attributeName(key, field);
      const path = join(prefix, name);
      const entry = entries.get(name);
      const present = entry !== undefined && !isNull(entry.value);

      if (field.kind === 'variant') {
        out[key] = this.variant(field, name, path, prefix, entries, body.range, missing);
        continue;
      }

      if (!present) {
        if (field.required) {
          missing.push({ path, range: body.range });
        }
        out[key] = fieldDefault(field);
        continue;
      }

      const bound = this.field(field, path, entry);
      out[key] = bound.ok ? bound.value : fieldDefault(field);
      if (field.required && field.kind === 'string' && bound.ok && bound.value === '') {
        missing.push({ path, range: rangeOf(entry, body.range), empty: true });
      }
    }

    // Required checks run last so they are reported alongside structural errors.
    for (const { path, range, empty } of missing) {
      const detail = empty ? `'${path}' must be set but it is empty` : `'${path}' must be set but it was not found`;
      this.diagnostics.push(errorDiagnostic(`'${path}' must be set`, detail, range));
    }

    return asDecoded<S>(out);
  }

  private field(field: FieldSpec, path: string, entry: MapEntry): Bound {
    const range = rangeOf(entry);

    if (field.kind === 'block') {
      if (entry.value.type !== 'map') {
        this.diagnostics.push(typeMismatch(path, 'a block', entry.value, range));
        return UNSET;
      }
      return { ok: true, value: this.decode(entry.value, field.schema, path) };
    }

    if (field.kind === 'blocks') {
      const blocks = entry.value.type === 'list' ? entry.value.items : [entry.value];
      const values: unknown[] = [];
      blocks.forEach((block, index) => {
        const blockPath = `${path}[${index}]`;
        if (block.type !== 'map') {
          this.diagnostics.push(typeMismatch(blockPath, 'a block', block, block.range ?? range));
          return;
        }
        values.push(this.decode(block, field.schema, blockPath));
      });
      return { ok: true, value: values };
    }

    const evaluated = evaluateNode(entry.value, this.ctx, path);
    if (evaluated.diagnostics.length > 0) {
      this.diagnostics.push(...evaluated.diagnostics);
      return UNSET;
    }
    const node = evaluated.node;

    switch (field.kind) {
      case 'string':
        return this.string(field, path, node, range);
      case 'number':
        return this.number(field, path, node, range);
      case 'bool': {
        const value = node.type === 'scalar' ? toBool(node.value) : undefined;
        if (value === undefined) {
          this.diagnostics.push(typeMismatch(path, 'a bool', node, range));
          return UNSET;
        }
        return { ok: true, value };
      }
      case 'list': {
        if (node.type !== 'list') {
          this.diagnostics.push(typeMismatch(path, 'a list of strings', node, range));
          return UNSET;
        }
        const values: string[] = [];
        let failed = false;
        node.items.forEach((item, index) => {
          const value = item.type === 'scalar' ? toText(item.value) : undefined;
          if (value === undefined) {
            this.diagnostics.push(typeMismatch(`${path}[${index}]`, 'a string', item, item.range ?? range));
            failed = true;
            return;
          }
          values.push(value);
        });
        return failed ? UNSET : { ok: true, value: values };
      }
      case 'map': {
        if (node.type !== 'map') {
          this.diagnostics.push(typeMismatch(path, 'a map of strings', node, range));
          return UNSET;
        }
        const values: Record<string, string> = {};
        let failed = false;
        for (const item of node.entries) {
          const value = item.value.type === 'scalar' ? toText(item.value.value) : undefined;
          if (value === undefined) {
            this.diagnostics.push(typeMismatch(`${path}.${item.key}`, 'a string', item.value, rangeOf(item, range)));
            failed = true;
            continue;
          }
          values[item.key] = value;
        }
        return failed ? UNSET : { ok: true, value: values };
      }
      case 'variant':
        return UNSET;
    }
  }

  private string(field: StringField, path: string, node: ConfigNode, range?: SourceRange): Bound {
    const value = node.type === 'scalar' ? toText(node.value) : undefined;
    if (value === undefined) {
      this.diagnostics.push(typeMismatch(path, 'a string', node, range));
      return UNSET;
    }
    if (field.oneOf && !field.oneOf.includes(value)) {
      this.diagnostics.push(
        errorDiagnostic(
          `Unknown value ${JSON.stringify(value)} for '${path}'`,
          `'${path}' must be one of: ${field.oneOf.map((v) => `'${v}'`).join(', ')}`,
          range,
        ),
      );
      return UNSET;
    }
    return { ok: true, value };
  }

  private number(field: NumberField, path: string, node: ConfigNode, range?: SourceRange): Bound {
    const value = node.type === 'scalar' ? toNumber(node.value) : undefined;
    if (value === undefined) {
      this.diagnostics.push(typeMismatch(path, 'a number', node, range));
      return UNSET;
    }
    if (field.integer && !Number.isInteger(value)) {
      this.diagnostics.push(
        errorDiagnostic(`Invalid value for '${path}'`, `'${path}' must be a whole number, got ${value}`, range),
      );
      return UNSET;
    }
    if (field.min !== undefined && value < field.min) {
      this.diagnostics.push(
        errorDiagnostic(`Invalid value for '${path}'`, `'${path}' must be at least ${field.min}, got ${value}`, range),
      );
      return UNSET;
    }
    return { ok: true, value };
  }

  private variant(
    field: VariantField,
    name: string,
    path: string,
    prefix: string,
    entries: Map<string, MapEntry>,
    bodyRange: SourceRange | undefined,
    missing: Array<{ path: string; range?: SourceRange }>,
  ): unknown {
    const caseNames = Object.keys(field.cases);
    const entry = entries.get(name);
    let tag: string | undefined = field.default;

    if (entry !== undefined && !isNull(entry.value)) {
      const evaluated = evaluateNode(entry.value, this.ctx, path);
      this.diagnostics.push(...evaluated.diagnostics);
      if (evaluated.diagnostics.length > 0) {
        return undefined;
      }
      const node = evaluated.node;
      if (node.type !== 'scalar' || typeof node.value !== 'string') {
        this.diagnostics.push(typeMismatch(path, 'a string', node, rangeOf(entry)));
        return undefined;
      }
      tag = node.value;
    }

    if (tag === undefined) {
      if (field.required) {
        missing.push({ path, range: bodyRange });
      }
      return undefined;
    }

    const schema = Object.prototype.hasOwnProperty.call(field.cases, tag) ? field.cases[tag] : undefined;
    if (schema === undefined) {
      this.diagnostics.push(
        errorDiagnostic(
          `Make sure to set ${path} to one of supported values`,
          `${path} must be one of: ${caseNames.map((c) => `'${c}'`).join(', ')}, got ${JSON.stringify(tag)}`,
          rangeOf(entry, bodyRange),
        ),
      );
      return undefined;
    }

    for (const other of caseNames) {
      if (other !== tag && entries.has(other)) {
        this.diagnostics.push(
          errorDiagnostic(
            `'${join(prefix, other)}' block is not valid here`,
            `'${join(prefix, other)}' block can only be used when ${path} is '${other}', but ${path} is '${tag}'`,
            rangeOf(entries.get(other), bodyRange),
          ),
        );
      }
    }

    const blockPath = join(prefix, tag);
    const block = entries.get(tag);
    let body: ConfigBody;
    if (block === undefined || isNull(block.value)) {
      this.diagnostics.push(
        errorDiagnostic(
          `'${blockPath}' block must exist`,
          `When using ${tag} ${name}, '${blockPath}' block must exist`,
          rangeOf(block, bodyRange),
        ),
      );
      // Decode an empty block so missing fields inside it are reported as well.
      body = emptyBody(bodyRange);
    } else if (block.value.type !== 'map') {
      this.diagnostics.push(typeMismatch(blockPath, 'a block', block.value, rangeOf(block)));
      body = emptyBody(bodyRange);
    } else {
      body = block.value;
    }

    return { tag, config: this.decode(body, schema, blockPath) };
  }
}

function toText(value: string | number | boolean | null): string | undefined {
  if (value === null) {
    return undefined;
  }
  return typeof value === 'string' ? value : String(value);
}

function toNumber(value: string | number | boolean | null): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toBool(value: string | number | boolean | null): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  return undefined;
}

/**
 * Decode `body` against `schema`. Fields that fail to bind keep their
 * defaults; every problem found is in `diagnostics`.
 */
export function decodeBody<S extends Schema>(body: ConfigBody, schema: S, ctx: EvalContext): DecodeResult<S> {
  const decoder = new BodyDecoder(ctx);
  const value = decoder.decode(body, schema, '');
  return { value, diagnostics: decoder.diagnostics };
}
