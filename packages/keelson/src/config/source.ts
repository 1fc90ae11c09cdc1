/**
 * Reads the YAML configuration file into configuration trees with source
 * positions.
 *
 * @example
 * ```yaml
 * variables:
 *   cluster_name: demo
 * components:
 *   contour:
 *     service_type: NodePort
 *   flatcar-linux-update-operator:
 * ```
 */
import * as fs from 'node:fs';
import { isAlias, isMap, isScalar, isSeq, LineCounter, parseDocument, type Document, type Node } from 'yaml';
import { errorDiagnostic, type Diagnostic, type SourceRange } from '../core/diagnostics';
import { ConfigSourceError, describeError } from '../core/errors';
import { emptyBody, type ConfigBody, type ConfigNode, type MapEntry, type PlainValue, type Scalar } from './ast';

export interface ConfigFile {
  filename: string;
  variables: Record<string, PlainValue>;
  /** Component bodies in file order. */
  components: Map<string, ConfigBody>;
  diagnostics: Diagnostic[];
}

const TOP_LEVEL_KEYS = ['variables', 'components'];

function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

class YamlConverter {
  constructor(
    private readonly doc: Document,
    private readonly lines: LineCounter,
    private readonly filename: string,
  ) {}

  range(node: { range?: [number, number, number] | null } | null | undefined): SourceRange | undefined {
    const offset = node?.range?.[0];
    if (offset === undefined) {
      return undefined;
    }
    const { line, col } = this.lines.linePos(offset);
    return { filename: this.filename, line, column: col };
  }

  convert(node: unknown): ConfigNode {
    if (isAlias(node)) {
      return this.convert(node.resolve(this.doc));
    }
    if (isMap(node)) {
      const range = this.range(node);
      const entries: MapEntry[] = [];
      for (const pair of node.items) {
        const key = isScalar(pair.key) ? String(pair.key.value) : String(pair.key);
        const keyRange = isScalar(pair.key) ? this.range(pair.key) : undefined;
        const value = this.convert(pair.value);
        entries.push(keyRange ? { key, value, range: keyRange } : { key, value });
      }
      return range ? { type: 'map', entries, range } : { type: 'map', entries };
    }
    if (isSeq(node)) {
      const range = this.range(node);
      const items = node.items.map((item) => this.convert(item));
      return range ? { type: 'list', items, range } : { type: 'list', items };
    }
    if (isScalar(node)) {
      const range = this.range(node);
      const value = toScalar(node.value);
      return range ? { type: 'scalar', value, range } : { type: 'scalar', value };
    }
    return { type: 'scalar', value: null };
  }
}

export function toPlain(node: ConfigNode): PlainValue {
  switch (node.type) {
    case 'scalar':
      return node.value;
    case 'list':
      return node.items.map(toPlain);
    case 'map': {
      const out: { [key: string]: PlainValue } = {};
      for (const entry of node.entries) {
        out[entry.key] = toPlain(entry.value);
      }
      return out;
    }
  }
}

/** Parse configuration text. Syntax and shape problems are returned as diagnostics. */
export function parseConfig(text: string, filename = '<config>'): ConfigFile {
  const lines = new LineCounter();
  const doc = parseDocument(text, { lineCounter: lines, prettyErrors: false });
  const converter = new YamlConverter(doc, lines, filename);
  const file: ConfigFile = { filename, variables: {}, components: new Map(), diagnostics: [] };

  for (const error of doc.errors) {
    const pos = error.linePos?.[0];
    file.diagnostics.push(
      errorDiagnostic(
        'Invalid configuration syntax',
        error.message,
        pos ? { filename, line: pos.line, column: pos.col } : undefined,
      ),
    );
  }
  if (file.diagnostics.length > 0) {
    return file;
  }

  const root: Node | null = doc.contents;
  if (root === null) {
    return file;
  }
  const tree = converter.convert(root);
  if (tree.type !== 'map') {
    file.diagnostics.push(errorDiagnostic('Invalid configuration', 'the configuration file must be a map', tree.range));
    return file;
  }

  for (const entry of tree.entries) {
    if (!TOP_LEVEL_KEYS.includes(entry.key)) {
      file.diagnostics.push(
        errorDiagnostic(
          'Unsupported top-level key',
          `"${entry.key}" is not expected here; use one of: ${TOP_LEVEL_KEYS.join(', ')}`,
          entry.range,
        ),
      );
      continue;
    }

    const value = entry.value;
    if (value.type === 'scalar' && value.value === null) {
      continue;
    }
    if (value.type !== 'map') {
      file.diagnostics.push(errorDiagnostic(`'${entry.key}' must be a map`, undefined, value.range ?? entry.range));
      continue;
    }

    if (entry.key === 'variables') {
      for (const variable of value.entries) {
        file.variables[variable.key] = toPlain(variable.value);
      }
      continue;
    }

    for (const component of value.entries) {
      const body = component.value;
      if (body.type === 'map') {
        file.components.set(component.key, body);
      } else if (body.type === 'scalar' && body.value === null) {
        file.components.set(component.key, emptyBody(component.range));
      } else {
        file.diagnostics.push(
          errorDiagnostic(
            `Configuration of component '${component.key}' must be a map`,
            undefined,
            body.range ?? component.range,
          ),
        );
      }
    }
  }

  return file;
}

export function readConfigFile(path: string): ConfigFile {
  let text: string;
  try {
    text = fs.readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigSourceError(`reading configuration file "${path}": ${describeError(error)}`, { cause: error });
  }
  return parseConfig(text, path);
}
