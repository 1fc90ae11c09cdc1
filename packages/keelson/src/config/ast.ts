/**
 * Configuration tree handed to components.
 *
 * The tree carries no schema knowledge: whether a map is a nested block or a
 * map-of-strings attribute is decided by the component schema when decoding.
 */
import type { SourceRange } from '../core/diagnostics';

export type Scalar = string | number | boolean | null;

export interface ScalarNode {
  type: 'scalar';
  value: Scalar;
  range?: SourceRange;
}

export interface ListNode {
  type: 'list';
  items: ConfigNode[];
  range?: SourceRange;
}

export interface MapEntry {
  key: string;
  value: ConfigNode;
  range?: SourceRange;
}

export interface MapNode {
  type: 'map';
  entries: MapEntry[];
  range?: SourceRange;
}

export type ConfigNode = ScalarNode | ListNode | MapNode;

/** A component configuration block. */
export type ConfigBody = MapNode;

export type PlainValue = Scalar | PlainValue[] | { [key: string]: PlainValue };

/**
 * Build a configuration tree from a plain value. Used for programmatic
 * configuration and tests; nodes carry no source range.
 */
export function toNode(value: PlainValue): ConfigNode {
  if (Array.isArray(value)) {
    return { type: 'list', items: value.map(toNode) };
  }
  if (value !== null && typeof value === 'object') {
    return {
      type: 'map',
      entries: Object.entries(value).map(([key, v]) => ({ key, value: toNode(v) })),
    };
  }
  return { type: 'scalar', value };
}

export function toBody(value: { [key: string]: PlainValue }): ConfigBody {
  return {
    type: 'map',
    entries: Object.entries(value).map(([key, v]) => ({ key, value: toNode(v) })),
  };
}

export function emptyBody(range?: SourceRange): ConfigBody {
  return range ? { type: 'map', entries: [], range } : { type: 'map', entries: [] };
}

export function describeNode(node: ConfigNode): string {
  switch (node.type) {
    case 'list':
      return 'list';
    case 'map':
      return 'map';
    case 'scalar':
      return node.value === null ? 'null' : typeof node.value;
  }
}
