import { deepmergeCustom } from 'deepmerge-ts';
import { parse } from 'yaml';
import { errorDiagnostic, type Diagnostic } from '../core/diagnostics';
import { describeError } from '../core/errors';

export type ChartValues = Record<string, unknown>;

function isRecord(value: unknown): value is ChartValues {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Parse the free-form `values` attribute (YAML text of extra chart values).
 * An empty string means no overrides.
 */
export function parseValuesOverride(text: string, attribute = 'values'): { values: ChartValues; diagnostics: Diagnostic[] } {
  if (text.trim() === '') {
    return { values: {}, diagnostics: [] };
  }

  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error) {
    return {
      values: {},
      diagnostics: [errorDiagnostic(`error parsing '${attribute}'`, `error parsing '${attribute}': ${describeError(error)}`)],
    };
  }

  if (parsed === null || parsed === undefined) {
    return { values: {}, diagnostics: [] };
  }
  if (!isRecord(parsed)) {
    return {
      values: {},
      diagnostics: [errorDiagnostic(`error parsing '${attribute}'`, `'${attribute}' must be a YAML map of chart values`)],
    };
  }
  return { values: parsed, diagnostics: [] };
}

const mergeReplacingArrays = deepmergeCustom({ mergeArrays: false });

/** Component defaults overlaid with user overrides; arrays are replaced, not concatenated. */
export function mergeValues(base: ChartValues, overrides: ChartValues): ChartValues {
  if (Object.keys(overrides).length === 0) {
    return base;
  }
  const merged: unknown = mergeReplacingArrays(base, overrides);
  return isRecord(merged) ? merged : base;
}
