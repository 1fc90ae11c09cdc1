import { describe, expect, it } from 'vitest';

import { mergeValues, parseValuesOverride } from '../src/render/values';

describe('parseValuesOverride', () => {
  it('treats empty text as no overrides', () => {
    expect(parseValuesOverride('  \n')).toEqual({ values: {}, diagnostics: [] });
  });

  it('parses a YAML map', () => {
    expect(parseValuesOverride('replicas: 2\nimage:\n  tag: v1\n')).toEqual({
      values: { replicas: 2, image: { tag: 'v1' } },
      diagnostics: [],
    });
  });

  it('reports YAML errors against the attribute', () => {
    const { values, diagnostics } = parseValuesOverride('image: [v1', 'extra_values');

    expect(values).toEqual({});
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.summary).toBe("error parsing 'extra_values'");
  });
});

describe('mergeValues', () => {
  it('merges maps deeply and replaces lists', () => {
    const base = { image: { repository: 'contour', tag: 'v1' }, args: ['--a'], replicas: 1 };

    expect(mergeValues(base, { image: { tag: 'v2' }, args: ['--b'] })).toEqual({
      image: { repository: 'contour', tag: 'v2' },
      args: ['--b'],
      replicas: 1,
    });
  });

  it('leaves the base untouched', () => {
    const base = { image: { tag: 'v1' } };

    mergeValues(base, { image: { tag: 'v2' } });

    expect(base).toEqual({ image: { tag: 'v1' } });
  });
});
