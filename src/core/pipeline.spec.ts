import type { Diagnostic } from './types.js';
import { layoutPieSource } from './pipeline.js';

const FRONTMATTER = ['---', 'config:', '  pie:', '    donut: true', '    donutWidth: 40', '---'];

describe('layoutPieSource', () => {
  it('should lay out a donut configured in frontmatter', () => {
    const text = [...FRONTMATTER, 'pie showData', '  title Pets', '  "Dogs" : 3', '  "Cats" : 1'].join('\n');

    const { title, layout, errors } = layoutPieSource(text);

    expect(errors).toEqual([]);
    expect(title).toBe('Pets');
    expect(layout?.innerRadius).toBe(130);
    expect(layout?.labels.map(l => l.text)).toEqual(['Dogs 3', 'Cats 1']);
  });

  it('should let overrides win over frontmatter', () => {
    const text = [...FRONTMATTER, 'pie', '"A" : 1'].join('\n');

    const { layout } = layoutPieSource(text, { donut: false });

    expect(layout?.innerRadius).toBe(0);
  });

  it('should drop source labels when labels are switched off', () => {
    const { layout } = layoutPieSource('pie\n"A" : 1\n"B" : 2', { showLabels: false });

    expect(layout?.labels).toEqual([]);
    expect(layout?.anchors).toHaveLength(2);
  });

  it('should honour showLabels from frontmatter', () => {
    const text = ['---', 'config:', '  pie:', '    showLabels: false', '---', 'pie', '"A" : 1'].join('\n');

    const { layout, errors } = layoutPieSource(text);

    expect(errors).toEqual([]);
    expect(layout?.labels).toEqual([]);
  });

  it('should warn about unknown frontmatter keys and still lay out', () => {
    const text = ['---', 'config:', '  pie:', '    colour: red', '---', 'pie', '"A" : 1'].join('\n');

    const { layout, errors } = layoutPieSource(text);

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ line: 4, severity: 'warning', code: 'PIE-CONFIG-UNKNOWN-KEY' });
    expect(layout).not.toBeNull();
  });

  it('should report invalid frontmatter values as errors', () => {
    const text = ['---', 'config:', '  pie:', '    donut: maybe', '---', 'pie', '"A" : 1'].join('\n');

    const { layout, errors } = layoutPieSource(text);

    expect(layout).toBeNull();
    expect(errors[0]).toMatchObject({ line: 4, severity: 'error', code: 'PIE-CONFIG-INVALID' });
  });

  it('should report syntax errors at their source position', () => {
    const { layout, errors } = layoutPieSource('pie\n  Dogs : 3');

    expect(layout).toBeNull();
    expect(errors[0]).toMatchObject({ line: 2, column: 7, code: 'PIE-LABEL-REQUIRES-QUOTES' });
  });

  it('should offset body positions past the frontmatter', () => {
    const text = [...FRONTMATTER, 'pie', '  Dogs : 3'].join('\n');

    const { errors } = layoutPieSource(text);

    expect(errors[0]).toMatchObject({ line: 8, code: 'PIE-LABEL-REQUIRES-QUOTES' });
  });

  it('should report an empty chart', () => {
    const { layout, errors } = layoutPieSource('pie\n');

    expect(layout).toBeNull();
    expect(errors).toEqual([
      {
        line: 1,
        column: 1,
        severity: 'error',
        code: 'PIE-EMPTY-SERIES',
        message: 'Pie chart error: empty series',
        hint: 'Provide at least one value.',
      },
    ]);
  });

  it('should forward geometry warnings to the hook', () => {
    const seen: Diagnostic[] = [];

    const { layout } = layoutPieSource('pie\n"A" : -1\n"B" : 1', {}, { onDiagnostic: d => seen.push(d) });

    expect(seen.map(d => d.code)).toEqual(['PIE-NEGATIVE-VALUE']);
    expect(layout?.diagnostics).toEqual(seen);
  });
});
