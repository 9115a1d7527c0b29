/**
 * Tests for the Graphviz renderer.
 */
import { describe, it, expect } from 'vitest';
import { renderDot } from '../../../../src/core/images/dot.js';
import { SAMPLE_IMAGES, makeImage } from '../../../fixtures/images.js';

const STYLE = 'shape=box,fillcolor="paleturquoise",style="filled,rounded"';

describe('renderDot', () => {
  it('should render the sample listing in collection order', () => {
    expect(renderDot(SAMPLE_IMAGES).split('\n')).toEqual([
      'digraph docker {',
      ' base -> "aaaaaaaaaaaa" [style=invis]',
      ' "aaaaaaaaaaaa" -> "bbbbbbbbbbbb"',
      ` "bbbbbbbbbbbb" [label="bbbbbbbbbbbb\\nbase:latest\\nbase:1.0",${STYLE}];`,
      ' "bbbbbbbbbbbb" -> "cccccccccccc"',
      ' "bbbbbbbbbbbb" -> "dddddddddddd"',
      ` "dddddddddddd" [label="dddddddddddd\\napp:latest",${STYLE}];`,
      ' base -> "eeeeeeeeeeee" [style=invis]',
      ` "eeeeeeeeeeee" [label="eeeeeeeeeeee\\nregistry:5000/tools:2.1",${STYLE}];`,
      ' "cccccccccccc" -> "ffffffffffff"',
      ` "ffffffffffff" [label="ffffffffffff\\nworker:dev",${STYLE}];`,
      ' base [style=invisible]',
      '}',
      '',
    ]);
  });

  it('should emit one base edge per root and one edge per non-root image', () => {
    const lines = renderDot(SAMPLE_IMAGES).split('\n');

    expect(lines.filter((line) => line.startsWith(' base -> ')).length).toBe(2);
    expect(lines.filter((line) => / "\w{12}" -> "\w{12}"$/.test(line)).length).toBe(4);
  });

  it('should style tagged images only', () => {
    const lines = renderDot(SAMPLE_IMAGES).split('\n');

    expect(lines.filter((line) => line.includes('[label=')).length).toBe(4);
    expect(lines.some((line) => line.startsWith(' "aaaaaaaaaaaa" [label='))).toBe(false);
    expect(lines.some((line) => line.startsWith(' "cccccccccccc" [label='))).toBe(false);
  });

  it('should render an empty graph with only the base node', () => {
    expect(renderDot([])).toBe('digraph docker {\n base [style=invisible]\n}\n');
  });

  it('should draw an edge from a dangling parent', () => {
    const output = renderDot([makeImage({ id: 'orph00000000000001', parentId: 'gone00000000000001' })]);

    expect(output).toContain(' "gone00000000" -> "orph00000000"\n');
  });
});
