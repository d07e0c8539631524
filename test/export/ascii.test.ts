import { describe, test, expect } from 'vitest';
import { CharGrid, exportAscii } from '../../src/export/ascii';
import { flowchart, lane, laidOut, swimlanes } from '../scenarios/builders';

const BOX_EDGE = `+${'-'.repeat(19)}+`;
const BOX_SIDE = `|${' '.repeat(19)}|`;

describe('CharGrid', () => {
  test('clips writes and crops to content', () => {
    const grid = new CharGrid(10, 5);
    grid.write(3, 1, 'ab');
    grid.write(8, 3, 'xyz');
    grid.set(-1, 0, '#');
    expect(grid.toLines()).toEqual(['ab', '', '     xy']);
  });

  test('an empty grid has no lines', () => {
    expect(new CharGrid(3, 3).toLines()).toEqual([]);
  });
});

describe('exportAscii', () => {
  test('draws boxes joined by an arrow', () => {
    const text = exportAscii(laidOut(flowchart(['A', 'B'], ['A->B'])));
    expect(text.split('\n')).toEqual([
      BOX_EDGE,
      BOX_SIDE,
      `|${' '.repeat(9)}A${' '.repeat(9)}|`,
      BOX_SIDE,
      BOX_EDGE,
      `${' '.repeat(10)}|`,
      `${' '.repeat(10)}|`,
      `${' '.repeat(10)}|`,
      `${' '.repeat(10)}|`,
      `${' '.repeat(10)}v`,
      BOX_EDGE,
      BOX_SIDE,
      `|${' '.repeat(9)}B${' '.repeat(9)}|`,
      BOX_SIDE,
      BOX_EDGE,
      '',
    ]);
  });

  test('frames groups with their label', () => {
    const lines = exportAscii(laidOut(swimlanes([lane('G1', 'A')]))).split('\n');
    expect(lines[0]).toBe(`+${'-'.repeat(27)}+`);
    expect(lines[1]).toBe(`| G1${' '.repeat(24)}|`);
    expect(lines[5]).toBe(`|   ${BOX_EDGE}   |`);
    expect(lines[7]).toBe(`|   |${' '.repeat(9)}A${' '.repeat(9)}|   |`);
    // 21 rows plus the trailing newline
    expect(lines).toHaveLength(22);
  });

  test('puts bottom-label captions under the shape', () => {
    expect(exportAscii(laidOut(flowchart(['E:event'])))).toBe(
      ['+----+', '|    |', '|    |', '|    |', '|    |', '+----+', '  E', ''].join('\n')
    );
  });

  test('flattens multi-line labels', () => {
    const graph = laidOut({ nodes: [{ id: 'n', label: 'two\nlines' }] });
    expect(exportAscii(graph).split('\n')[2]).toBe(`|     two lines     |`);
  });
});
