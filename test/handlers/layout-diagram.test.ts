import { describe, test, expect } from 'vitest';
import { handleLayoutDiagram } from '../../src/handlers';
import { InputValidationError } from '../../src/errors';
import { lane, swimlanes } from '../scenarios/builders';
import { parseResult, twoLaneDiagram } from '../helpers';

describe('handleLayoutDiagram', () => {
  test('returns positioned groups, nodes and routed edges', async () => {
    const res = parseResult(await handleLayoutDiagram({ diagram: twoLaneDiagram() }));

    expect(res.success).toBe(true);
    expect(res.warnings).toBeUndefined();
    expect(res.diagram).toMatchObject({
      title: 'Order Flow',
      direction: 'TD',
      canvas: { width: 1200, height: 800 },
      groups: [
        { id: 'sales', label: 'Sales', color: 'green', members: ['take', 'check'], x: 40, y: 40, width: 280, height: 200 },
        { id: 'ops', label: 'Operations', color: 'blue', members: ['ship'], x: 380, y: 40, width: 280, height: 200 },
      ],
      nodes: [
        { id: 'take', group: 'sales', x: 80, y: 90, local: { x: 40, y: 50 } },
        { id: 'check', shape: 'diamond', x: 80, y: 150, local: { x: 40, y: 110 } },
        { id: 'ship', group: 'ops', x: 420, y: 90, local: { x: 40, y: 50 } },
      ],
      edges: [
        { id: 'e0', kind: 'intra', sourceSide: 'bottom', targetSide: 'top', container: 'sales', waypoints: [] },
        {
          id: 'e1',
          label: 'in stock',
          kind: 'forward-cross',
          sourceSide: 'right',
          targetSide: 'left',
          container: null,
          points: [
            { x: 280, y: 170 },
            { x: 420, y: 110 },
          ],
        },
      ],
    });
    expect(res.diagnostics).toEqual({ obstructions: [], crossings: { count: 0, pairs: [] } });
  });

  test('warns about routes passing through nodes', async () => {
    const res = parseResult(
      await handleLayoutDiagram({
        diagram: swimlanes([lane('G1', 'A', 'B'), lane('G2', 'C')], ['C->A']),
      })
    );
    expect(res.warnings).toEqual(["Connection e0 passes through node 'B'"]);
  });

  test('rejects invalid layout overrides', async () => {
    await expect(
      handleLayoutDiagram({ diagram: twoLaneDiagram(), layout: { nodeGap: -5 } })
    ).rejects.toThrow(InputValidationError);
  });
});
