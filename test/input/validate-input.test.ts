import { describe, test, expect } from 'vitest';
import { parseDiagramInput, validateDiagramInput } from '../../src/input/validate-input';
import { InputValidationError } from '../../src/errors';

describe('validateDiagramInput', () => {
  test('accepts a minimal flowchart', () => {
    expect(validateDiagramInput({ nodes: [{ id: 'a' }] })).toEqual([]);
  });

  test('accepts a group-only diagram', () => {
    expect(validateDiagramInput({ groups: [{ id: 'g' }] })).toEqual([]);
  });

  test('rejects non-objects', () => {
    expect(validateDiagramInput('nodes')).toEqual(['Input must be a JSON object']);
    expect(validateDiagramInput([])).toEqual(['Input must be a JSON object']);
  });

  test('requires nodes or groups', () => {
    expect(validateDiagramInput({ title: 'x' })).toEqual(["Input must have 'nodes' or 'groups'"]);
  });

  test('checks direction and collection types', () => {
    expect(validateDiagramInput({ direction: 'RL', nodes: {} })).toEqual([
      "'direction' must be one of: TD, LR",
      "'nodes' must be an array",
    ]);
  });

  test('reports node problems in document order', () => {
    expect(
      validateDiagramInput({
        groups: [{ id: 'g' }, { id: 'g' }],
        nodes: [
          'a',
          { label: 'no id' },
          { id: '' },
          { id: 'n1', group: 'missing' },
          { id: 'n1' },
          { id: 'n2', shape: 'star' },
          { id: 'n3', marker: 'user' },
          { id: 'n4', shape: 'event', symbol: 'rocket' },
          { id: 'n5', label: 5 },
        ],
      })
    ).toEqual([
      'Duplicate group id: g',
      'Node 0 must be an object',
      "Node 1 missing 'id'",
      "Node 2 'id' must be a non-empty string",
      "Node 'n1' references unknown group: 'missing'",
      'Duplicate node id: n1',
      "Node 'n2' has unknown shape: 'star'",
      "Node 'n3' sets 'marker' but only 'task' shapes accept it",
      "Node 'n4' has unknown event symbol: 'rocket'",
      "Node 'n5' 'label' must be a string",
    ]);
  });

  test('reports connection problems', () => {
    expect(
      validateDiagramInput({
        nodes: [{ id: 'a' }, { id: 'b' }],
        connections: [
          { to: 'b' },
          { from: 'a', to: 'zz' },
          { from: 'a', to: 'b', style: 'dotted' },
          { from: 'a', to: 'a' },
          7,
        ],
      })
    ).toEqual([
      "Connection 0 missing 'from'",
      "Connection 1 'to' references unknown id: zz",
      "Connection 2 has unknown style: 'dotted'",
      "Connection 3 connects 'a' to itself",
      'Connection 4 must be an object',
    ]);
  });

  test('group ids are not valid connection endpoints', () => {
    expect(
      validateDiagramInput({
        groups: [{ id: 'g' }],
        nodes: [{ id: 'a', group: 'g' }],
        connections: [{ from: 'a', to: 'g' }],
      })
    ).toEqual(["Connection 0 'to' references unknown id: g"]);
  });
});

describe('parseDiagramInput', () => {
  test('returns a typed input with every collection present', () => {
    expect(
      parseDiagramInput({
        title: 'T',
        direction: 'LR',
        groups: [{ id: 'g', label: 'G', color: 'red' }],
        nodes: [{ id: 'a', group: 'g', shape: 'task', marker: 'service', extra: true }],
      })
    ).toEqual({
      title: 'T',
      direction: 'LR',
      groups: [{ id: 'g', label: 'G', color: 'red' }],
      nodes: [{ id: 'a', group: 'g', shape: 'task', marker: 'service' }],
      connections: [],
    });
  });

  test('throws with every issue attached', () => {
    try {
      parseDiagramInput({ nodes: [{ id: 'a' }, { id: 'a' }], direction: 'up' });
      expect.unreachable('parseDiagramInput should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(InputValidationError);
      if (err instanceof InputValidationError) {
        expect(err.issues).toEqual(["'direction' must be one of: TD, LR", 'Duplicate node id: a']);
      }
    }
  });
});
