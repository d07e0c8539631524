import { describe, test, expect } from 'vitest';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import {
  DuplicateNodeError,
  ERR_LAYOUT_INVARIANT,
  ExportFailedError,
  InputValidationError,
  isCallerError,
  LayoutInvariantViolation,
  StyleNotFoundError,
  toMcpError,
  UnknownNodeReferenceError,
} from '../src/errors';

describe('errors', () => {
  test('error names follow their class', () => {
    expect(new DuplicateNodeError('a').name).toBe('DuplicateNodeError');
    expect(new LayoutInvariantViolation('x').name).toBe('LayoutInvariantViolation');
  });

  test('input validation errors list every issue in the message', () => {
    expect(new InputValidationError(['one', 'two']).message).toBe(
      'Invalid diagram input:\n  - one\n  - two'
    );
  });

  test('caller errors are distinguished from internal ones', () => {
    expect(isCallerError(new UnknownNodeReferenceError('x', 'nodes[0].group'))).toBe(true);
    expect(isCallerError(new StyleNotFoundError('neon', []))).toBe(true);
    expect(isCallerError(new LayoutInvariantViolation('bug'))).toBe(false);
    expect(isCallerError(new ExportFailedError('disk full'))).toBe(false);
    expect(isCallerError(new Error('plain'))).toBe(false);
  });
});

describe('toMcpError', () => {
  test('caller errors become InvalidParams with their data', () => {
    const err = toMcpError(new UnknownNodeReferenceError('ghost', 'connections[1].to'), 'layout_diagram');
    expect(err.code).toBe(ErrorCode.InvalidParams);
    expect(err.message).toContain('layout_diagram: connections[1].to references unknown id: ghost');
    expect(err.data).toEqual({
      code: 'ERR_UNKNOWN_REFERENCE',
      referencedId: 'ghost',
      field: 'connections[1].to',
    });
  });

  test('internal failures become InternalError', () => {
    const err = toMcpError(new LayoutInvariantViolation('negative extent'));
    expect(err.code).toBe(ErrorCode.InternalError);
    expect(err.data).toEqual({ code: ERR_LAYOUT_INVARIANT });
  });

  test('foreign errors keep their message', () => {
    const err = toMcpError(new Error('boom'), 'ctx');
    expect(err.code).toBe(ErrorCode.InternalError);
    expect(err.message).toContain('ctx: boom');
  });

  test('McpErrors pass through unchanged', () => {
    const original = new McpError(ErrorCode.InvalidRequest, 'nope');
    expect(toMcpError(original)).toBe(original);
  });
});
