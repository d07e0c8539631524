/**
 * Error taxonomy for the diagram engine and its MCP surface.
 *
 * Structural problems with the input are detected eagerly while the graph
 * is built and abort the whole layout: no partially positioned diagram is
 * ever returned.  `LayoutInvariantViolation` signals an internal bug and is
 * never expected for valid input.
 *
 * Every error carries a stable `code` (one of the `ERR_*` constants) and the
 * offending id/field so that callers can surface it verbatim.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

// ── Error codes ────────────────────────────────────────────────────────────

export const ERR_MISSING_REQUIRED = 'ERR_MISSING_REQUIRED';
export const ERR_INVALID_INPUT = 'ERR_INVALID_INPUT';
export const ERR_DUPLICATE = 'ERR_DUPLICATE';
export const ERR_UNKNOWN_REFERENCE = 'ERR_UNKNOWN_REFERENCE';
export const ERR_INVALID_SHAPE_ATTRIBUTE = 'ERR_INVALID_SHAPE_ATTRIBUTE';
export const ERR_SELF_LOOP = 'ERR_SELF_LOOP';
export const ERR_STYLE_NOT_FOUND = 'ERR_STYLE_NOT_FOUND';
export const ERR_LAYOUT_INVARIANT = 'ERR_LAYOUT_INVARIANT';
export const ERR_EXPORT_FAILED = 'ERR_EXPORT_FAILED';

export type DiagramErrorCode =
  | typeof ERR_MISSING_REQUIRED
  | typeof ERR_INVALID_INPUT
  | typeof ERR_DUPLICATE
  | typeof ERR_UNKNOWN_REFERENCE
  | typeof ERR_INVALID_SHAPE_ATTRIBUTE
  | typeof ERR_SELF_LOOP
  | typeof ERR_STYLE_NOT_FOUND
  | typeof ERR_LAYOUT_INVARIANT
  | typeof ERR_EXPORT_FAILED;

// ── Base class ─────────────────────────────────────────────────────────────

export abstract class DiagramError extends Error {
  abstract readonly code: DiagramErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Structured payload attached to the MCP error. */
  toData(): Record<string, unknown> {
    return { code: this.code };
  }
}

// ── Structural input errors ────────────────────────────────────────────────

/** Bad input: duplicate id, unknown reference, invalid shape attribute. */
export abstract class StructuralInputError extends DiagramError {}

export class DuplicateNodeError extends StructuralInputError {
  readonly code = ERR_DUPLICATE;

  constructor(readonly nodeId: string) {
    super(`Duplicate node id: ${nodeId}`);
  }

  override toData(): Record<string, unknown> {
    return { code: this.code, nodeId: this.nodeId };
  }
}

export class DuplicateGroupError extends StructuralInputError {
  readonly code = ERR_DUPLICATE;

  constructor(readonly groupId: string) {
    super(`Duplicate group id: ${groupId}`);
  }

  override toData(): Record<string, unknown> {
    return { code: this.code, groupId: this.groupId };
  }
}

export class UnknownNodeReferenceError extends StructuralInputError {
  readonly code = ERR_UNKNOWN_REFERENCE;

  /**
   * @param referencedId  The id that could not be resolved.
   * @param field         Where the reference came from, e.g. `connections[2].to`.
   */
  constructor(
    readonly referencedId: string,
    readonly field: string
  ) {
    super(`${field} references unknown id: ${referencedId}`);
  }

  override toData(): Record<string, unknown> {
    return { code: this.code, referencedId: this.referencedId, field: this.field };
  }
}

export class InvalidShapeAttributeError extends StructuralInputError {
  readonly code = ERR_INVALID_SHAPE_ATTRIBUTE;

  constructor(
    readonly nodeId: string,
    readonly attribute: string,
    message: string
  ) {
    super(message);
  }

  override toData(): Record<string, unknown> {
    return { code: this.code, nodeId: this.nodeId, attribute: this.attribute };
  }
}

export class SelfLoopError extends StructuralInputError {
  readonly code = ERR_SELF_LOOP;

  constructor(
    readonly nodeId: string,
    readonly field: string
  ) {
    super(`${field} connects ${nodeId} to itself; self-loop connections are not supported`);
  }

  override toData(): Record<string, unknown> {
    return { code: this.code, nodeId: this.nodeId, field: this.field };
  }
}

// ── Input validation / configuration errors ────────────────────────────────

/** Schema-level problems with raw input; lists every issue found. */
export class InputValidationError extends DiagramError {
  readonly code = ERR_INVALID_INPUT;

  constructor(readonly issues: string[]) {
    super(`Invalid diagram input:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
  }

  override toData(): Record<string, unknown> {
    return { code: this.code, issues: this.issues };
  }
}

export class MissingRequiredError extends DiagramError {
  readonly code = ERR_MISSING_REQUIRED;

  constructor(readonly missing: string[]) {
    super(`Missing required argument(s): ${missing.join(', ')}`);
  }

  override toData(): Record<string, unknown> {
    return { code: this.code, missing: this.missing };
  }
}

export class StyleNotFoundError extends DiagramError {
  readonly code = ERR_STYLE_NOT_FOUND;

  constructor(
    readonly styleName: string,
    readonly available: string[]
  ) {
    super(`Style '${styleName}' not found. Available: ${available.join(', ') || '(none)'}`);
  }

  override toData(): Record<string, unknown> {
    return { code: this.code, style: this.styleName, available: this.available };
  }
}

export class ExportFailedError extends DiagramError {
  readonly code = ERR_EXPORT_FAILED;
}

// ── Internal failures ──────────────────────────────────────────────────────

/** Internal consistency failure: a bug, not bad input. */
export class LayoutInvariantViolation extends DiagramError {
  readonly code = ERR_LAYOUT_INVARIANT;
}

// ── MCP conversion ─────────────────────────────────────────────────────────

/** True for errors caused by the caller's input rather than by the engine. */
export function isCallerError(err: unknown): err is DiagramError {
  return (
    err instanceof StructuralInputError ||
    err instanceof InputValidationError ||
    err instanceof MissingRequiredError ||
    err instanceof StyleNotFoundError
  );
}

/**
 * Convert any thrown value into an `McpError`.
 *
 * Caller errors map to `InvalidParams`, everything else to `InternalError`.
 * Existing `McpError`s pass through unchanged.
 */
export function toMcpError(err: unknown, context?: string): McpError {
  if (err instanceof McpError) return err;

  const prefix = context ? `${context}: ` : '';
  if (err instanceof DiagramError) {
    const code = isCallerError(err) ? ErrorCode.InvalidParams : ErrorCode.InternalError;
    return new McpError(code, `${prefix}${err.message}`, err.toData());
  }

  const message = err instanceof Error ? err.message : String(err);
  return new McpError(ErrorCode.InternalError, `${prefix}${message}`);
}
