/**
 * PipelineRunner: sequential executor for layout pipeline steps.
 *
 * Each step is:
 *  - Timed and logged via {@link LayoutLogger}.
 *  - Optionally skipped when its `skip` predicate returns `true`.
 *  - Wrapped in structured error handling: structural input errors and
 *    invariant violations pass through untouched, anything else is
 *    re-thrown as a `LayoutInvariantViolation` naming the failing step.
 *
 * ### Usage
 * ```typescript
 * const runner = new PipelineRunner(steps, log);
 * runner.run(ctx);
 * ```
 *
 * `getStepNames()` returns the ordered list of step names so tests can
 * assert the pass order without running a layout.
 */

import { LayoutInvariantViolation, StructuralInputError } from '../errors';
import type { LayoutContext, PipelineStep } from './types';
import type { LayoutLogger } from './layout-logger';

export class PipelineRunner {
  /** The ordered steps this runner will execute. */
  readonly steps: readonly PipelineStep[];

  private readonly log: LayoutLogger;

  constructor(steps: readonly PipelineStep[], log: LayoutLogger) {
    this.steps = steps;
    this.log = log;
  }

  /**
   * Execute all steps in order against the given context.
   *
   * Steps whose `skip(ctx)` predicate returns `true` are bypassed.
   */
  run(ctx: LayoutContext): void {
    for (const step of this.steps) {
      if (step.skip?.(ctx)) {
        this.log.note('skip', step.name);
        continue;
      }

      try {
        this.log.step(step.name, () => step.run(ctx));
      } catch (err) {
        if (err instanceof StructuralInputError || err instanceof LayoutInvariantViolation) {
          throw err;
        }
        const msg = err instanceof Error ? err.message : String(err);
        throw new LayoutInvariantViolation(`Pipeline step "${step.name}" failed: ${msg}`, {
          cause: err,
        });
      }
    }
  }

  /** Return the names of all steps in their execution order. */
  getStepNames(): string[] {
    return this.steps.map((s) => s.name);
  }
}
