/**
 * Per-invocation layout logger.
 *
 * Records step timings and free-form notes for one layout run.  Output
 * goes to stderr (stdout carries the MCP protocol) and only when debug
 * logging is enabled, either explicitly or through `DIAGRAM_LAYOUT_DEBUG`.
 */

import { isLayoutDebugEnabled } from '../config';

export interface LayoutLogger {
  /** Record a note under the given phase label. */
  note(phase: string, message: string): void;
  /** Start timing a named step. */
  beginStep(name: string): void;
  /** Stop timing the current step. */
  endStep(): void;
  /** Run `fn` as a timed step and return its result. */
  step<T>(name: string, fn: () => T): T;
  /** Emit the summary line for the run. */
  finish(): void;
  /** Names of the steps run so far, in order. */
  readonly stepNames: readonly string[];
}

export interface LayoutLoggerOptions {
  /** Force logging on or off; defaults to the environment setting. */
  enabled?: boolean;
  /** Line sink; defaults to `console.error`. */
  write?: (line: string) => void;
}

export function createLayoutLogger(name: string, options: LayoutLoggerOptions = {}): LayoutLogger {
  const enabled = options.enabled ?? isLayoutDebugEnabled();
  const write = options.write ?? ((line: string) => console.error(line));
  const stepNames: string[] = [];
  const started = performance.now();
  let current: { name: string; start: number } | null = null;

  const emit = (line: string): void => {
    if (enabled) write(`[${name}] ${line}`);
  };

  const logger: LayoutLogger = {
    stepNames,
    note(phase, message) {
      emit(`${phase}: ${message}`);
    },
    beginStep(stepName) {
      current = { name: stepName, start: performance.now() };
      stepNames.push(stepName);
    },
    endStep() {
      if (!current) return;
      emit(`step ${current.name} ${(performance.now() - current.start).toFixed(2)}ms`);
      current = null;
    },
    step(stepName, fn) {
      logger.beginStep(stepName);
      try {
        return fn();
      } finally {
        logger.endStep();
      }
    },
    finish() {
      emit(`done in ${(performance.now() - started).toFixed(2)}ms (${stepNames.length} steps)`);
    },
  };

  return logger;
}
