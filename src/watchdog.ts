// src/watchdog.ts
import type { Interpreter } from './interp.js';
import type { RuntimeError } from './errors.js';
import type { ExecutionState } from './types.js';
import { ok, err } from './result.js';
import type { Result } from './result.js';

export class StepLimitError extends Error {
  constructor(
    public readonly limit: number,
    public readonly position: number,
  ) {
    super(`Step limit (${limit}) exceeded at PC=${position}`);
    this.name = 'StepLimitError';
  }
}

/**
 * Steps `interp` until it finishes, fails, or has executed `maxSteps`
 * instructions without finishing.
 */
export const runBounded = (
  interp: Interpreter,
  maxSteps: number,
): Result<ExecutionState, RuntimeError | StepLimitError> => {
  let steps = 0;
  while (!interp.done) {
    if (steps >= maxSteps) {
      return err(new StepLimitError(maxSteps, interp.instructionPointer));
    }
    const stepped = interp.step();
    if (!stepped.ok) return stepped;
    steps++;
  }
  return ok(interp.state());
};
