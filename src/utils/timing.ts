import type { PerformanceSummary, StepTiming } from '../types.js';

/**
 * Totals step timings and picks the slowest step; ties go to the earliest.
 *
 * @example
 * ```typescript
 * summarizeTimings([{ state: 'EXECUTING', elapsedMs: 40 }, { state: 'ANSWERING', elapsedMs: 900 }]);
 * // { totalMs: 940, steps: [...], slowest: { state: 'ANSWERING', elapsedMs: 900 } }
 * ```
 */
export function summarizeTimings(steps: readonly StepTiming[]): PerformanceSummary {
  let totalMs = 0;
  let slowest: StepTiming | null = null;
  for (const step of steps) {
    totalMs += step.elapsedMs;
    if (!slowest || step.elapsedMs > slowest.elapsedMs) slowest = step;
  }
  return {
    totalMs,
    steps: steps.map(step => ({ ...step })),
    slowest: slowest ? { ...slowest } : null,
  };
}
