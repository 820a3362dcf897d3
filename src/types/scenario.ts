/**
 * Scenario result types for mailprobe
 */

import type { FactValue } from '../protocol/facts.js';

/**
 * Lifecycle of one scenario run. `passed` and `failed` are terminal.
 */
export type ScenarioState = 'not-started' | 'running' | 'passed' | 'failed';

export type StepStatus = 'passed' | 'failed' | 'not-attempted';

/**
 * Error details kept in a step outcome
 */
export interface StepError {
  name: string;
  code?: string;
  message: string;
}

/**
 * What happened to one step
 */
export interface StepOutcome {
  name: string;
  description: string;
  status: StepStatus;
  /** Expected fact, in words */
  expected: string;
  /** Observed fact, when the step got far enough to observe one */
  observed?: string;
  error?: StepError;
  /** Last command sent before the failure */
  lastCommand?: string;
  /** Raw response to that command; undefined means nothing arrived */
  lastResponse?: string;
  durationMs: number;
}

/**
 * Verdict and step outcomes of one scenario run. Frozen once built.
 */
export interface ScenarioResult {
  name: string;
  description: string;
  verdict: 'passed' | 'failed';
  steps: readonly StepOutcome[];
  /** Name of the first failed step */
  failedStep?: string;
  /** Facts the steps recorded (counts, statuses, header results) */
  facts: Readonly<Record<string, FactValue>>;
  startedAt: string;
  durationMs: number;
}
