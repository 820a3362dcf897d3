/**
 * Scenario steps
 */

import type { ScenarioContext } from './context.js';

/**
 * A step as written by a scenario author: an action producing an
 * observed fact and a predicate over it
 */
export interface StepDefinition<F> {
  name: string;
  description: string;
  /** Expected fact, in words */
  expected: string;
  action: (ctx: ScenarioContext) => Promise<F>;
  check: (fact: F) => boolean;
  /** Renders the observed fact; defaults to JSON for objects */
  show?: (fact: F) => string;
}

export interface StepObservation {
  passed: boolean;
  observed: string;
}

/**
 * A step with its fact type erased, ready for the runner
 */
export interface ScenarioStep {
  readonly name: string;
  readonly description: string;
  readonly expected: string;
  execute(ctx: ScenarioContext): Promise<StepObservation>;
}

export interface Scenario {
  name: string;
  description: string;
  /** Builds fresh steps (and their shared state) for one run */
  steps(): ScenarioStep[];
}

function defaultShow(fact: unknown): string {
  if (typeof fact === 'string') {
    return fact;
  }
  if (fact === undefined) {
    return 'nothing';
  }
  return JSON.stringify(fact);
}

export function step<F>(definition: StepDefinition<F>): ScenarioStep {
  const show = definition.show ?? defaultShow;
  return {
    name: definition.name,
    description: definition.description,
    expected: definition.expected,
    async execute(ctx) {
      const fact = await definition.action(ctx);
      return { passed: definition.check(fact), observed: show(fact) };
    }
  };
}
