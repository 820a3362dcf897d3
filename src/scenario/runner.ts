/**
 * Scenario Runner
 *
 * Drives one scenario through not-started → running → passed | failed.
 * The first failing step ends the run: later steps are reported as
 * not-attempted and every session is closed before the result is built.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { ScenarioContext } from './context.js';
import type { Scenario, ScenarioStep } from './step.js';
import type { HarnessConfig } from '../config/config.js';
import type { Logger } from '../logging/logger.js';
import type {
  ScenarioResult,
  ScenarioState,
  StepError,
  StepOutcome
} from '../types/scenario.js';
import {
  AssertionFailure,
  HarnessError,
  TimeoutError,
  toError
} from '../types/errors.js';

export interface RunnerEvents {
  stateChange: (state: ScenarioState) => void;
  step: (outcome: StepOutcome) => void;
}

/**
 * Rejects with TimeoutError once `ms` elapses; the timer is always cleared
 */
export async function withDeadline<T>(work: Promise<T>, ms: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`Scenario deadline passed during ${operation}`, operation, ms));
    }, ms);
  });
  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}

function describeError(err: Error): StepError {
  return {
    name: err.name,
    code: err instanceof HarnessError ? err.code : undefined,
    message: err.message
  };
}

export class ScenarioRun extends EventEmitter {
  readonly scenario: Scenario;
  private readonly config: HarnessConfig;
  private readonly logger: Logger;
  private _state: ScenarioState = 'not-started';

  constructor(scenario: Scenario, config: HarnessConfig, logger: Logger) {
    super();
    this.scenario = scenario;
    this.config = config;
    this.logger = logger.child(scenario.name);
  }

  get state(): ScenarioState {
    return this._state;
  }

  /**
   * Run every step once. A run cannot be restarted.
   */
  async execute(): Promise<ScenarioResult> {
    if (this._state !== 'not-started') {
      throw new HarnessError(
        `Scenario ${this.scenario.name} already ${this._state}`,
        'INVALID_STATE',
        'assertion'
      );
    }

    const started = Date.now();
    const ctx = new ScenarioContext(this.config, this.logger, started);
    const outcomes: StepOutcome[] = [];
    let failedStep: string | undefined;

    this.setState('running');
    this.logger.info(`Running ${this.scenario.name}`);

    try {
      for (const current of this.scenario.steps()) {
        const outcome = failedStep === undefined
          ? await this.runStep(current, ctx)
          : this.skipped(current);
        outcomes.push(outcome);
        this.emit('step', outcome);
        if (outcome.status === 'failed') {
          failedStep ??= current.name;
        }
      }
    } finally {
      await ctx.closeAll();
    }

    const verdict = failedStep === undefined ? 'passed' : 'failed';
    this.setState(verdict);

    const result: ScenarioResult = {
      name: this.scenario.name,
      description: this.scenario.description,
      verdict,
      steps: Object.freeze(outcomes.map(outcome => Object.freeze(outcome))),
      failedStep,
      facts: Object.freeze(ctx.factSummary()),
      startedAt: new Date(started).toISOString(),
      durationMs: Date.now() - started
    };

    if (verdict === 'passed') {
      this.logger.info(`${this.scenario.name} passed`, { durationMs: result.durationMs });
    } else {
      this.logger.error(`${this.scenario.name} failed`, { step: failedStep });
    }
    return Object.freeze(result);
  }

  private async runStep(current: ScenarioStep, ctx: ScenarioContext): Promise<StepOutcome> {
    const started = Date.now();
    const base = {
      name: current.name,
      description: current.description,
      expected: current.expected
    };

    this.logger.debug(`Step ${current.name}: ${current.description}`);

    try {
      const remaining = ctx.remaining();
      if (remaining <= 0) {
        throw new TimeoutError(
          `Scenario deadline passed before ${current.name}`,
          current.name,
          this.config.timeouts.scenario
        );
      }

      const observation = await withDeadline(current.execute(ctx), remaining, current.name);
      if (observation.passed) {
        this.logger.debug(`Step ${current.name} passed`, { observed: observation.observed });
        return {
          ...base,
          status: 'passed',
          observed: observation.observed,
          durationMs: Date.now() - started
        };
      }

      const failure = new AssertionFailure(current.expected, observation.observed);
      const last = ctx.lastExchange;
      return {
        ...base,
        status: 'failed',
        observed: observation.observed,
        error: describeError(failure),
        lastCommand: last.command,
        lastResponse: last.response,
        durationMs: Date.now() - started
      };
    } catch (err) {
      const error = toError(err);
      const last = ctx.lastExchange;
      this.logger.debug(`Step ${current.name} threw`, { error });
      return {
        ...base,
        status: 'failed',
        error: describeError(error),
        lastCommand: last.command ?? (error instanceof HarnessError ? error.command : undefined),
        lastResponse: error instanceof HarnessError && error.response
          ? error.response
          : last.response,
        durationMs: Date.now() - started
      };
    }
  }

  private skipped(current: ScenarioStep): StepOutcome {
    return {
      name: current.name,
      description: current.description,
      expected: current.expected,
      status: 'not-attempted',
      durationMs: 0
    };
  }

  private setState(state: ScenarioState): void {
    this._state = state;
    this.emit('stateChange', state);
  }
}

/**
 * Run scenarios one after another; one scenario's failure never stops the rest
 */
export async function runAll(
  scenarios: Scenario[],
  config: HarnessConfig,
  logger: Logger
): Promise<ScenarioResult[]> {
  const results: ScenarioResult[] = [];
  for (const scenario of scenarios) {
    results.push(await new ScenarioRun(scenario, config, logger).execute());
  }
  return results;
}
