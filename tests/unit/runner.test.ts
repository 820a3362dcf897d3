import { describe, it, expect } from 'vitest';
import { ScenarioRun, runAll, withDeadline } from '../../src/scenario/runner.js';
import { step, type Scenario } from '../../src/scenario/step.js';
import { loadConfig } from '../../src/config/config.js';
import { createLogger } from '../../src/logging/logger.js';
import { ProtocolViolationError, TimeoutError } from '../../src/types/errors.js';
import type { ScenarioState } from '../../src/types/scenario.js';

const config = loadConfig({ SCENARIO_TIMEOUT_MS: '300' });
const logger = createLogger('test', { sink: () => undefined, color: false });

function scenario(name: string, steps: Scenario['steps']): Scenario {
  return { name, description: `${name} description`, steps };
}

const passing = scenario('passing', () => [
  step({
    name: 'count',
    description: 'Count things',
    expected: 'at least one',
    action: async ctx => {
      ctx.record('count', 2);
      return 2;
    },
    check: n => n >= 1
  }),
  step({
    name: 'greet',
    description: 'Say hello',
    expected: 'hello',
    action: async () => 'hello',
    check: text => text === 'hello'
  })
]);

describe('ScenarioRun', () => {
  it('passes when every step passes and keeps recorded facts', async () => {
    const result = await new ScenarioRun(passing, config, logger).execute();
    expect(result.verdict).toBe('passed');
    expect(result.failedStep).toBeUndefined();
    expect(result.facts).toEqual({ count: 2 });
    expect(result.steps.map(s => [s.name, s.status, s.observed])).toEqual([
      ['count', 'passed', '2'],
      ['greet', 'passed', 'hello']
    ]);
  });

  it('moves through running to a terminal state', async () => {
    const run = new ScenarioRun(passing, config, logger);
    const states: ScenarioState[] = [];
    run.on('stateChange', (state: ScenarioState) => states.push(state));
    expect(run.state).toBe('not-started');
    await run.execute();
    expect(states).toEqual(['running', 'passed']);
    expect(run.state).toBe('passed');
  });

  it('cannot be executed twice', async () => {
    const run = new ScenarioRun(passing, config, logger);
    await run.execute();
    await expect(run.execute()).rejects.toThrow('Scenario passing already passed');
  });

  it('freezes the result', async () => {
    const result = await new ScenarioRun(passing, config, logger).execute();
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.steps)).toBe(true);
    expect(Object.isFrozen(result.steps[0])).toBe(true);
  });

  it('stops at a failed predicate and skips the rest', async () => {
    const failing = scenario('failing', () => [
      step({
        name: 'check-count',
        description: 'Count must be positive',
        expected: 'count >= 1',
        action: async ctx => {
          ctx.note('A003 SELECT INBOX', '* 0 EXISTS\r\nA003 OK done\r\n');
          return 0;
        },
        check: n => n >= 1,
        show: n => `count ${n}`
      }),
      step({
        name: 'never',
        description: 'Not reached',
        expected: 'anything',
        action: async () => {
          throw new Error('should not run');
        },
        check: () => true
      })
    ]);

    const result = await new ScenarioRun(failing, config, logger).execute();
    expect(result.verdict).toBe('failed');
    expect(result.failedStep).toBe('check-count');
    expect(result.steps[0]).toMatchObject({
      status: 'failed',
      expected: 'count >= 1',
      observed: 'count 0',
      error: { name: 'AssertionFailure', code: 'ASSERTION_FAILED', message: 'Expected count >= 1, observed count 0' },
      lastCommand: 'A003 SELECT INBOX',
      lastResponse: '* 0 EXISTS\r\nA003 OK done\r\n'
    });
    expect(result.steps[1]).toEqual({
      name: 'never',
      description: 'Not reached',
      expected: 'anything',
      status: 'not-attempted',
      durationMs: 0
    });
  });

  it('records a thrown error with its command and response', async () => {
    const throwing = scenario('throwing', () => [
      step({
        name: 'boom',
        description: 'Throws a protocol violation',
        expected: 'tagged OK',
        action: async (): Promise<string> => {
          throw new ProtocolViolationError('IMAP protocol violation: stray tag', 'Z1 OK\r\n', 'A001 NOOP');
        },
        check: () => true
      })
    ]);

    const result = await new ScenarioRun(throwing, config, logger).execute();
    expect(result.steps[0]).toMatchObject({
      status: 'failed',
      error: { name: 'ProtocolViolationError', code: 'PROTOCOL_VIOLATION' },
      lastCommand: 'A001 NOOP',
      lastResponse: 'Z1 OK\r\n'
    });
    expect(result.steps[0].observed).toBeUndefined();
  });

  it('fails a step that outlives the scenario deadline', async () => {
    const hanging = scenario('hanging', () => [
      step({
        name: 'hang',
        description: 'Never settles',
        expected: 'a reply',
        action: () => new Promise<string>(() => undefined),
        check: () => true
      }),
      step({
        name: 'after',
        description: 'Not reached',
        expected: 'anything',
        action: async () => 'x',
        check: () => true
      })
    ]);

    const started = Date.now();
    const result = await new ScenarioRun(hanging, config, logger).execute();
    expect(Date.now() - started).toBeLessThan(2000);
    expect(result.verdict).toBe('failed');
    expect(result.steps[0].error?.name).toBe('TimeoutError');
    expect(result.steps[1].status).toBe('not-attempted');
  });
});

describe('runAll', () => {
  it('runs every scenario even after a failure', async () => {
    const broken = scenario('broken', () => [
      step({
        name: 'fail',
        description: 'Always fails',
        expected: 'true',
        action: async () => false,
        check: value => value
      })
    ]);
    const results = await runAll([broken, passing], config, logger);
    expect(results.map(r => [r.name, r.verdict])).toEqual([
      ['broken', 'failed'],
      ['passing', 'passed']
    ]);
  });

  it('builds fresh step state for every run', async () => {
    let built = 0;
    const counting = scenario('counting', () => {
      built++;
      return [];
    });
    await runAll([counting, counting], config, logger);
    expect(built).toBe(2);
  });
});

describe('withDeadline', () => {
  it('resolves with the work result in time', async () => {
    await expect(withDeadline(Promise.resolve(5), 100, 'quick')).resolves.toBe(5);
  });

  it('rejects with TimeoutError when time runs out', async () => {
    const attempt = withDeadline(new Promise(() => undefined), 20, 'slow');
    await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
    await expect(attempt).rejects.toThrow('Scenario deadline passed during slow');
  });
});
