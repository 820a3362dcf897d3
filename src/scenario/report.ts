/**
 * Text and JSON reports of scenario results
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { ScenarioResult, StepOutcome } from '../types/scenario.js';

export interface ReportOptions {
  color?: boolean;
}

const MAX_RESPONSE_LINES = 20;

function indent(text: string, prefix: string): string {
  const lines = text.replace(/\r\n/g, '\n').replace(/\n$/, '').split('\n');
  const shown = lines.slice(0, MAX_RESPONSE_LINES);
  if (lines.length > shown.length) {
    shown.push(`... (${lines.length - shown.length} more lines)`);
  }
  return shown.map(line => `${prefix}${line}`).join('\n');
}

function stepLine(outcome: StepOutcome, paint: ChalkInstance): string {
  switch (outcome.status) {
    case 'passed':
      return `  ${paint.green('✓')} ${outcome.name}${outcome.observed ? paint.gray(` (${outcome.observed})`) : ''}`;
    case 'failed':
      return `  ${paint.red('✗')} ${outcome.name}`;
    case 'not-attempted':
      return `  ${paint.gray('-')} ${paint.gray(`${outcome.name} (not attempted)`)}`;
  }
}

function failureDetail(outcome: StepOutcome): string[] {
  const lines = [`      expected: ${outcome.expected}`];
  if (outcome.observed !== undefined) {
    lines.push(`      observed: ${outcome.observed}`);
  }
  if (outcome.error && outcome.error.name !== 'AssertionFailure') {
    lines.push(`      error: ${outcome.error.name}: ${outcome.error.message}`);
  }
  lines.push(`      last command: ${outcome.lastCommand ?? '(none)'}`);
  if (outcome.lastResponse === undefined || outcome.lastResponse === '') {
    lines.push('      last response: no response');
  } else {
    lines.push('      last response:');
    lines.push(indent(outcome.lastResponse, '        '));
  }
  return lines;
}

/**
 * Human-readable report, one block per scenario plus a totals line
 */
export function formatReport(results: readonly ScenarioResult[], options: ReportOptions = {}): string {
  const paint = options.color === false ? new Chalk({ level: 0 }) : chalk;
  const out: string[] = [];

  for (const result of results) {
    const verdict = result.verdict === 'passed' ? paint.green.bold('PASS') : paint.red.bold('FAIL');
    out.push(`${verdict} ${result.name} ${paint.gray(`(${result.durationMs}ms)`)}`);

    for (const outcome of result.steps) {
      out.push(stepLine(outcome, paint));
      if (outcome.status === 'failed') {
        out.push(...failureDetail(outcome));
      }
    }

    const facts = Object.entries(result.facts);
    if (facts.length > 0) {
      out.push(paint.gray(`  facts: ${facts.map(([key, value]) => `${key}=${String(value)}`).join(', ')}`));
    }
    out.push('');
  }

  const passed = results.filter(result => result.verdict === 'passed').length;
  const failed = results.length - passed;
  const summary = `${passed} passed, ${failed} failed`;
  out.push(failed === 0 ? paint.green(summary) : paint.red(summary));
  return out.join('\n');
}

/**
 * Results as pretty-printed JSON
 */
export function formatJson(results: readonly ScenarioResult[]): string {
  return JSON.stringify(
    {
      passed: results.every(result => result.verdict === 'passed'),
      scenarios: results
    },
    null,
    2
  );
}

/**
 * 0 only when every scenario passed
 */
export function exitCode(results: readonly ScenarioResult[]): number {
  return results.length > 0 && results.every(result => result.verdict === 'passed') ? 0 : 1;
}
