/**
 * Command line entry
 *
 * mailprobe [scenario ...] [--list] [--json] [--verbose] [--env-file <path>]
 *
 * Exit codes: 0 when every selected scenario passed, 1 when one failed,
 * 2 on a usage or configuration error.
 *
 * @packageDocumentation
 */

import { loadConfig, loadEnvFile, type HarnessConfig } from './config/config.js';
import { createLogger, type LogSink } from './logging/logger.js';
import { runAll } from './scenario/runner.js';
import { SCENARIOS, findScenario } from './scenario/scenarios.js';
import { exitCode, formatJson, formatReport } from './scenario/report.js';
import type { Scenario } from './scenario/step.js';
import { ConfigError } from './types/errors.js';

export const USAGE = `Usage: mailprobe [scenario ...] [options]

Options:
  --list             Print the available scenarios and exit
  --json             Print results as JSON
  --verbose          Log the full protocol transcript
  --env-file <path>  Load environment variables from <path>
  --no-color         Plain text output
  --help             Show this help`;

export interface CliOptions {
  scenarios: string[];
  list: boolean;
  json: boolean;
  verbose: boolean;
  color: boolean;
  help: boolean;
  envFile?: string;
}

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse command line arguments (without the node and script entries)
 * @throws UsageError on an unknown flag or a missing flag value
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    scenarios: [],
    list: false,
    json: false,
    verbose: false,
    color: true,
    help: false
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--list':
        options.list = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--no-color':
        options.color = false;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--env-file': {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('--')) {
          throw new UsageError('--env-file needs a path');
        }
        options.envFile = value;
        i++;
        break;
      }
      default:
        if (arg.startsWith('--env-file=')) {
          options.envFile = arg.slice('--env-file='.length);
        } else if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option ${arg}`);
        } else {
          options.scenarios.push(arg);
        }
    }
  }

  return options;
}

/**
 * Scenarios named on the command line, or all of them
 * @throws UsageError naming every unknown scenario
 */
export function selectScenarios(names: string[]): Scenario[] {
  if (names.length === 0) {
    return [...SCENARIOS];
  }
  const unknown = names.filter(name => !findScenario(name));
  if (unknown.length > 0) {
    throw new UsageError(
      `Unknown scenario ${unknown.join(', ')} (available: ${SCENARIOS.map(s => s.name).join(', ')})`
    );
  }
  return names.flatMap(name => {
    const scenario = findScenario(name);
    return scenario ? [scenario] : [];
  });
}

const defaultIO: CliIO = {
  out: text => console.log(text),
  err: text => console.error(text)
};

/**
 * Run the CLI and resolve to the process exit code
 */
export async function main(
  args: string[],
  io: CliIO = defaultIO,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let options: CliOptions;
  let scenarios: Scenario[];
  try {
    options = parseArgs(args);
    scenarios = selectScenarios(options.scenarios);
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`mailprobe: ${err.message}`);
      io.err(USAGE);
      return 2;
    }
    throw err;
  }

  if (options.help) {
    io.out(USAGE);
    return 0;
  }

  if (options.list) {
    for (const scenario of SCENARIOS) {
      io.out(`${scenario.name.padEnd(24)} ${scenario.description}`);
    }
    return 0;
  }

  let config: HarnessConfig;
  try {
    loadEnvFile(options.envFile);
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.err(`mailprobe: ${err.message}`);
      return 2;
    }
    throw err;
  }

  // Keep stdout clean for JSON output
  const sink: LogSink = (level, line) => {
    if (options.json || level === 'error') {
      io.err(line);
    } else {
      io.out(line);
    }
  };
  const logger = createLogger('mailprobe', {
    minLevel: options.verbose ? 'debug' : config.logLevel,
    sink,
    color: options.color
  });

  const results = await runAll(scenarios, config, logger);

  io.out(options.json ? formatJson(results) : formatReport(results, { color: options.color }));
  return exitCode(results);
}
