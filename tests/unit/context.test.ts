import { describe, it, expect } from 'vitest';
import { ScenarioContext } from '../../src/scenario/context.js';
import { loadConfig } from '../../src/config/config.js';
import { createLogger } from '../../src/logging/logger.js';

const logger = createLogger('test', { sink: () => undefined, color: false });

describe('ScenarioContext', () => {
  it('builds session options from the configured endpoint and timeouts', () => {
    const config = loadConfig({
      IMAP_HOST: 'imap.example.com',
      IMAP_PORT: '993',
      IMAP_TLS: 'true',
      TLS_REJECT_UNAUTHORIZED: 'false',
      CONNECT_TIMEOUT_MS: '1500',
      COMMAND_TIMEOUT_MS: '2500',
      POLL_INTERVAL_MS: '50',
      SCENARIO_TIMEOUT_MS: '9000'
    });
    const ctx = new ScenarioContext(config, logger, 1000);

    expect(ctx.sessionOptions(config.imap)).toEqual({
      host: 'imap.example.com',
      port: 993,
      tls: true,
      tlsOptions: { rejectUnauthorized: false },
      connTimeout: 1500,
      commandTimeout: 2500,
      pollInterval: 50,
      deadline: 10000
    });
  });

  it('keeps only the latest fact under a name', () => {
    const ctx = new ScenarioContext(loadConfig({}), logger);
    ctx.record('messageCount', 1);
    ctx.record('messageCount', 3);
    expect(ctx.factSummary()).toEqual({ messageCount: 3 });
  });
});
