/**
 * mailprobe - end-to-end conformance checks for SMTP and IMAP servers
 *
 * @packageDocumentation
 */

export * from './types/index.js';
export * from './transport/index.js';
export * from './protocol/index.js';
export * from './mime/index.js';

export { CommandBuilder, SmtpCommands, escapeString, type FetchItems } from './commands/builder.js';

export { MailboxInspector, type MailboxInspectorOptions } from './mailbox/inspector.js';

export {
  composeMessage,
  formatDateHeader,
  formatTimestamp,
  type OutboundMessage
} from './submission/message.js';
export {
  RawSubmitter,
  LibrarySubmitter,
  createSubmitter,
  type Submitter,
  type SubmitterOptions,
  type SubmissionReceipt
} from './submission/submitter.js';

export { loadConfig, loadEnvFile, type HarnessConfig, type Endpoint } from './config/config.js';
export { Logger, createLogger, consoleSink, type LogLevel, type LogSink, type LoggerOptions } from './logging/logger.js';

export { ScenarioContext, type LastExchange } from './scenario/context.js';
export { step, type Scenario, type ScenarioStep, type StepDefinition } from './scenario/step.js';
export { ScenarioRun, runAll, withDeadline } from './scenario/runner.js';
export {
  SCENARIOS,
  findScenario,
  smtpToImapRoundtrip,
  imapInvalidLogin,
  authenticationResultsScenario,
  imapSmoke,
  imapFullFlow
} from './scenario/scenarios.js';
export { formatReport, formatJson, exitCode } from './scenario/report.js';
