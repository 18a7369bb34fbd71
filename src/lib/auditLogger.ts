/**
 * Structured audit logging for command invocations.
 *
 * Every invocation produces one {@link AuditEntry} written as JSON to stderr,
 * after the last record has been emitted. Command arguments are truncated so a
 * long query string cannot flood the log.
 *
 * @module
 */
import { RuntimeConfig } from './config';

/**
 * A single audit log record capturing one command invocation.
 *
 * Written as a JSON line to stderr by {@link AuditLogger.log}.
 */
export interface AuditEntry {
  /** ISO 8601 timestamp of the invocation. */
  timestamp: string;
  /** `search`, `indices-list`, `cluster-health`, or `unknown` when the arguments did not parse. */
  action: string;
  /** Raw `key=value` arguments (truncated to 500 chars). */
  input_parameters: string;
  /** Number of records emitted to the host, including those before a failure. */
  rows_emitted: number;
  /** Wall-clock execution time in milliseconds. */
  execution_time_ms: number;
  /** `partial` means the scroll ended early but emitted rows are valid. */
  status: 'success' | 'partial' | 'error';
  /** Error code from the command error taxonomy (absent on success). */
  error_code?: string;
  error_message?: string;
}

const MAX_INPUT_LOG_LENGTH = 500;

/**
 * Writes audit records to stderr as JSON lines.
 *
 * Disabled via the `AUDIT_ENABLED=false` environment variable, in which case
 * {@link AuditLogger.log} is a no-op.
 */
export class AuditLogger {
  private enabled: boolean;

  constructor(config: Pick<RuntimeConfig, 'auditEnabled'>) {
    this.enabled = config.auditEnabled;
  }

  log(entry: AuditEntry): void {
    if (!this.enabled) return;

    const sanitized = {
      ...entry,
      input_parameters:
        entry.input_parameters.length > MAX_INPUT_LOG_LENGTH
          ? entry.input_parameters.slice(0, MAX_INPUT_LOG_LENGTH) + '...[truncated]'
          : entry.input_parameters,
    };

    process.stderr.write(JSON.stringify(sanitized) + '\n');
  }
}
