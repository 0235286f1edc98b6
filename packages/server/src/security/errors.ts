/**
 * Error types for the decision and enforcement pipeline.
 */

/**
 * Base class for pipeline errors. `code` is stable and safe to surface to callers.
 */
export class ZtGateError extends Error {
  override readonly name: string = 'ZtGateError';
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when a policy document is missing, unparsable or invalid.
 */
export class ConfigError extends ZtGateError {
  override readonly name = 'ConfigError';
  readonly source: string;
  readonly validationErrors: string[];

  constructor(source: string, message: string, validationErrors: string[] = [], options?: ErrorOptions) {
    super('CONFIG_ERROR', `Invalid policy configuration in ${source}: ${message}`, options);
    this.source = source;
    this.validationErrors = validationErrors;
  }
}

/**
 * Error thrown when an access request lacks required fields.
 */
export class MalformedRequestError extends ZtGateError {
  override readonly name = 'MalformedRequestError';
  readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    super('MALFORMED_REQUEST', `Malformed access request: ${summary}`);
    this.issues = issues;
  }
}

/**
 * Error raised inside a cloud adapter call. Never leaves the remediation dispatcher.
 */
export class AdapterFailure extends ZtGateError {
  override readonly name = 'AdapterFailure';
  readonly cloud: string;

  constructor(cloud: string, message: string, options?: ErrorOptions) {
    super('ADAPTER_FAILURE', message, options);
    this.cloud = cloud;
  }
}

/**
 * Error thrown when the audit log could not be appended after all retries.
 */
export class AuditWriteError extends ZtGateError {
  override readonly name = 'AuditWriteError';
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('AUDIT_WRITE_FAILED', `Audit log append failed after ${attempts} attempt(s): ${detail}`, { cause });
    this.attempts = attempts;
  }
}
