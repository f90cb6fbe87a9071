// Every failure the tool reports carries a stable code so the CLI can map it
// to an exit status without string matching.
export type ErrorCode =
  | 'E_CONFIG'
  | 'E_TOOL_UNAVAILABLE'
  | 'E_SOURCE'
  | 'E_EXTERNAL_TOOL'
  | 'E_TIMESTAMP'
  | 'E_MISSING_FIELD';

export class CertlensError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid or contradictory options; raised before any I/O. */
export class ConfigurationError extends CertlensError {
  constructor(message: string) {
    super('E_CONFIG', message);
  }
}

/** The introspection binary could not be started at all. */
export class ToolUnavailableError extends CertlensError {
  readonly tool: string;

  constructor(tool: string, options?: { cause?: unknown }) {
    super('E_TOOL_UNAVAILABLE', `${tool} is not available; install it or point CERTLENS_OPENSSL at it`, options);
    this.tool = tool;
  }
}

export class SourceUnavailableError extends CertlensError {
  readonly diagnostics: string;

  constructor(message: string, diagnostics = '', options?: { cause?: unknown }) {
    super('E_SOURCE', diagnostics ? `${message}: ${diagnostics.trim()}` : message, options);
    this.diagnostics = diagnostics;
  }
}

/** Local certificate file missing or unreadable. */
export class IOError extends SourceUnavailableError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : '';
    super(`cannot read ${path}`, reason, options);
    this.path = path;
  }
}

/** TLS handshake or chain capture against a remote endpoint failed. */
export class RemoteConnectionError extends SourceUnavailableError {
  readonly address: string;

  constructor(address: string, diagnostics: string) {
    super(`cannot fetch certificate chain from ${address}`, diagnostics);
    this.address = address;
  }
}

export class ExternalToolError extends CertlensError {
  readonly exitCode: number | null;
  readonly diagnostics: string;

  constructor(tool: string, exitCode: number | null, diagnostics: string) {
    const detail = diagnostics.trim();
    super('E_EXTERNAL_TOOL', `${tool} exited with status ${exitCode ?? 'unknown'}${detail ? `: ${detail}` : ''}`);
    this.exitCode = exitCode;
    this.diagnostics = diagnostics;
  }
}

export class MalformedTimestampError extends CertlensError {
  readonly value: string;

  constructor(value: string, reason: string) {
    super('E_TIMESTAMP', `malformed certificate timestamp "${value}": ${reason}`);
    this.value = value;
  }
}

export type DateField = 'notBefore' | 'notAfter';

export class MissingFieldError extends CertlensError {
  readonly field: DateField;

  constructor(field: DateField) {
    super('E_MISSING_FIELD', `certificate has no ${field}; renewal cannot be computed`);
    this.field = field;
  }
}
