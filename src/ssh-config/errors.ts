/**
 * Error taxonomy for reading, parsing and picking SSH config hosts.
 *
 * Every error carries a stable `code` so the CLI can map it to an exit
 * status without matching on message text.
 */

export type SSHConfigErrorCode = 'IO_ERROR' | 'PARSE_ERROR' | 'NO_SELECTION';

export class SSHConfigError extends Error {
  constructor(
    message: string,
    public code: SSHConfigErrorCode,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'SSHConfigError';
  }
}

/** The config source could not be opened or read. The fs error is kept as `cause`. */
export class IoError extends SSHConfigError {
  constructor(
    public path: string,
    cause: Error,
  ) {
    super(`I/O error: ${cause.message}`, 'IO_ERROR', { cause });
    this.name = 'IoError';
  }
}

/** Malformed config text. `line` is 1-based and counts blank and comment lines. */
export class ParseError extends SSHConfigError {
  constructor(
    public line: number,
    public reason: string,
  ) {
    super(`Parse error on line ${line}: ${reason}`, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class NoSelectionError extends SSHConfigError {
  constructor() {
    super('No ssh config selected!', 'NO_SELECTION');
    this.name = 'NoSelectionError';
  }
}
