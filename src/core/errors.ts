export class ArchiverError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ArchiverError';
  }
}

export class ConfigError extends ArchiverError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class ValidationError extends ArchiverError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class DependencyError extends ArchiverError {
  constructor(pkg: string, feature: string) {
    super(
      `Package '${pkg}' is required for ${feature}. Install it with: npm install ${pkg}`,
      'MISSING_DEPENDENCY',
    );
    this.name = 'DependencyError';
  }
}

export class TransportError extends ArchiverError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSPORT_ERROR', cause);
    this.name = 'TransportError';
  }
}

/**
 * The server answered in a way the archiver refuses to interpret, e.g. two
 * mailboxes listed under one exact name or no MOVE support.
 */
export class ProtocolInvariantViolation extends ArchiverError {
  constructor(message: string) {
    super(message, 'PROTOCOL_INVARIANT');
    this.name = 'ProtocolInvariantViolation';
  }
}

export class MissingDateError extends ArchiverError {
  constructor(public readonly uid?: number) {
    super(
      uid === undefined
        ? 'Fetched message has no internal date'
        : `Message ${uid} has no internal date`,
      'MISSING_DATE',
    );
    this.name = 'MissingDateError';
  }
}

export class MissingIdentifierError extends ArchiverError {
  constructor() {
    super('Fetched message has no UID', 'MISSING_IDENTIFIER');
    this.name = 'MissingIdentifierError';
  }
}

export class DateParseError extends ArchiverError {
  constructor(public readonly value: string) {
    super(`Cannot parse a year from internal date: ${value}`, 'DATE_PARSE');
    this.name = 'DateParseError';
  }
}

export class FolderCreateError extends ArchiverError {
  constructor(
    public readonly folder: string,
    cause?: unknown,
  ) {
    super(`Failed to create folder ${folder}`, 'FOLDER_CREATE', cause);
    this.name = 'FolderCreateError';
  }
}

export class MoveError extends ArchiverError {
  constructor(
    public readonly folder: string,
    public readonly uidSet: string,
    cause?: unknown,
  ) {
    super(`Failed to move messages ${uidSet} to ${folder}`, 'MOVE_FAILED', cause);
    this.name = 'MoveError';
  }
}
