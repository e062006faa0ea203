export class DataSourceError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'DataSourceError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConnectionError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

export class AuthenticationError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'AUTH_ERROR', cause);
    this.name = 'AuthenticationError';
  }
}

export class QueryError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'QUERY_ERROR', cause);
    this.name = 'QueryError';
  }
}

export class ValidationError extends DataSourceError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class TimeoutError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'TIMEOUT_ERROR', cause);
    this.name = 'TimeoutError';
  }
}

export class ReportWriteError extends DataSourceError {
  constructor(message: string, public file: string, cause?: Error) {
    super(message, 'WRITE_ERROR', cause);
    this.name = 'ReportWriteError';
  }
}

/**
 * Data-consistency faults. These are collected per entry and reported as
 * warnings; they never stop a run.
 */
export class MalformedSidError extends DataSourceError {
  constructor(public dn: string, public sid: string | undefined) {
    super(
      sid === undefined ? `No objectSid on ${dn}` : `Malformed SID "${sid}" on ${dn}`,
      'MALFORMED_SID'
    );
    this.name = 'MalformedSidError';
  }
}

export class UnresolvedGroupError extends DataSourceError {
  constructor(public dn: string, public rid: number | undefined) {
    super(
      rid === undefined
        ? `No primaryGroupID on ${dn}`
        : `Primary group RID ${rid} of ${dn} is not a known group`,
      'UNRESOLVED_GROUP'
    );
    this.name = 'UnresolvedGroupError';
  }
}

export class InvalidDnError extends DataSourceError {
  constructor(public dn: string) {
    super(`Cannot parse distinguished name "${dn}"`, 'INVALID_DN');
    this.name = 'InvalidDnError';
  }
}

export type DataConsistencyFault = MalformedSidError | UnresolvedGroupError | InvalidDnError;

/**
 * Faults that end the run: nothing is written once one of these is raised.
 */
export function isFatal(error: unknown): error is DataSourceError {
  return error instanceof ConnectionError ||
    error instanceof AuthenticationError ||
    error instanceof QueryError ||
    error instanceof ValidationError ||
    error instanceof TimeoutError ||
    error instanceof ReportWriteError;
}
