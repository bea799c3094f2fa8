/**
 * Error classes raised by storage, codec and reconciliation sessions.
 */

export enum ReconcileErrorCode {
  /** Malformed or self-inconsistent incoming message. Fatal to the session. */
  PROTOCOL_ERROR = "PROTOCOL_ERROR",
  /** API misuse, such as initiating twice or reconciling an unsealed store. */
  INVALID_STATE = "INVALID_STATE",
  ALREADY_SEALED = "ALREADY_SEALED",
  ALREADY_CONVERGED = "ALREADY_CONVERGED",
  DUPLICATE_ITEM = "DUPLICATE_ITEM",
  INDEX_OUT_OF_RANGE = "INDEX_OUT_OF_RANGE",
  INVALID_ITEM = "INVALID_ITEM",
  INVALID_CONFIG = "INVALID_CONFIG",
}

export interface ReconcileErrorDetails {
  code: ReconcileErrorCode;
  message: string;
  /** Byte offset into the offending message, for protocol errors. */
  offset?: number;
  issues?: string[];
}

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;
  readonly offset?: number;
  readonly issues?: string[];

  constructor(details: ReconcileErrorDetails) {
    super(details.message);
    this.name = "ReconcileError";
    this.code = details.code;
    this.offset = details.offset;
    this.issues = details.issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Whether the session that raised this error must be discarded. */
  get isFatal(): boolean {
    return this.code === ReconcileErrorCode.PROTOCOL_ERROR ||
      this.code === ReconcileErrorCode.INVALID_STATE;
  }

  toJSON(): ReconcileErrorDetails {
    return {
      code: this.code,
      message: this.message,
      offset: this.offset,
      issues: this.issues,
    };
  }
}

export class ProtocolError extends ReconcileError {
  constructor(message: string, offset?: number) {
    super({ code: ReconcileErrorCode.PROTOCOL_ERROR, message, offset });
    this.name = "ProtocolError";
  }
}

export class InvalidStateError extends ReconcileError {
  constructor(message: string) {
    super({ code: ReconcileErrorCode.INVALID_STATE, message });
    this.name = "InvalidStateError";
  }
}

export class AlreadySealedError extends ReconcileError {
  constructor() {
    super({
      code: ReconcileErrorCode.ALREADY_SEALED,
      message: "Storage is already sealed",
    });
    this.name = "AlreadySealedError";
  }
}

export class AlreadyConvergedError extends ReconcileError {
  constructor() {
    super({
      code: ReconcileErrorCode.ALREADY_CONVERGED,
      message: "Session has already converged",
    });
    this.name = "AlreadyConvergedError";
  }
}

export class DuplicateItemError extends ReconcileError {
  constructor(timestamp: bigint, idHex: string) {
    super({
      code: ReconcileErrorCode.DUPLICATE_ITEM,
      message: `Item (${timestamp}, ${idHex}) is already present`,
    });
    this.name = "DuplicateItemError";
  }
}

export class IndexOutOfRangeError extends ReconcileError {
  constructor(message: string) {
    super({ code: ReconcileErrorCode.INDEX_OUT_OF_RANGE, message });
    this.name = "IndexOutOfRangeError";
  }
}

export class InvalidItemError extends ReconcileError {
  constructor(message: string) {
    super({ code: ReconcileErrorCode.INVALID_ITEM, message });
    this.name = "InvalidItemError";
  }
}

export class InvalidConfigError extends ReconcileError {
  constructor(issues: string[]) {
    super({
      code: ReconcileErrorCode.INVALID_CONFIG,
      message: `Invalid reconciler config: ${issues.join("; ")}`,
      issues,
    });
    this.name = "InvalidConfigError";
  }
}
