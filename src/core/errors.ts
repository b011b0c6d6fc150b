import type { ConfigSnapshot } from "./types.js";

export type ErrorCode =
  | "ADAPTER_WRITE_FAILED"
  | "APPLIED_NOT_RECORDED"
  | "PERSISTENCE_ERROR"
  | "NO_PREVIOUS_CONFIG"
  | "NOT_FOUND"
  | "CLIENT_MISMATCH"
  | "INVALID_SERVER_CONFIG"
  | "VERSION_PARSE_ERROR";

/**
 * Base class for every error the core raises. Callers switch on `code`;
 * the CLI maps codes to messages and exit codes.
 */
export class McpHelperError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The client adapter could not persist a config. Nothing was recorded. */
export class AdapterWriteFailedError extends McpHelperError {
  constructor(
    readonly clientName: string,
    readonly serverName: string,
    cause: unknown
  ) {
    super(
      "ADAPTER_WRITE_FAILED",
      `Failed to write "${serverName}" to ${clientName}: ${describeCause(cause)}`,
      { cause }
    );
  }
}

/**
 * The client config was written but the snapshot could not be appended.
 * Live state and recorded history now disagree.
 */
export class AppliedNotRecordedError extends McpHelperError {
  constructor(
    readonly snapshot: ConfigSnapshot,
    cause: unknown
  ) {
    super(
      "APPLIED_NOT_RECORDED",
      `Applied "${snapshot.serverName}" to ${snapshot.clientName} but not recorded in history: ${describeCause(cause)}`,
      { cause }
    );
  }
}

export class PersistenceError extends McpHelperError {
  constructor(
    message: string,
    readonly path: string,
    cause?: unknown
  ) {
    super(
      "PERSISTENCE_ERROR",
      cause === undefined ? `${message} (${path})` : `${message} (${path}): ${describeCause(cause)}`,
      { cause }
    );
  }
}

export class NoPreviousConfigError extends McpHelperError {
  constructor(readonly serverName: string) {
    super(
      "NO_PREVIOUS_CONFIG",
      `Cannot rollback: no previous configuration found for ${serverName}`
    );
  }
}

export class NotFoundError extends McpHelperError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class ClientMismatchError extends McpHelperError {
  constructor(expected: string, actual: string) {
    super(
      "CLIENT_MISMATCH",
      `Snapshot belongs to ${expected}, cannot roll it back through ${actual}`
    );
  }
}

export class InvalidServerConfigError extends McpHelperError {
  constructor(message: string) {
    super("INVALID_SERVER_CONFIG", message);
  }
}

export class VersionParseError extends McpHelperError {
  constructor(message: string) {
    super("VERSION_PARSE_ERROR", message);
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function isMcpHelperError(err: unknown): err is McpHelperError {
  return err instanceof McpHelperError;
}
