// Error taxonomy shared by the parser, registry, dispatcher, lifecycle and client.
// Every daemon-side error carries the JSON-RPC code the server answers with.

import { ERROR_CODES } from "./protocol.js";

export abstract class CommandError extends Error {
  abstract readonly rpcCode: number;
  /** Structured payload forwarded as `error.data` on the wire. */
  data?: unknown;
}

export type ParseErrorKind = "unrecognized" | "missing_argument" | "blocked_target";

export class ParseError extends CommandError {
  readonly name = "ParseError";
  readonly rpcCode: number;

  constructor(
    readonly kind: ParseErrorKind,
    message: string,
    /** Original instruction text. */
    readonly input: string,
    /** Name of the missing piece for kind "missing_argument". */
    readonly missing?: string,
  ) {
    super(message);
    this.rpcCode =
      kind === "unrecognized"
        ? ERROR_CODES.COMMAND_NOT_UNDERSTOOD
        : kind === "missing_argument"
          ? ERROR_CODES.MISSING_ARGUMENT
          : ERROR_CODES.SECURITY_VIOLATION;
  }

  static unrecognized(input: string): ParseError {
    return new ParseError("unrecognized", `Could not understand command: "${input}"`, input);
  }

  static missingArgument(input: string, verb: string, missing: string): ParseError {
    return new ParseError(
      "missing_argument",
      `Missing ${missing} for ${verb}: "${input}"`,
      input,
      missing,
    );
  }

  static blocked(input: string, reason: string): ParseError {
    return new ParseError("blocked_target", reason, input);
  }
}

export type RegistryErrorKind = "tab_not_found" | "no_active_tab";

export class RegistryError extends CommandError {
  readonly name = "RegistryError";
  readonly rpcCode: number;

  constructor(readonly kind: RegistryErrorKind, message?: string) {
    super(message ?? (kind === "tab_not_found" ? "tab not found" : "no active tab"));
    this.rpcCode = kind === "tab_not_found" ? ERROR_CODES.TAB_NOT_FOUND : ERROR_CODES.NO_ACTIVE_TAB;
  }
}

export type DriverErrorKind = "failed" | "navigation" | "timeout";

export class DriverError extends CommandError {
  readonly name = "DriverError";
  readonly rpcCode: number;

  constructor(readonly kind: DriverErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.rpcCode =
      kind === "timeout"
        ? ERROR_CODES.TIMEOUT
        : kind === "navigation"
          ? ERROR_CODES.NAVIGATION_FAILED
          : ERROR_CODES.ACTION_FAILED;
  }
}

export type LifecycleErrorKind = "already_running" | "not_running";

export class LifecycleError extends CommandError {
  readonly name = "LifecycleError";
  readonly rpcCode: number;

  constructor(readonly kind: LifecycleErrorKind, message?: string) {
    super(message ?? (kind === "already_running" ? "daemon already running" : "daemon not running"));
    this.rpcCode =
      kind === "already_running" ? ERROR_CODES.DAEMON_ALREADY_RUNNING : ERROR_CODES.DAEMON_NOT_RUNNING;
  }
}

// Client-side only: never crosses the wire.
export type TransportErrorKind = "unreachable" | "broken";

export class TransportError extends Error {
  readonly name = "TransportError";

  constructor(readonly kind: TransportErrorKind, message?: string, options?: { cause?: unknown }) {
    super(
      message ?? (kind === "unreachable" ? "daemon not started" : "connection closed before response"),
      options,
    );
  }
}

/** JSON-RPC code for any thrown value. Unknown errors count as failed actions. */
export function rpcCodeOf(err: unknown): number {
  return err instanceof CommandError ? err.rpcCode : ERROR_CODES.ACTION_FAILED;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
