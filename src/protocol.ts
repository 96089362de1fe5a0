// JSON-RPC 2.0 protocol definitions for the nlbrowse daemon
// Transport: Unix Domain Socket, newline-delimited frames

export const ERROR_CODES = {
  PARSE_ERROR: -32700,            // Invalid JSON received
  INVALID_REQUEST: -32600,        // Invalid Request object
  METHOD_NOT_FOUND: -32601,       // Unknown method
  INVALID_PARAMS: -32602,         // Invalid method parameters
  TAB_NOT_FOUND: -32002,          // Tab position/id does not exist
  ACTION_FAILED: -32004,          // Driver operation failed
  NAVIGATION_FAILED: -32005,      // Page navigation error
  TIMEOUT: -32006,                // Bounded wait expired
  SECURITY_VIOLATION: -32007,     // Blocked URL or path
  COMMAND_NOT_UNDERSTOOD: -32010, // No parser rule matched
  MISSING_ARGUMENT: -32011,       // Rule matched, argument missing
  NO_ACTIVE_TAB: -32012,          // Page verb with an empty registry
  DAEMON_ALREADY_RUNNING: -32013,
  DAEMON_NOT_RUNNING: -32014,
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const METHODS = {
  COMMAND: "command",
  DAEMON_STATUS: "daemon.status",
  DAEMON_HEALTH: "daemon.health",
  DAEMON_STOP: "daemon.stop",
} as const;

export type Method = (typeof METHODS)[keyof typeof METHODS];

// JSON-RPC 2.0 request
export interface RpcRequest {
  jsonrpc: "2.0";
  id: number | string;
  method: string;
  params?: Record<string, unknown>;
}

// JSON-RPC 2.0 response (success)
export interface RpcSuccessResponse {
  jsonrpc: "2.0";
  id: number | string | null;
  result: unknown;
}

// JSON-RPC 2.0 response (error)
export interface RpcErrorResponse {
  jsonrpc: "2.0";
  id: number | string | null;
  error: RpcError;
}

export type RpcResponse = RpcSuccessResponse | RpcErrorResponse;

export interface RpcError {
  code: number;
  message: string;
  data?: unknown;
}

// Params of the "command" method
export interface CommandParams {
  text: string;
  tab?: number;
  cwd?: string;
}

// Envelope the client stub hands back to its caller
export interface CommandResponse {
  status: "ok" | "error";
  data?: unknown;
  message?: string;
  code?: number;
}

// Factory helpers

export function makeRequest(
  id: number | string,
  method: string,
  params?: Record<string, unknown>,
): RpcRequest {
  const req: RpcRequest = { jsonrpc: "2.0", id, method };
  if (params !== undefined) req.params = params;
  return req;
}

export function makeResponse(id: number | string, result: unknown): RpcSuccessResponse {
  return { jsonrpc: "2.0", id, result };
}

export function makeErrorResponse(
  id: number | string | null,
  code: number,
  message: string,
  data?: unknown,
): RpcErrorResponse {
  const err: RpcError = { code, message };
  if (data !== undefined) err.data = data;
  return { jsonrpc: "2.0", id, error: err };
}

// Type guard
export function isRpcError(resp: RpcResponse): resp is RpcErrorResponse {
  return "error" in resp;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Validate incoming request shape (basic)
export function validateRequest(obj: unknown): RpcRequest | null {
  if (!isRecord(obj)) return null;
  if (obj.jsonrpc !== "2.0") return null;
  if (typeof obj.method !== "string") return null;
  const id = obj.id;
  if (typeof id !== "number" && typeof id !== "string") return null;
  const params = obj.params;
  if (params !== undefined && !isRecord(params)) return null;
  const req: RpcRequest = { jsonrpc: "2.0", id, method: obj.method };
  if (params !== undefined) req.params = params;
  return req;
}

// Validate the params of a "command" request. Returns an error message on failure.
export function validateCommandParams(
  params: Record<string, unknown> | undefined,
): CommandParams | string {
  const text = params?.text;
  if (typeof text !== "string" || !text.trim()) return "text is required";
  const out: CommandParams = { text };
  const tab = params?.tab;
  if (tab !== undefined) {
    if (typeof tab !== "number" || !Number.isInteger(tab) || tab < 1) {
      return "tab must be a positive integer";
    }
    out.tab = tab;
  }
  const cwd = params?.cwd;
  if (cwd !== undefined) {
    if (typeof cwd !== "string") return "cwd must be a string";
    out.cwd = cwd;
  }
  return out;
}

// Envelope conversion: wire response → CommandResponse
export function toCommandResponse(resp: RpcResponse): CommandResponse {
  if (isRpcError(resp)) {
    const out: CommandResponse = {
      status: "error",
      message: resp.error.message,
      code: resp.error.code,
    };
    if (resp.error.data !== undefined) out.data = resp.error.data;
    return out;
  }
  const result = resp.result;
  if (isRecord(result) && (result.status === "ok" || result.status === "error")) {
    const out: CommandResponse = { status: result.status };
    if (result.data !== undefined) out.data = result.data;
    if (typeof result.message === "string") out.message = result.message;
    return out;
  }
  return { status: "ok", data: result };
}
