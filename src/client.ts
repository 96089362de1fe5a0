// JSON-RPC client over Unix Domain Socket
// Used by cli.ts to communicate with the daemon process

import net from "node:net";
import {
  METHODS,
  makeRequest,
  isRpcError,
  toCommandResponse,
  type CommandParams,
  type CommandResponse,
  type RpcResponse,
} from "./protocol.js";
import { TransportError, errorMessage } from "./errors.js";

let _requestId = 0;
function nextId(): number {
  return ++_requestId;
}

export function getSocketPath(): string {
  if (process.env.NLBROWSE_SOCKET) return process.env.NLBROWSE_SOCKET;
  const instance = process.env.NLBROWSE_INSTANCE;
  return instance ? `/tmp/nlbrowse-${instance}.sock` : "/tmp/nlbrowse.sock";
}

// Connect to daemon socket. Rejects with TransportError "unreachable" when nothing listens.
export function connectToSocket(socketPath?: string): Promise<net.Socket> {
  const path = socketPath ?? getSocketPath();
  return new Promise((resolve, reject) => {
    const socket = net.createConnection(path);
    socket.once("connect", () => resolve(socket));
    socket.once("error", (err) => reject(new TransportError("unreachable", undefined, { cause: err })));
  });
}

// Try to connect with timeout. Returns null if daemon is not running.
export async function tryConnect(timeoutMs = 1500, socketPath?: string): Promise<net.Socket | null> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      connectToSocket(socketPath),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error("connection timeout")), timeoutMs);
      }),
    ]);
  } catch {
    return null;
  } finally {
    clearTimeout(timer);
  }
}

// Send one JSON-RPC request and receive one raw response (newline-delimited).
export function sendRaw(
  socket: net.Socket,
  method: string,
  params?: Record<string, unknown>,
): Promise<RpcResponse> {
  return new Promise((resolve, reject) => {
    const id = nextId();
    const req = makeRequest(id, method, params);

    let buffer = "";
    let settled = false;

    function cleanup() {
      settled = true;
      socket.removeListener("data", onData);
      socket.removeListener("error", onError);
      socket.removeListener("close", onClose);
    }

    function onData(chunk: Buffer) {
      buffer += chunk.toString("utf-8");
      const newlineIdx = buffer.indexOf("\n");
      if (newlineIdx === -1) return;

      const line = buffer.slice(0, newlineIdx);
      cleanup();

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        reject(new TransportError("broken", `Daemon returned invalid JSON: ${line.slice(0, 200)}`));
        return;
      }
      if (!isRpcResponse(parsed)) {
        reject(new TransportError("broken", `Daemon returned a malformed response: ${line.slice(0, 200)}`));
        return;
      }
      resolve(parsed);
    }

    function onError(err: Error) {
      if (settled) return;
      cleanup();
      reject(new TransportError("broken", `connection closed before response: ${err.message}`, { cause: err }));
    }

    function onClose() {
      if (settled) return;
      cleanup();
      reject(new TransportError("broken"));
    }

    socket.on("data", onData);
    socket.on("error", onError);
    socket.once("close", onClose);
    socket.write(JSON.stringify(req) + "\n");
  });
}

function isRpcResponse(value: unknown): value is RpcResponse {
  if (typeof value !== "object" || value === null) return false;
  if (!("jsonrpc" in value) || value.jsonrpc !== "2.0") return false;
  if ("error" in value) {
    const err = value.error;
    return typeof err === "object" && err !== null && "code" in err && typeof err.code === "number"
      && "message" in err && typeof err.message === "string";
  }
  return "result" in value;
}

/** Error thrown by sendRequest() for a JSON-RPC error reply. */
export class RpcCallError extends Error {
  readonly name = "RpcCallError";

  constructor(readonly code: number, message: string, readonly data?: unknown) {
    super(message);
  }
}

// Send one request; resolves with the result, rejects with RpcCallError on an error reply.
export async function sendRequest(
  socket: net.Socket,
  method: string,
  params?: Record<string, unknown>,
): Promise<unknown> {
  const resp = await sendRaw(socket, method, params);
  if (isRpcError(resp)) throw new RpcCallError(resp.error.code, resp.error.message, resp.error.data);
  return resp.result;
}

// Send request and automatically close socket when done.
export async function call(
  method: string,
  params?: Record<string, unknown>,
  socketPath?: string,
): Promise<unknown> {
  const socket = await connectToSocket(socketPath);
  try {
    return await sendRequest(socket, method, params);
  } finally {
    socket.end();
  }
}

/**
 * Send one natural-language instruction and return the daemon's envelope.
 * Daemon-side failures come back as status "error"; only transport failures throw.
 */
export async function sendCommand(
  text: string,
  opts: { tab?: number; cwd?: string; socketPath?: string } = {},
): Promise<CommandResponse> {
  const params: CommandParams = { text, cwd: opts.cwd ?? process.cwd() };
  if (opts.tab !== undefined) params.tab = opts.tab;

  const socket = await connectToSocket(opts.socketPath);
  try {
    const resp = await sendRaw(socket, METHODS.COMMAND, { ...params });
    return toCommandResponse(resp);
  } finally {
    socket.end();
  }
}

/** Human-readable line for a transport failure. */
export function describeTransportError(err: unknown): string {
  return err instanceof TransportError ? err.message : `Request failed: ${errorMessage(err)}`;
}
