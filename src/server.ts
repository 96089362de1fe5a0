// JSON-RPC 2.0 server over Unix Domain Socket
// The daemon runs this server to handle CLI client requests.

import net from "node:net";
import { unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import {
  ERROR_CODES,
  METHODS,
  makeResponse,
  makeErrorResponse,
  validateCommandParams,
  validateRequest,
  type RpcRequest,
  type RpcResponse,
} from "./protocol.js";
import type { DaemonContext } from "./context.js";
import { dispatch } from "./dispatcher.js";
import { LifecycleError, errorMessage, rpcCodeOf } from "./errors.js";
import { settleWithin } from "./shared.js";

export type DaemonState = "stopped" | "starting" | "running" | "stopping";

export interface ServerHooks {
  /** Lifecycle state reported by daemon.status. */
  state: () => DaemonState;
  /** Every request, before it is routed. */
  onActivity?: () => void;
  /** A response that ends the session (close_browser, daemon.stop) has been flushed. */
  onShutdown: () => void;
}

export interface ServerHandle {
  readonly socketPath: string;
  /**
   * Stop accepting connections and requests, give in-flight requests up to
   * `graceMs` to answer, then drop every connection and remove the socket file.
   */
  close(graceMs?: number): Promise<void>;
}

// Requests routed but not yet answered, and whether new ones are still taken.
type Live = { closing: boolean; inFlight: Set<Promise<void>> };

// Result of routing one request: the payload plus whether the daemon should stop after sending it.
type Routed = { response: RpcResponse; shutdown: boolean };

const PROBE_TIMEOUT_MS = 500;

// --- Request routing ---

async function routeRequest(
  ctx: DaemonContext,
  hooks: ServerHooks,
  info: DaemonInfo,
  req: RpcRequest,
): Promise<Routed> {
  switch (req.method) {
    case METHODS.COMMAND: {
      const params = validateCommandParams(req.params);
      if (typeof params === "string") {
        return { response: makeErrorResponse(req.id, ERROR_CODES.INVALID_PARAMS, params), shutdown: false };
      }
      const outcome = await dispatch(ctx, params);
      const resp = outcome.response;
      if (resp.status === "error") {
        return {
          response: makeErrorResponse(
            req.id,
            resp.code ?? ERROR_CODES.ACTION_FAILED,
            resp.message ?? "Command failed",
            resp.data,
          ),
          shutdown: false,
        };
      }
      return {
        response: makeResponse(req.id, { status: "ok", message: resp.message, data: resp.data }),
        shutdown: outcome.shutdown,
      };
    }

    // Daemon management
    case METHODS.DAEMON_STATUS:
      return { response: makeResponse(req.id, getDaemonStatus(ctx, hooks, info)), shutdown: false };
    case METHODS.DAEMON_HEALTH:
      return { response: makeResponse(req.id, getDaemonHealth(ctx, hooks, info)), shutdown: false };
    case METHODS.DAEMON_STOP:
      // Shutdown happens after the response is flushed
      return {
        response: makeResponse(req.id, { ok: true, message: "Daemon shutting down" }),
        shutdown: true,
      };

    default:
      return {
        response: makeErrorResponse(req.id, ERROR_CODES.METHOD_NOT_FOUND, `Unknown method: ${req.method}`),
        shutdown: false,
      };
  }
}

// --- Daemon introspection ---

type DaemonInfo = { startedAt: number; socketPath: string };

function getDaemonStatus(ctx: DaemonContext, hooks: ServerHooks, info: DaemonInfo): object {
  return {
    ok: true,
    pid: process.pid,
    state: hooks.state(),
    uptime_s: Math.floor((Date.now() - info.startedAt) / 1000),
    socket: info.socketPath,
    tabs: ctx.registry.size,
  };
}

function getDaemonHealth(ctx: DaemonContext, hooks: ServerHooks, info: DaemonInfo): object {
  const used = process.memoryUsage();
  return {
    daemon: {
      pid: process.pid,
      state: hooks.state(),
      uptime_s: Math.floor((Date.now() - info.startedAt) / 1000),
      memory_mb: Math.round(used.rss / 1024 / 1024),
    },
    browser: {
      connected: ctx.driver.connected,
      tabs: ctx.registry.size,
      active: ctx.registry.active()?.id ?? null,
    },
    queue: {
      busy_lanes: ctx.queue.activeKeys().length,
    },
    requests: ctx.stats.snapshot(),
  };
}

// --- Server lifecycle ---

/** true when something is accepting connections at socketPath. */
export function probeSocket(socketPath: string, timeoutMs = PROBE_TIMEOUT_MS): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const probe = net.createConnection(socketPath);
    const timer = setTimeout(() => { probe.destroy(); resolve(false); }, timeoutMs);
    probe.once("connect", () => { clearTimeout(timer); probe.end(); resolve(true); });
    probe.once("error", () => { clearTimeout(timer); resolve(false); });
  });
}

export async function startServer(
  ctx: DaemonContext,
  socketPath: string,
  hooks: ServerHooks,
): Promise<ServerHandle> {
  // Remove stale socket file (from crashed daemon)
  if (existsSync(socketPath)) {
    // Try connecting — if refused, it's stale and safe to remove
    if (await probeSocket(socketPath)) {
      throw new LifecycleError("already_running", `Another daemon is already running at ${socketPath}`);
    }
    await unlink(socketPath).catch((err: unknown) => {
      ctx.log(`Could not remove stale socket ${socketPath}: ${errorMessage(err)}`);
    });
  }

  const info: DaemonInfo = { startedAt: Date.now(), socketPath };
  const live: Live = { closing: false, inFlight: new Set() };
  const sockets = new Set<net.Socket>();
  const srv = net.createServer((socket) => {
    sockets.add(socket);
    socket.once("close", () => sockets.delete(socket));
    handleConnection(ctx, hooks, info, live, socket);
  });

  await new Promise<void>((resolve, reject) => {
    srv.once("error", reject);
    srv.listen(socketPath, () => {
      srv.off("error", reject);
      resolve();
    });
  });
  srv.on("error", (err) => ctx.log(`Server error: ${err.message}`));

  ctx.log(`Listening on ${socketPath}`);

  let closing: Promise<void> | null = null;
  return {
    socketPath,
    close(graceMs = 0): Promise<void> {
      closing ??= (async () => {
        live.closing = true;
        const closed = new Promise<void>((resolve) => srv.close(() => resolve()));
        if (live.inFlight.size > 0) {
          const drained = await settleWithin(Promise.all([...live.inFlight]), graceMs);
          if (!drained) ctx.log(`Dropping ${live.inFlight.size} unanswered request(s)`);
        }
        for (const socket of sockets) socket.destroy();
        await closed;
        await unlink(socketPath).catch(() => undefined);
      })();
      return closing;
    },
  };
}

// --- Per-connection handling ---

function handleConnection(
  ctx: DaemonContext,
  hooks: ServerHooks,
  info: DaemonInfo,
  live: Live,
  socket: net.Socket,
): void {
  const conn = { buffer: "" };

  socket.on("data", (chunk: Buffer) => {
    conn.buffer += chunk.toString("utf-8");
    for (;;) {
      const newlineIdx = conn.buffer.indexOf("\n");
      if (newlineIdx === -1) break;
      const line = conn.buffer.slice(0, newlineIdx);
      conn.buffer = conn.buffer.slice(newlineIdx + 1);
      if (line.trim()) processLine(ctx, hooks, info, live, socket, line);
    }
  });

  socket.on("error", () => { /* client went away; its reply is dropped */ });
}

/** Resolves once the reply has been handed to the socket, or at once when the client is gone. */
function send(socket: net.Socket, resp: RpcResponse): Promise<void> {
  return new Promise((resolve) => {
    if (socket.destroyed || !socket.writable) {
      resolve();
      return;
    }
    socket.write(JSON.stringify(resp) + "\n", () => resolve());
  });
}

function processLine(
  ctx: DaemonContext,
  hooks: ServerHooks,
  info: DaemonInfo,
  live: Live,
  socket: net.Socket,
  line: string,
): void {
  hooks.onActivity?.();

  const parsedResult = (() => {
    try { return { ok: true as const, value: JSON.parse(line) as unknown }; }
    catch { return { ok: false as const }; }
  })();

  if (!parsedResult.ok) {
    void send(socket, makeErrorResponse(null, ERROR_CODES.PARSE_ERROR, "Parse error: invalid JSON"));
    return;
  }

  const req = validateRequest(parsedResult.value);
  if (!req) {
    void send(socket, makeErrorResponse(null, ERROR_CODES.INVALID_REQUEST, "Invalid JSON-RPC 2.0 request"));
    return;
  }

  if (live.closing) {
    void send(socket, makeErrorResponse(req.id, ERROR_CODES.DAEMON_NOT_RUNNING, "Daemon is shutting down"));
    return;
  }

  const work = routeRequest(ctx, hooks, info, req)
    .catch((err: unknown): Routed => ({
      response: makeErrorResponse(req.id, rpcCodeOf(err), errorMessage(err)),
      shutdown: false,
    }))
    .then(async (routed) => {
      await send(socket, routed.response);
      if (routed.shutdown) hooks.onShutdown();
    });
  live.inFlight.add(work);
  void work.finally(() => live.inFlight.delete(work));
}
