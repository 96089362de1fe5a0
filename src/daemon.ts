// Daemon process lifecycle management
// Dual-purpose: (1) imported by cli.ts for start/stop/status, (2) runs as daemon process

import { spawn } from "node:child_process";
import { existsSync, readFileSync, writeFileSync, openSync } from "node:fs";
import { unlink } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { getSocketPath, tryConnect, sendRequest } from "./client.js";
import { readConfig } from "./config.js";
import { createContext, stderrLogger, type Logger } from "./context.js";
import { PlaywrightDriver } from "./driver.js";
import { LifecycleError, errorMessage } from "./errors.js";
import { DaemonLifecycle } from "./lifecycle.js";
import { METHODS } from "./protocol.js";

// --- PID / log file paths ---

function instanceSuffix(): string {
  const instance = process.env.NLBROWSE_INSTANCE;
  return instance ? `-${instance}` : "";
}

export function getPidFilePath(): string {
  return `/tmp/nlbrowse-daemon${instanceSuffix()}.pid`;
}

export function getLogFilePath(): string {
  return `/tmp/nlbrowse-daemon${instanceSuffix()}.log`;
}

// --- Daemon status checks ---

export function getDaemonPid(): number | null {
  const pidFile = getPidFilePath();
  if (!existsSync(pidFile)) return null;
  try {
    const pid = parseInt(readFileSync(pidFile, "utf-8").trim(), 10);
    return isNaN(pid) || pid <= 0 ? null : pid;
  } catch {
    return null;
  }
}

export function isDaemonRunning(): boolean {
  const pid = getDaemonPid();
  if (pid === null) return false;
  try {
    process.kill(pid, 0); // signal 0 = process existence check
    return true;
  } catch {
    return false;
  }
}

// --- Start daemon (invoked by CLI) ---

const DAEMON_START_TIMEOUT_MS = 20_000;
const DAEMON_SOCKET_POLL_MS = 150;

export async function startDaemon(): Promise<{ pid: number | null; socket: string }> {
  const socketPath = getSocketPath();
  if (isDaemonRunning()) throw new LifecycleError("already_running");

  // Resolve path to the daemon entry point (dist/src/daemon.js)
  const daemonEntry = join(dirname(fileURLToPath(import.meta.url)), "daemon.js");

  if (!existsSync(daemonEntry)) {
    throw new Error(`Daemon entry not found: ${daemonEntry}. Run 'npm run build' first.`);
  }

  const logPath = getLogFilePath();
  const logFd = openSync(logPath, "a");

  const child = spawn(process.execPath, [daemonEntry], {
    detached: true,
    stdio: ["ignore", logFd, logFd],
    env: { ...process.env, NLBROWSE_DAEMON_MODE: "1" },
  });
  child.unref();

  // Wait until socket is ready to accept connections
  const deadline = Date.now() + DAEMON_START_TIMEOUT_MS;

  while (Date.now() < deadline) {
    await sleep(DAEMON_SOCKET_POLL_MS);
    if (child.exitCode !== null) {
      throw new Error(`Daemon exited during startup (code ${child.exitCode}). Check log: ${logPath}`);
    }
    if (existsSync(socketPath)) {
      const socket = await tryConnect(500, socketPath);
      if (socket) {
        socket.end();
        return { pid: child.pid ?? null, socket: socketPath };
      }
    }
  }

  throw new Error(
    `Daemon failed to start within ${DAEMON_START_TIMEOUT_MS / 1000}s. ` +
    `Check log: ${logPath}`,
  );
}

// --- Stop daemon (invoked by CLI) ---

const DAEMON_STOP_TIMEOUT_MS = 5_000;

export async function stopDaemon(): Promise<void> {
  const pidFile = getPidFilePath();
  const pid = getDaemonPid();

  if (pid === null || !isDaemonRunning()) {
    // Clean up stale files
    await unlink(pidFile).catch(() => {});
    await unlink(getSocketPath()).catch(() => {});
    throw new LifecycleError("not_running");
  }

  process.kill(pid, "SIGTERM");

  // Wait for PID file to be removed (daemon cleans up on exit)
  const deadline = Date.now() + DAEMON_STOP_TIMEOUT_MS;
  while (Date.now() < deadline) {
    await sleep(100);
    if (!existsSync(pidFile)) return;
  }

  // Force kill if still running
  try {
    process.kill(pid, "SIGKILL");
  } catch {
    // Already dead
  }
  await unlink(pidFile).catch(() => {});
  await unlink(getSocketPath()).catch(() => {});
}

// --- Daemon health / status (via RPC) ---

export async function getDaemonStatusViaRpc(): Promise<Record<string, unknown>> {
  const socket = await tryConnect();
  if (!socket) return { running: false };
  try {
    const result = await sendRequest(socket, METHODS.DAEMON_STATUS);
    return { running: true, ...(typeof result === "object" && result !== null ? result : {}) };
  } finally {
    socket.end();
  }
}

export async function getDaemonHealthViaRpc(): Promise<unknown> {
  const socket = await tryConnect();
  if (!socket) throw new LifecycleError("not_running");
  try {
    return await sendRequest(socket, METHODS.DAEMON_HEALTH);
  } finally {
    socket.end();
  }
}

// --- Daemon main (detached when NLBROWSE_DAEMON_MODE=1, foreground via `daemon run`) ---

export async function runDaemonMain(): Promise<void> {
  const log = stderrLogger();
  const config = await readConfig();
  log(`Starting (pid=${process.pid}, headless=${config.headless})`);

  const driver = new PlaywrightDriver({
    headless: config.headless,
    cdpUrl: config["cdp-url"] || undefined,
    executablePath: config["executable-path"] || undefined,
  });
  const ctx = createContext(driver, config, log);
  await serveUntilStopped(new DaemonLifecycle(ctx, getSocketPath()), getPidFilePath(), log);
}

/**
 * Start `lifecycle` and block until it stops. The PID file is written only once
 * the socket is bound and removed only by the process that wrote it, so a
 * second daemon that fails to start leaves the running one's file alone.
 */
export async function serveUntilStopped(
  lifecycle: DaemonLifecycle,
  pidFile: string,
  log: Logger,
): Promise<void> {
  const onSignal = (signal: NodeJS.Signals) => {
    log(`Received ${signal}`);
    lifecycle.requestStop();
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  let ownsPidFile = false;
  try {
    await lifecycle.start();
    writeFileSync(pidFile, String(process.pid), "utf-8");
    ownsPidFile = true;
    await lifecycle.whenStopped();
  } finally {
    process.off("SIGTERM", onSignal);
    process.off("SIGINT", onSignal);
    if (ownsPidFile) await unlink(pidFile).catch(() => {});
  }
}

// --- Entry point guard ---

// Run as daemon when NLBROWSE_DAEMON_MODE is set (spawned by startDaemon())
if (process.env.NLBROWSE_DAEMON_MODE === "1") {
  runDaemonMain()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      process.stderr.write(`[nlbrowse-daemon] Fatal: ${errorMessage(err)}\n`);
      process.exit(1);
    });
}

// --- Utility ---

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
