#!/usr/bin/env node
// nlbrowse CLI — sends one natural-language instruction to the daemon per invocation

import {
  jsonOutput,
  textOutput,
  formatOutput,
  errorResult,
} from "./shared.js";
import { sendCommand, getSocketPath, describeTransportError } from "./client.js";
import {
  startDaemon,
  stopDaemon,
  getDaemonStatusViaRpc,
  getDaemonHealthViaRpc,
  isDaemonRunning,
  runDaemonMain,
} from "./daemon.js";
import {
  getConfigPath,
  getConfigValue,
  getDefaults,
  isValidConfigKey,
  readConfig,
  resetConfig,
  setConfigValue,
  type ConfigKey,
} from "./config.js";
import { TransportError, errorMessage } from "./errors.js";

// --- Arg parsing helpers ---

const VALUE_FLAGS = new Set(["--tab"]);

function getPositionals(args: string[]): string[] {
  const result: string[] = [];
  const skip = new Set<number>();
  args.forEach((arg, i) => {
    if (arg.startsWith("--")) {
      if (VALUE_FLAGS.has(arg)) skip.add(i + 1);
    } else if (!skip.has(i)) {
      result.push(arg);
    }
  });
  return result;
}

function parseIntOption(args: string[], flag: string): number | undefined {
  const idx = args.indexOf(flag);
  if (idx < 0) return undefined;
  const raw = args[idx + 1];
  if (raw === undefined) throw new Error(`${flag} requires a value`);
  const num = Number(raw);
  if (!Number.isInteger(num) || num < 1) throw new Error(`${flag} must be a positive integer, got "${raw}"`);
  return num;
}

function usage(): never {
  textOutput(`nlbrowse — natural-language commands for a persistent browser session

USAGE:
  nlbrowse "<instruction>" [--tab <n>] [--json]

  Instructions may chain steps with "and", "then" or ";":
    nlbrowse "open a new tab and go to example.com"
    nlbrowse "click the \\"Sign in\\" button in tab 2"
    nlbrowse "fill #email with test@example.com then take a screenshot"

DAEMON:
  daemon start               Start the daemon in the background
  daemon stop                Stop the daemon
  daemon status              Show daemon status
  daemon health              Show detailed health info
  daemon run                 Run the daemon in the foreground

CONFIG (read by the daemon at start):
  config list                Show all keys with defaults
  config get <key>           Show one value
  config set <key> <value>   Change one value
  config reset               Restore defaults

OPTIONS:
  --tab <n>                  Run page steps on tab n (1-based) instead of the active tab
  --json                     Print {"ok":...} envelopes instead of plain text

ENVIRONMENT:
  NLBROWSE_INSTANCE          Run several daemons side by side (socket /tmp/nlbrowse-<name>.sock)
  NLBROWSE_SOCKET            Explicit socket path
  NLBROWSE_CONFIG            Config file path (default /tmp/nlbrowse-config.json)
  CHROME_PATH                Chrome/Chromium executable`);
  process.exit(0);
}

// --- Daemon subcommands ---

async function runDaemonSubcommand(subcommand: string): Promise<void> {
  switch (subcommand) {
    case "start": {
      if (isDaemonRunning()) {
        jsonOutput({ ok: true, message: "Daemon already running", socket: getSocketPath() });
        break;
      }
      process.stderr.write("[nlbrowse] Starting daemon...\n");
      const started = await startDaemon();
      jsonOutput({ ok: true, message: "Daemon started", pid: started.pid, socket: started.socket });
      break;
    }
    case "stop": {
      await stopDaemon();
      jsonOutput({ ok: true, message: "Daemon stopped" });
      break;
    }
    case "status": {
      if (!isDaemonRunning()) {
        jsonOutput({ ok: false, running: false });
        break;
      }
      jsonOutput(await getDaemonStatusViaRpc());
      break;
    }
    case "health": {
      jsonOutput(await getDaemonHealthViaRpc());
      break;
    }
    case "run": {
      await runDaemonMain();
      break;
    }
    default:
      textOutput(`Unknown daemon subcommand: ${subcommand}. Use: start|stop|status|health|run`);
      process.exit(1);
  }
}

// --- Config subcommands (local file, no daemon round-trip) ---

function requireKey(key: string | undefined): ConfigKey {
  if (!key) throw new Error("key is required");
  if (!isValidConfigKey(key)) {
    throw new Error(`Unknown config key: "${key}". Use 'nlbrowse config list' to see valid keys.`);
  }
  return key;
}

async function runConfigSubcommand(subcommand: string, args: string[]): Promise<void> {
  switch (subcommand) {
    case "get": {
      const key = requireKey(args[0]);
      jsonOutput({ ok: true, key, value: await getConfigValue(key) });
      break;
    }
    case "set": {
      const key = requireKey(args[0]);
      const raw = args[1];
      if (raw === undefined) throw new Error("value is required");
      await setConfigValue(key, raw);
      jsonOutput({ ok: true, key, value: await getConfigValue(key) });
      break;
    }
    case "list": {
      const config = await readConfig();
      const defaults = getDefaults();
      const entries = Object.entries(config).map(([key, value]) => {
        const def = isValidConfigKey(key) ? defaults[key] : undefined;
        return { key, value, default: def, modified: value !== def };
      });
      jsonOutput({ ok: true, path: getConfigPath(), entries });
      break;
    }
    case "reset": {
      await resetConfig();
      jsonOutput({ ok: true, message: "Config reset to defaults", config: getDefaults() });
      break;
    }
    default:
      textOutput(`Unknown config subcommand: ${subcommand}. Use: get|set|list|reset`);
      process.exit(1);
  }
}

// --- Instruction via daemon ---

async function runInstruction(args: string[], jsonMode: boolean): Promise<number> {
  const text = getPositionals(args).join(" ").trim();
  if (!text) usage();
  const tab = parseIntOption(args, "--tab");

  try {
    const resp = await sendCommand(text, { tab });
    formatOutput(resp, jsonMode);
    return resp.status === "ok" ? 0 : 1;
  } catch (error) {
    if (!(error instanceof TransportError)) throw error;
    const message = describeTransportError(error);
    if (jsonMode) jsonOutput(errorResult(error));
    else process.stderr.write(message + "\n");
    return 1;
  }
}

// --- Main ---

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (!args.length || args[0] === "--help" || args[0] === "-h") usage();

  const command = args[0] ?? "";
  const rest = args.slice(1);
  const jsonMode = args.includes("--json");

  try {
    if (command === "daemon") {
      await runDaemonSubcommand(rest[0] ?? "status");
      process.exit(0);
    }
    if (command === "config") {
      await runConfigSubcommand(rest[0] ?? "list", rest.slice(1));
      process.exit(0);
    }
    process.exit(await runInstruction(args, jsonMode));
  } catch (error) {
    if (jsonMode || command === "daemon" || command === "config") {
      jsonOutput({ ok: false, error: errorMessage(error) });
    } else {
      process.stderr.write(errorMessage(error) + "\n");
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`[nlbrowse] Fatal: ${errorMessage(error)}\n`);
  process.exit(1);
});
