// context.ts — Daemon-owned state handed to every request handler

import type { RuntimeConfig } from "./config.js";
import type { BrowserDriver, PageHandle } from "./driver.js";
import { TabRegistry } from "./registry.js";
import { normalizeTimeoutMs } from "./shared.js";
import { StatsRecorder } from "./stats.js";
import { TabQueue } from "./tab-queue.js";

export type Logger = (message: string) => void;

export const LOG_PREFIX = "[nlbrowse-daemon]";

export function stderrLogger(prefix = LOG_PREFIX): Logger {
  return (message) => {
    process.stderr.write(`${prefix} ${message}\n`);
  };
}

export interface DaemonContext<H extends PageHandle = PageHandle> {
  readonly driver: BrowserDriver<H>;
  readonly registry: TabRegistry<H>;
  readonly queue: TabQueue;
  readonly stats: StatsRecorder;
  /** Loaded once at daemon start. */
  readonly config: RuntimeConfig;
  readonly log: Logger;
}

export function createContext<H extends PageHandle>(
  driver: BrowserDriver<H>,
  config: RuntimeConfig,
  log: Logger = stderrLogger(),
): DaemonContext<H> {
  return {
    driver,
    registry: new TabRegistry<H>(),
    queue: new TabQueue(),
    stats: new StatsRecorder(),
    config,
    log,
  };
}

/** Per-request inputs that shape how steps resolve. */
export interface RequestScope {
  /** Tab position applied to steps that name none. */
  tab?: number;
  /** Client working directory; relative screenshot paths resolve against it. */
  cwd?: string;
}

/** Clamped timeouts derived from config. */
export function timeoutsOf(config: RuntimeConfig): { action: number; navigation: number } {
  return {
    action: normalizeTimeoutMs(config["default-timeout-ms"], 10_000),
    navigation: normalizeTimeoutMs(config["navigation-timeout-ms"], 30_000),
  };
}
