// lifecycle.ts — Daemon state machine: stopped → starting → running → stopping → stopped

import { timeoutsOf, type DaemonContext } from "./context.js";
import { LifecycleError, errorMessage } from "./errors.js";
import { startServer, type DaemonState, type ServerHandle } from "./server.js";
import { settleWithin } from "./shared.js";

export type { DaemonState };

export class DaemonLifecycle {
  private _state: DaemonState = "stopped";
  private server: ServerHandle | null = null;
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private stoppedWaiters: Array<() => void> = [];

  constructor(
    private readonly ctx: DaemonContext,
    private readonly socketPath: string,
  ) {}

  get state(): DaemonState {
    return this._state;
  }

  /**
   * Start the driver, open the initial tab (when configured) and bind the socket.
   * On failure everything acquired so far is released and the state returns to stopped.
   */
  start(): Promise<void> {
    if (this._state !== "stopped") {
      return Promise.reject(new LifecycleError("already_running"));
    }
    this._state = "starting";
    this.starting = this.bringUp().finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  /** A second call while stopping returns the same promise. */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this._state === "stopped") {
      return Promise.reject(new LifecycleError("not_running"));
    }
    if (this._state === "starting" && this.starting) {
      // Let start settle first; a failed start has already released everything.
      return this.starting.then(
        () => this.stop(),
        () => undefined,
      );
    }
    this._state = "stopping";
    this.stopping = this.tearDown().finally(() => {
      this.stopping = null;
      this.markStopped();
    });
    return this.stopping;
  }

  /** Resolves the next time the daemon reaches stopped. */
  whenStopped(): Promise<void> {
    if (this._state === "stopped") return Promise.resolve();
    return new Promise((resolve) => this.stoppedWaiters.push(resolve));
  }

  /** Restart the idle countdown; called for every request. */
  touch(): void {
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = null;
    const minutes = this.ctx.config["daemon-idle-timeout-m"];
    if (minutes <= 0 || this._state !== "running") return;
    this.idleTimer = setTimeout(() => {
      this.ctx.log("Idle timeout reached, shutting down.");
      this.requestStop();
    }, minutes * 60 * 1000);
    this.idleTimer.unref(); // don't keep process alive for this timer alone
  }

  /** Fire-and-forget stop for callbacks (idle timer, close_browser, daemon.stop). */
  requestStop(): void {
    if (this._state === "stopped") return;
    this.stop().catch((err: unknown) => {
      this.ctx.log(`Shutdown failed: ${errorMessage(err)}`);
    });
  }

  private async bringUp(): Promise<void> {
    const { ctx } = this;
    try {
      await ctx.driver.start();
      if (ctx.config["initial-tab"]) {
        ctx.registry.openTab(await ctx.driver.newPage());
      }
      this.server = await startServer(ctx, this.socketPath, {
        state: () => this._state,
        onActivity: () => this.touch(),
        onShutdown: () => this.requestStop(),
      });
    } catch (err) {
      ctx.log(`Start failed: ${errorMessage(err)}`);
      await this.release();
      this.markStopped();
      throw err;
    }
    this._state = "running";
    this.touch();
    ctx.log("Ready.");
  }

  private async tearDown(): Promise<void> {
    this.ctx.log("Shutting down...");
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = null;
    // Requests already routed finish and answer; nothing new starts.
    const grace = timeoutsOf(this.ctx.config).navigation;
    const server = this.server;
    this.server = null;
    if (server) await server.close(grace);
    if (!(await settleWithin(this.ctx.queue.idle(), grace))) {
      this.ctx.log(`Actions still running after ${grace}ms; closing tabs anyway.`);
    }
    await this.release();
    this.ctx.log("Done.");
  }

  private markStopped(): void {
    this._state = "stopped";
    const waiters = this.stoppedWaiters;
    this.stoppedWaiters = [];
    for (const resolve of waiters) resolve();
  }

  /** Close every tab and the driver, logging (not throwing) individual failures. */
  private async release(): Promise<void> {
    const { ctx } = this;
    for (const tab of ctx.registry.drain()) {
      await tab.handle.close().catch((err: unknown) => {
        ctx.log(`Closing tab ${tab.id} failed: ${errorMessage(err)}`);
      });
    }
    await ctx.driver.stop().catch((err: unknown) => {
      ctx.log(`Stopping browser failed: ${errorMessage(err)}`);
    });
  }
}
