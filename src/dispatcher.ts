// dispatcher.ts — Runs a parsed instruction against the session
// Each step resolves its tab, then runs on that tab's lane of the TabQueue, so
// work against one tab is serialized in arrival order while other tabs proceed.

import {
  defaultScreenshotPath,
  handleGetContent,
  handleGetText,
  handleGetTitle,
  handleScreenshot,
} from "./commands/data.js";
import {
  handleClick,
  handleExecuteScript,
  handleFill,
  handleScroll,
  handleWaitFor,
} from "./commands/interaction.js";
import { handleNavigate } from "./commands/navigation.js";
import {
  handleCloseBrowser,
  handleCloseTab,
  handleCurrentTab,
  handleListTabs,
  handleOpenTab,
  handleSwitchTab,
  registerNewTab,
} from "./commands/tabs.js";
import type { DaemonContext, RequestScope } from "./context.js";
import type { PageHandle } from "./driver.js";
import { RegistryError, errorMessage, rpcCodeOf } from "./errors.js";
import { parseCommand } from "./parser.js";
import type { CommandParams, CommandResponse } from "./protocol.js";
import type { Tab } from "./registry.js";
import { normalizeUrl, validateNavigationUrl, validateScreenshotPath } from "./shared.js";
import type { Action, PageAction, StepReport, StepResult, TabPosition } from "./types.js";

export interface DispatchOutcome {
  response: CommandResponse;
  /** The instruction asked for the browser to close; stop the daemon once the reply is out. */
  shutdown: boolean;
}

/** Lane shared by every open_tab, so concurrent opens append in arrival order. */
export const OPEN_LANE = "open";

/**
 * Parse and execute one instruction. Everything up to the first step's enqueue
 * runs synchronously, so the order of dispatch() calls is the order in which
 * their first steps reach a lane.
 */
export async function dispatch(ctx: DaemonContext, params: CommandParams): Promise<DispatchOutcome> {
  const scope: RequestScope = {};
  if (params.tab !== undefined) scope.tab = params.tab;
  if (params.cwd !== undefined) scope.cwd = params.cwd;

  const parsed = parseCommand(params.text);
  if (!parsed.ok) return rejected(ctx, params.text, parsed.error);

  let actions: Action[];
  try {
    actions = parsed.actions.map((a) => prepareAction(ctx, a, scope));
  } catch (error) {
    return rejected(ctx, params.text, error);
  }
  return runSteps(ctx, params.text, actions, scope);
}

/**
 * Normalize and vet targets before any driver call: URLs get a scheme and pass
 * the navigation guard, screenshot paths are resolved and confined.
 */
export function prepareAction(ctx: DaemonContext, action: Action, scope: RequestScope): Action {
  const allowPrivate = ctx.config["allow-private"];
  switch (action.verb) {
    case "navigate": {
      const target = normalizeUrl(action.target);
      validateNavigationUrl(target, { allowPrivate });
      return { ...action, target };
    }
    case "open_tab": {
      if (action.target === undefined) return action;
      const target = normalizeUrl(action.target);
      validateNavigationUrl(target, { allowPrivate });
      return { ...action, target };
    }
    case "screenshot": {
      const screenshotDir = ctx.config["screenshot-dir"];
      const allowedDirs = scope.cwd ? [screenshotDir, scope.cwd] : [screenshotDir];
      const target = validateScreenshotPath(action.target ?? defaultScreenshotPath(ctx), {
        cwd: scope.cwd,
        allowedDirs,
      });
      return { ...action, target, fullPage: action.fullPage ?? ctx.config["screenshot-full-page"] };
    }
    default:
      return action;
  }
}

async function runSteps(
  ctx: DaemonContext,
  text: string,
  actions: Action[],
  scope: RequestScope,
): Promise<DispatchOutcome> {
  const reports = actions.map((a, i): StepReport => ({ step: i + 1, verb: a.verb, status: "skipped" }));
  let last: StepResult | undefined;
  let shutdown = false;

  for (const [i, action] of actions.entries()) {
    const report = reports[i];
    if (report === undefined) break;
    ctx.stats.recordAction(action.verb);
    try {
      last = await executeStep(ctx, action, scope);
    } catch (error) {
      report.status = "error";
      report.message = errorMessage(error);
      return failedStep(ctx, text, reports, report, error);
    }
    report.status = "ok";
    report.message = last.message;
    if (last.data !== undefined) report.data = last.data;
    if (action.verb === "close_browser") {
      shutdown = true;
      break;
    }
  }

  ctx.stats.recordRequest(true);
  if (actions.length === 1 && last) {
    const response: CommandResponse = { status: "ok", message: last.message };
    if (last.data !== undefined) response.data = last.data;
    return { response, shutdown };
  }
  const done = reports.filter((r) => r.status === "ok").length;
  return {
    response: {
      status: "ok",
      message: `Completed ${done} of ${reports.length} steps`,
      data: { steps: reports },
    },
    shutdown,
  };
}

async function executeStep(ctx: DaemonContext, action: Action, scope: RequestScope): Promise<StepResult> {
  switch (action.verb) {
    case "open_tab": {
      const open = action;
      const opened = await ctx.queue.run(OPEN_LANE, () => registerNewTab(ctx, open));
      return handleOpenTab(ctx, opened);
    }
    case "switch_tab":
      return handleSwitchTab(ctx, action);
    case "close_tab": {
      const id = resolveTabId(ctx, action.target ?? scope.tab);
      return ctx.queue.run(id, () => handleCloseTab(ctx, id));
    }
    case "list_tabs":
      return handleListTabs(ctx);
    case "current_tab":
      return handleCurrentTab(ctx);
    case "close_browser":
      return handleCloseBrowser(ctx);
    default:
      return runOnTab(ctx, action, scope);
  }
}

/** Explicit position → that tab's id; no position → the active tab. */
export function resolveTabId(ctx: DaemonContext, position: TabPosition | undefined): number {
  if (position !== undefined) {
    const id = ctx.registry.idAt(position);
    if (id === undefined) {
      throw new RegistryError("tab_not_found", `tab not found: no tab at position ${position}`);
    }
    return id;
  }
  const active = ctx.registry.active();
  if (!active) throw new RegistryError("no_active_tab");
  return active.id;
}

function runOnTab(ctx: DaemonContext, action: PageAction, scope: RequestScope): Promise<StepResult> {
  const id = resolveTabId(ctx, action.tab ?? scope.tab);
  return ctx.queue.run(id, () => {
    // A close queued ahead of this step may have removed the tab.
    const tab = ctx.registry.get(id);
    if (!tab) throw new RegistryError("tab_not_found", `tab not found: tab ${id} was closed`);
    return runPageAction(ctx, tab, action);
  });
}

function runPageAction(ctx: DaemonContext, tab: Tab<PageHandle>, action: PageAction): Promise<StepResult> {
  switch (action.verb) {
    case "navigate":
      return handleNavigate(ctx, tab, action);
    case "click":
      return handleClick(ctx, tab, action);
    case "fill":
      return handleFill(ctx, tab, action);
    case "screenshot":
      return handleScreenshot(ctx, tab, action);
    case "execute_script":
      return handleExecuteScript(ctx, tab, action);
    case "scroll":
      return handleScroll(ctx, tab, action);
    case "get_content":
      return handleGetContent(ctx, tab, action);
    case "get_title":
      return handleGetTitle(ctx, tab, action);
    case "get_text":
      return handleGetText(ctx, tab, action);
    case "wait_for":
      return handleWaitFor(ctx, tab, action);
  }
}

function rejected(ctx: DaemonContext, text: string, error: unknown): DispatchOutcome {
  const code = rpcCodeOf(error);
  ctx.stats.recordRequest(false, code);
  ctx.log(`Rejected "${text}": ${errorMessage(error)}`);
  return { response: { status: "error", message: errorMessage(error), code }, shutdown: false };
}

function failedStep(
  ctx: DaemonContext,
  text: string,
  reports: StepReport[],
  failed: StepReport,
  error: unknown,
): DispatchOutcome {
  const code = rpcCodeOf(error);
  ctx.stats.recordRequest(false, code);
  ctx.log(`Step ${failed.step} (${failed.verb}) of "${text}" failed: ${errorMessage(error)}`);

  if (reports.length === 1) {
    return { response: { status: "error", message: errorMessage(error), code }, shutdown: false };
  }
  const completed = reports.filter((r) => r.status === "ok").map((r) => r.step);
  return {
    response: {
      status: "error",
      message:
        `Step ${failed.step} of ${reports.length} (${failed.verb}) failed: ${errorMessage(error)}` +
        (completed.length ? ` (completed steps: ${completed.join(", ")})` : ""),
      code,
      data: { steps: reports, failedStep: failed.step, completed },
    },
    shutdown: false,
  };
}
