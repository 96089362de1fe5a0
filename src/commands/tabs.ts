// Tab command handlers: open, switch, close, list, current, close browser

import type { DaemonContext } from "../context.js";
import { timeoutsOf } from "../context.js";
import type { PageHandle } from "../driver.js";
import type { Tab } from "../registry.js";
import { DriverError, RegistryError, errorMessage } from "../errors.js";
import type {
  OpenTabAction,
  StepResult,
  SwitchTabAction,
  TabSummary,
} from "../types.js";
import { refreshTab } from "./navigation.js";

export function summaryOf(ctx: DaemonContext, id: number): TabSummary | undefined {
  return ctx.registry.listTabs().find((t) => t.id === id);
}

/** A tab created on the open lane, with its first load already queued on its own lane. */
export type OpenedTab = {
  tab: Tab<PageHandle>;
  loading: Promise<void> | null;
};

/**
 * Runs on the dispatcher's open lane; `action.target` is already validated.
 * Only page creation holds the open lane, so other opens never wait on a load.
 */
export async function registerNewTab(ctx: DaemonContext, action: OpenTabAction): Promise<OpenedTab> {
  const handle = await ctx.driver.newPage();
  const tab = ctx.registry.openTab(handle);
  const url = action.target;
  if (!url) return { tab, loading: null };
  // Queued in the same tick the tab becomes visible, so it runs ahead of any request naming it.
  const loading = ctx.queue.run(tab.id, async () => {
    await handle.navigate(url, timeoutsOf(ctx.config).navigation);
    await refreshTab(ctx, tab);
  });
  // handleOpenTab awaits it; this only keeps an early rejection from counting as unhandled.
  void loading.catch(() => undefined);
  return { tab, loading };
}

export async function handleOpenTab(ctx: DaemonContext, opened: OpenedTab): Promise<StepResult> {
  const { tab, loading } = opened;
  if (loading) await loading;
  const summary = summaryOf(ctx, tab.id);
  return {
    message: `Opened tab ${summary?.index ?? ctx.registry.size}${loading ? ` at ${tab.url}` : ""}`,
    data: summary,
  };
}

/** The active pointer moves at once; raising the page waits its turn on the tab's lane. */
export async function handleSwitchTab(
  ctx: DaemonContext,
  action: SwitchTabAction,
): Promise<StepResult> {
  const tab = ctx.registry.switchTab(action.target);
  await ctx.queue.run(tab.id, async () => {
    if (!ctx.registry.get(tab.id)) {
      throw new RegistryError("tab_not_found", `tab not found: tab ${tab.id} was closed`);
    }
    try {
      await tab.handle.bringToFront();
    } catch (error) {
      throw new DriverError(
        "failed",
        `Switched to tab ${action.target} but could not bring it to front: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  });
  return { message: `Switched to tab ${action.target}`, data: summaryOf(ctx, tab.id) };
}

/** Runs on the target tab's lane, after every action queued before it. */
export async function handleCloseTab(ctx: DaemonContext, id: number): Promise<StepResult> {
  const position = ctx.registry.positionOf(id);
  const tab = ctx.registry.closeTab(id);
  try {
    await tab.handle.close();
  } catch (error) {
    throw new DriverError(
      "failed",
      `Tab ${position ?? id} removed but its page did not close: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  const active = ctx.registry.active();
  return {
    message: `Closed tab ${position ?? id}`,
    data: { closed: tab.id, active: active ? summaryOf(ctx, active.id) : null },
  };
}

export function handleListTabs(ctx: DaemonContext): StepResult {
  const tabs = ctx.registry.listTabs();
  return {
    message: `${tabs.length} tab${tabs.length === 1 ? "" : "s"} open`,
    data: tabs,
  };
}

export function handleCurrentTab(ctx: DaemonContext): StepResult {
  const active = ctx.registry.active();
  const summary = active ? summaryOf(ctx, active.id) : undefined;
  if (!summary) throw new RegistryError("no_active_tab");
  return { message: `Tab ${summary.index}: ${summary.title || summary.url}`, data: summary };
}

export function handleCloseBrowser(ctx: DaemonContext): StepResult {
  return {
    message: "Closing browser",
    data: { tabs: ctx.registry.size },
  };
}
