// Interaction command handlers: click, fill, scroll, wait, execute script

import type { DaemonContext } from "../context.js";
import { timeoutsOf } from "../context.js";
import type { PageHandle } from "../driver.js";
import type { Tab } from "../registry.js";
import { normalizeTimeoutMs, withTimeout } from "../shared.js";
import type {
  ClickAction,
  ExecuteScriptAction,
  FillAction,
  ScrollAction,
  StepResult,
  WaitForAction,
} from "../types.js";
import { refreshTab } from "./navigation.js";

export const DEFAULT_SCROLL_PX = 500;

export async function handleClick(
  ctx: DaemonContext,
  tab: Tab<PageHandle>,
  action: ClickAction,
): Promise<StepResult> {
  await tab.handle.click(action.target, timeoutsOf(ctx.config).action);
  await refreshTab(ctx, tab);
  return { message: `Clicked ${action.target}` };
}

export async function handleFill(
  ctx: DaemonContext,
  tab: Tab<PageHandle>,
  action: FillAction,
): Promise<StepResult> {
  await tab.handle.fill(action.target, action.payload, timeoutsOf(ctx.config).action);
  await refreshTab(ctx, tab);
  return { message: `Filled ${action.target}` };
}

export async function handleWaitFor(
  ctx: DaemonContext,
  tab: Tab<PageHandle>,
  action: WaitForAction,
): Promise<StepResult> {
  const timeout = normalizeTimeoutMs(action.timeoutMs, timeoutsOf(ctx.config).action);
  await tab.handle.waitFor(action.target, timeout);
  return { message: `Element ${action.target} is visible` };
}

export async function handleExecuteScript(
  ctx: DaemonContext,
  tab: Tab<PageHandle>,
  action: ExecuteScriptAction,
): Promise<StepResult> {
  const value = await withTimeout(
    tab.handle.executeScript(action.payload),
    timeoutsOf(ctx.config).action,
    "Script",
  );
  return { message: "Script executed", data: value };
}

/** Script run for a scroll step. */
export function scrollScript(action: ScrollAction): string {
  const px = action.amount ?? DEFAULT_SCROLL_PX;
  switch (action.target) {
    case "up":
      return `window.scrollBy(0, -${px})`;
    case "down":
      return `window.scrollBy(0, ${px})`;
    case "top":
      return "window.scrollTo(0, 0)";
    case "bottom":
      return "window.scrollTo(0, document.body.scrollHeight)";
  }
}

export async function handleScroll(
  ctx: DaemonContext,
  tab: Tab<PageHandle>,
  action: ScrollAction,
): Promise<StepResult> {
  await withTimeout(
    tab.handle.executeScript(scrollScript(action)),
    timeoutsOf(ctx.config).action,
    "Scroll",
  );
  const message =
    action.target === "top" || action.target === "bottom"
      ? `Scrolled to ${action.target}`
      : `Scrolled ${action.target} ${action.amount ?? DEFAULT_SCROLL_PX}px`;
  return { message };
}
