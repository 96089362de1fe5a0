// Data command handlers: screenshot, content, title, element text

import { join } from "node:path";
import type { DaemonContext } from "../context.js";
import { timeoutsOf } from "../context.js";
import type { PageHandle } from "../driver.js";
import type { Tab } from "../registry.js";
import { withTimeout } from "../shared.js";
import type {
  GetContentAction,
  GetTextAction,
  GetTitleAction,
  ScreenshotAction,
  StepResult,
} from "../types.js";

/** `action.target` is the resolved, validated output path (set by the dispatcher). */
export async function handleScreenshot(
  ctx: DaemonContext,
  tab: Tab<PageHandle>,
  action: ScreenshotAction,
): Promise<StepResult> {
  const path = action.target ?? defaultScreenshotPath(ctx);
  const fullPage = action.fullPage ?? ctx.config["screenshot-full-page"];
  await tab.handle.screenshot(path, fullPage);
  return { message: `Screenshot saved to ${path}`, data: { path, fullPage } };
}

export function defaultScreenshotPath(ctx: DaemonContext, now = Date.now()): string {
  return join(ctx.config["screenshot-dir"], `screenshot-${now}.png`);
}

export async function handleGetContent(
  ctx: DaemonContext,
  tab: Tab<PageHandle>,
  _action: GetContentAction,
): Promise<StepResult> {
  const content = await withTimeout(
    tab.handle.getContent(),
    timeoutsOf(ctx.config).action,
    "Reading page content",
  );
  ctx.registry.update(tab.id, { title: content.title, url: content.url });
  return {
    message: `Read ${content.text.length} chars, ${content.links.length} links, ${content.images.length} images from ${content.url}`,
    data: content,
  };
}

export async function handleGetTitle(
  ctx: DaemonContext,
  tab: Tab<PageHandle>,
  _action: GetTitleAction,
): Promise<StepResult> {
  const title = await withTimeout(tab.handle.title(), timeoutsOf(ctx.config).action, "Reading title");
  const url = tab.handle.url();
  ctx.registry.update(tab.id, { title, url });
  return { message: title, data: { title, url } };
}

export async function handleGetText(
  ctx: DaemonContext,
  tab: Tab<PageHandle>,
  action: GetTextAction,
): Promise<StepResult> {
  const text = await tab.handle.getText(action.target, timeoutsOf(ctx.config).action);
  return { message: `Text of ${action.target}`, data: text };
}
