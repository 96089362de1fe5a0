// Navigation command handler: navigate, plus the title/url refresh shared by page-changing steps

import type { DaemonContext } from "../context.js";
import { timeoutsOf } from "../context.js";
import type { PageHandle } from "../driver.js";
import type { Tab } from "../registry.js";
import type { NavigateAction, StepResult } from "../types.js";

/** Re-read title and url from the page into the registry entry. */
export async function refreshTab(ctx: DaemonContext, tab: Tab<PageHandle>): Promise<void> {
  const title = await tab.handle.title().catch(() => undefined);
  ctx.registry.update(tab.id, { title, url: tab.handle.url() });
}

/** `action.target` is already normalized and validated by the dispatcher. */
export async function handleNavigate(
  ctx: DaemonContext,
  tab: Tab<PageHandle>,
  action: NavigateAction,
): Promise<StepResult> {
  await tab.handle.navigate(action.target, timeoutsOf(ctx.config).navigation);
  await refreshTab(ctx, tab);
  return {
    message: `Navigated to ${tab.url}`,
    data: { url: tab.url, title: tab.title },
  };
}
