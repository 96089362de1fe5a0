// nlbrowse types

// --- Actions (parser output, dispatcher input) ---

/** 1-based position in the tab list, as shown by `list_tabs`. */
export type TabPosition = number;

type PageScoped = {
  /** Explicit tab for this step; the active tab when absent. */
  tab?: TabPosition;
};

export type NavigateAction = PageScoped & { verb: "navigate"; target: string };
export type ClickAction = PageScoped & { verb: "click"; target: string };
export type FillAction = PageScoped & { verb: "fill"; target: string; payload: string };
export type ScreenshotAction = PageScoped & {
  verb: "screenshot";
  target?: string;
  fullPage?: boolean;
};
export type ExecuteScriptAction = PageScoped & { verb: "execute_script"; payload: string };
export type ScrollDirection = "up" | "down" | "top" | "bottom";
export type ScrollAction = PageScoped & {
  verb: "scroll";
  target: ScrollDirection;
  amount?: number;
};
export type GetContentAction = PageScoped & { verb: "get_content" };
export type GetTitleAction = PageScoped & { verb: "get_title" };
export type GetTextAction = PageScoped & { verb: "get_text"; target: string };
export type WaitForAction = PageScoped & { verb: "wait_for"; target: string; timeoutMs?: number };

export type PageAction =
  | NavigateAction
  | ClickAction
  | FillAction
  | ScreenshotAction
  | ExecuteScriptAction
  | ScrollAction
  | GetContentAction
  | GetTitleAction
  | GetTextAction
  | WaitForAction;

export type OpenTabAction = { verb: "open_tab"; target?: string };
export type SwitchTabAction = { verb: "switch_tab"; target: TabPosition };
export type CloseTabAction = { verb: "close_tab"; target?: TabPosition };
export type ListTabsAction = { verb: "list_tabs" };
export type CurrentTabAction = { verb: "current_tab" };
export type CloseBrowserAction = { verb: "close_browser" };

export type SessionAction =
  | OpenTabAction
  | SwitchTabAction
  | CloseTabAction
  | ListTabsAction
  | CurrentTabAction
  | CloseBrowserAction;

export type Action = PageAction | SessionAction;
export type Verb = Action["verb"];

const PAGE_VERBS: ReadonlySet<Verb> = new Set<Verb>([
  "navigate",
  "click",
  "fill",
  "screenshot",
  "execute_script",
  "scroll",
  "get_content",
  "get_title",
  "get_text",
  "wait_for",
]);

export function isPageAction(action: Action): action is PageAction {
  return PAGE_VERBS.has(action.verb);
}

// --- Registry snapshots ---

export type TabSummary = {
  readonly index: TabPosition;
  readonly id: number;
  readonly title: string;
  readonly url: string;
  readonly active: boolean;
};

// --- Driver results ---

export type PageLink = { text: string; href: string };
export type PageImage = { alt: string; src: string };

export type PageContent = {
  title: string;
  url: string;
  text: string;
  links: PageLink[];
  images: PageImage[];
};

// --- Dispatcher results ---

/** Outcome of one successfully executed step. */
export type StepResult = {
  message: string;
  data?: unknown;
};

export type StepReport = {
  step: number;
  verb: Verb;
  status: "ok" | "error" | "skipped";
  message?: string;
  data?: unknown;
};
