// parser.ts — Natural-language instruction → Action list
// An ordered table of (pattern, builder) rules; the first pattern that matches a clause wins.
// Compound instructions ("open a new tab and go to example.com") are split into clauses first.

import { ParseError } from "./errors.js";
import type { Action, ScreenshotAction, ScrollDirection, TabPosition, Verb } from "./types.js";
import { isPageAction } from "./types.js";

export type ParseResult =
  | { ok: true; actions: Action[] }
  | { ok: false; error: ParseError };

type RuleContext = {
  /** Normalized clause the rule matched. */
  clause: string;
  /** Full original instruction, echoed in errors. */
  input: string;
};

type Built = Action | Action[] | ParseError;

export type Rule = {
  name: string;
  verb: Verb;
  pattern: RegExp;
  build: (m: RegExpMatchArray, ctx: RuleContext) => Built;
};

// --- Search (original CLI behaviour: fill the q box, press the submit input) ---

export const SEARCH_INPUT_SELECTOR = 'input[name="q"]';
export const SEARCH_SUBMIT_SELECTOR = 'input[type="submit"]';

// --- Extraction helpers ---

const QUOTED = /"([^"]*)"|(?<![\w])'([^']*)'(?![\w])|`([^`]*)`/g;

type Span = { start: number; end: number; value: string };

function quotedSpans(text: string): Span[] {
  const spans: Span[] = [];
  for (const m of text.matchAll(QUOTED)) {
    const start = m.index ?? 0;
    spans.push({ start, end: start + m[0].length, value: m[1] ?? m[2] ?? m[3] ?? "" });
  }
  return spans;
}

function insideSpan(spans: Span[], index: number): boolean {
  return spans.some((s) => index > s.start && index < s.end);
}

export function unquote(value: string): string {
  const v = value.trim();
  if (v.length >= 2) {
    const first = v[0];
    const last = v[v.length - 1];
    if ((first === '"' || first === "'" || first === "`") && first === last) {
      return v.slice(1, -1);
    }
  }
  return v;
}

function isQuoted(value: string): boolean {
  return unquote(value) !== value.trim();
}

const ORDINALS: Record<string, number> = {
  first: 1,
  second: 2,
  third: 3,
  fourth: 4,
  fifth: 5,
  sixth: 6,
  seventh: 7,
  eighth: 8,
  ninth: 9,
  tenth: 10,
};

const ORDINAL_WORD = /\b(first|second|third|fourth|fifth|sixth|seventh|eighth|ninth|tenth)\b/i;

/** Tab position from "3", "#3", "3rd" or "third". */
export function extractPosition(text: string): TabPosition | undefined {
  const digits = text.match(/(?:^|[\s#])(\d+)(?:st|nd|rd|th)?\b/i);
  if (digits?.[1] !== undefined) return Number(digits[1]);
  const word = text.match(ORDINAL_WORD);
  if (word?.[1] !== undefined) return ORDINALS[word[1].toLowerCase()];
  return undefined;
}

const URL_TOKEN =
  /^(?:(?:https?|file):\/\/\S+|about:\S+|(?:localhost|(?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.)+[a-z]{2,}|\d{1,3}(?:\.\d{1,3}){3})(?::\d+)?(?:[/?#]\S*)?)$/i;

function cleanToken(token: string): string {
  return unquote(token).replace(/[),.;!?]+$/, "").replace(/^[(<]+/, "").replace(/>+$/, "");
}

export function isUrlLike(token: string): boolean {
  return URL_TOKEN.test(cleanToken(token));
}

/** Last URL-shaped token of the text. */
export function extractUrl(text: string): string | undefined {
  const tokens = text.trim().split(/\s+/).map(cleanToken).filter(Boolean);
  for (let i = tokens.length - 1; i >= 0; i--) {
    const token = tokens[i];
    if (token !== undefined && URL_TOKEN.test(token)) return token;
  }
  return undefined;
}

const HTML_TAGS = new Set([
  "a", "body", "button", "footer", "form", "h1", "h2", "h3", "h4", "h5", "h6", "header",
  "iframe", "img", "input", "label", "li", "main", "nav", "ol", "option", "p", "section",
  "select", "span", "table", "textarea", "ul", "video",
]);

const ENGINE_PREFIX = /^(?:css|text|xpath|id|data-testid|role)=|^\/\//i;
const CSS_LIKE = /^(?:[#.[]|[a-z][\w-]*[#.[:])/i;
const TRAILING_NOUN = /\s+(?:button|link|field|box|input|textbox|text\s+box|text|element|icon|tab)$/i;

function looksLikeSelector(value: string): boolean {
  return ENGINE_PREFIX.test(value) || CSS_LIKE.test(value) || HTML_TAGS.has(value.toLowerCase());
}

function escapeAttr(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/**
 * Clickable target → selector. CSS and engine selectors pass through;
 * anything else is matched by visible text (quoted = exact, unquoted = substring).
 */
export function toElementSelector(raw: string): string {
  const trimmed = raw.trim();
  const value = unquote(trimmed);
  if (looksLikeSelector(value)) return value;
  if (isQuoted(trimmed)) return `text="${escapeAttr(value)}"`;
  const words = value.replace(TRAILING_NOUN, "").trim();
  return `text=${words || value}`;
}

/** Form-field target → selector, matched by name, id, placeholder or aria-label. */
export function toFieldSelector(raw: string): string {
  const value = unquote(raw.trim());
  if (looksLikeSelector(value)) return value;
  const words = escapeAttr(value.replace(TRAILING_NOUN, "").trim() || value);
  return [
    `input[name="${words}"]`,
    `textarea[name="${words}"]`,
    `[id="${words}"]`,
    `[placeholder*="${words}"]`,
    `[aria-label*="${words}"]`,
  ].join(", ");
}

function missing(ctx: RuleContext, verb: Verb, piece: string): ParseError {
  return ParseError.missingArgument(ctx.input, verb, piece);
}

function durationMs(amount: string | undefined, unit: string | undefined): number | undefined {
  if (amount === undefined) return undefined;
  const n = Number(amount);
  return unit && /^(?:ms|milli)/i.test(unit) ? n : n * 1000;
}

function scrollDirection(text: string): ScrollDirection {
  const m = text.match(/\b(up|down|top|bottom)\b/i);
  const dir = m?.[1]?.toLowerCase();
  return dir === "up" || dir === "top" || dir === "bottom" ? dir : "down";
}

// --- Rule table (priority order) ---

export const RULES: readonly Rule[] = [
  {
    name: "close-browser",
    verb: "close_browser",
    pattern:
      /^(?:close|quit|exit|stop|shut\s*down|kill|terminate|end)\s+(?:the\s+|this\s+)?(?:whole\s+|entire\s+)?(?:browser|daemon|session)(?:\s+session)?$/i,
    build: () => ({ verb: "close_browser" }),
  },
  {
    name: "close-browser-bare",
    verb: "close_browser",
    pattern: /^(?:quit|exit|shutdown|shut\s+down)$/i,
    build: () => ({ verb: "close_browser" }),
  },
  {
    name: "list-tabs",
    verb: "list_tabs",
    pattern:
      /^(?:(?:list|show|display|get|print|view)(?:\s+(?:me|all|the|my|every|open|opened|current))*\s+)?tabs(?:\s+list)?$/i,
    build: () => ({ verb: "list_tabs" }),
  },
  {
    name: "list-tabs-question",
    verb: "list_tabs",
    pattern: /^(?:what|which)\s+tabs\s+(?:are|do\s+i\s+have)\s+open$/i,
    build: () => ({ verb: "list_tabs" }),
  },
  {
    name: "current-tab-question",
    verb: "current_tab",
    pattern: /^(?:which|what)\s+tab\s+(?:am\s+i\s+(?:on|in|using)|is\s+(?:active|current|open|selected))$/i,
    build: () => ({ verb: "current_tab" }),
  },
  {
    name: "current-tab",
    verb: "current_tab",
    pattern: /^(?:(?:show|get|display)\s+)?(?:me\s+)?(?:the\s+)?(?:current|active)\s+tab(?:\s+info)?$/i,
    build: () => ({ verb: "current_tab" }),
  },
  {
    name: "switch-tab",
    verb: "switch_tab",
    pattern:
      /^(?:switch|go|change|move|jump|return)(?:\s+back)?\s+to\s+(?:the\s+)?((?:\w+\s+)*?)tab(?:\s+(.*))?$/i,
    build: (m, ctx) => {
      const position = extractPosition(`${m[1] ?? ""} ${m[2] ?? ""}`);
      if (position === undefined) return missing(ctx, "switch_tab", "tab number");
      return { verb: "switch_tab", target: position };
    },
  },
  {
    name: "switch-tab-focus",
    verb: "switch_tab",
    pattern: /^(?:focus|activate|select|use)\s+(?:on\s+)?(?:the\s+)?((?:\w+\s+)*?)tab(?:\s+(.*))?$/i,
    build: (m, ctx) => {
      const position = extractPosition(`${m[1] ?? ""} ${m[2] ?? ""}`);
      if (position === undefined) return missing(ctx, "switch_tab", "tab number");
      return { verb: "switch_tab", target: position };
    },
  },
  {
    name: "switch-tab-short",
    verb: "switch_tab",
    pattern: /^(?:switch\s+)?tab\s+((?:#\s*)?\d+)$/i,
    build: (m, ctx) => {
      const position = extractPosition(m[1] ?? "");
      if (position === undefined) return missing(ctx, "switch_tab", "tab number");
      return { verb: "switch_tab", target: position };
    },
  },
  {
    name: "close-tab",
    verb: "close_tab",
    pattern: /^close\s+(?:the\s+)?((?:\w+\s+)*?)tab\b\s*(.*)$/i,
    build: (m) => {
      const position = extractPosition(`${m[1] ?? ""} ${m[2] ?? ""}`);
      return position === undefined ? { verb: "close_tab" } : { verb: "close_tab", target: position };
    },
  },
  {
    name: "close-page",
    verb: "close_tab",
    pattern: /^close\s+(?:it|this|(?:this|the|current)\s+page)$/i,
    build: () => ({ verb: "close_tab" }),
  },
  {
    name: "open-url-in-new-tab",
    verb: "open_tab",
    pattern: /^open\s+(.+?)\s+in\s+(?:a\s+)?new\s+tab$/i,
    build: (m, ctx) => {
      const url = extractUrl(m[1] ?? "");
      if (!url) return missing(ctx, "open_tab", "url");
      return { verb: "open_tab", target: url };
    },
  },
  {
    name: "open-tab",
    verb: "open_tab",
    pattern:
      /^(?:(?:open|create|start|launch|add|make)\s+(?:up\s+)?(?:a\s+|another\s+|one\s+more\s+|the\s+)?(?:new\s+|blank\s+|empty\s+|fresh\s+)?|new\s+)tab\b\s*(.*)$/i,
    build: (m) => {
      const url = extractUrl(m[1] ?? "");
      return url ? { verb: "open_tab", target: url } : { verb: "open_tab" };
    },
  },
  {
    name: "screenshot",
    verb: "screenshot",
    pattern:
      /^(?:(?:take|grab|capture|save|make|get|snap|do)\s+)?(?:a\s+|an\s+|the\s+)?(?:(?:full[\s-]?page|full|whole[\s-]page|entire[\s-]page|visible)\s+)?(?:screenshot|screen\s*shot|screen\s*capture|screengrab)\b(.*)$/i,
    build: (m, ctx) => buildScreenshot(m[1] ?? "", ctx.clause),
  },
  {
    name: "capture-page",
    verb: "screenshot",
    pattern: /^capture\s+(?:the\s+)?(?:full\s+|whole\s+|entire\s+|visible\s+)?(?:page|screen)\b(.*)$/i,
    build: (m, ctx) => buildScreenshot(m[1] ?? "", ctx.clause),
  },
  {
    name: "run-script",
    verb: "execute_script",
    pattern:
      /^(?:run|execute|exec|eval|evaluate|inject)\s+(?:the\s+|this\s+|some\s+)?(?:java\s*script|js|script|code)\b\s*:?\s*(.*)$/i,
    build: (m, ctx) => {
      const code = unquote(m[1] ?? "");
      if (!code) return missing(ctx, "execute_script", "script");
      return { verb: "execute_script", payload: code };
    },
  },
  {
    name: "run-script-short",
    verb: "execute_script",
    pattern: /^(?:js|javascript|evaluate)\s*:?\s+(.+)$/i,
    build: (m, ctx) => {
      const code = unquote(m[1] ?? "");
      if (!code) return missing(ctx, "execute_script", "script");
      return { verb: "execute_script", payload: code };
    },
  },
  {
    name: "page-title",
    verb: "get_title",
    pattern:
      /^(?:(?:get|what(?:'s|\s+is)|show|read|tell\s+me|print|fetch)\s+(?:me\s+)?(?:the\s+)?)?(?:page(?:'s)?\s+|current\s+|tab\s+)?title(?:\s+of\s+(?:the\s+|this\s+)?page)?$/i,
    build: () => ({ verb: "get_title" }),
  },
  {
    name: "element-text",
    verb: "get_text",
    pattern:
      /^(?:get|read|extract|show|fetch|grab|copy|what(?:'s|\s+is))\s+(?:me\s+)?(?:the\s+)?text\s+(?:of|from|in|inside|on)\s+(?:the\s+)?(.+)$/i,
    build: (m) => {
      const target = m[1] ?? "";
      if (/^(?:this\s+|current\s+)?page$/i.test(target)) return { verb: "get_content" };
      return { verb: "get_text", target: toElementSelector(target) };
    },
  },
  {
    name: "page-content",
    verb: "get_content",
    pattern:
      /^(?:(?:get|read|extract|fetch|show|grab|scrape|dump|print|give\s+me)\s+(?:me\s+)?(?:the\s+|all\s+(?:the\s+)?)?)?(?:page\s+|current\s+page\s+)?(?:content|contents|text|html|source)(?:\s+(?:of|from|on)\s+(?:the\s+|this\s+|current\s+)?page)?$/i,
    build: () => ({ verb: "get_content" }),
  },
  {
    name: "read-page",
    verb: "get_content",
    pattern: /^(?:read|scrape|summari[sz]e|extract)\s+(?:the\s+|this\s+)?page$|^what(?:'s|\s+is)\s+on\s+(?:the\s+|this\s+)?page$/i,
    build: () => ({ verb: "get_content" }),
  },
  {
    name: "wait-for",
    verb: "wait_for",
    pattern:
      /^wait(?:\s+(?:for|until))?(?:\s+the)?\s*(.*?)(?:\s+(?:for|up\s+to|within)\s+(\d+)\s*(ms|milliseconds?|s|secs?|seconds?))?$/i,
    build: (m, ctx) => {
      const raw = (m[1] ?? "")
        .replace(/\s+(?:to\s+)?(?:appear|appears|show\s+up|shows\s+up|load|loads|be\s+visible|is\s+visible|exist|exists)$/i, "")
        .replace(/^(?:element|selector)\s+/i, "")
        .trim();
      if (!raw || /^\d+\s*(?:ms|milliseconds?|s|secs?|seconds?)?$/i.test(raw)) {
        return missing(ctx, "wait_for", "selector");
      }
      const timeoutMs = durationMs(m[2], m[3]);
      return timeoutMs === undefined
        ? { verb: "wait_for", target: toElementSelector(raw) }
        : { verb: "wait_for", target: toElementSelector(raw), timeoutMs };
    },
  },
  {
    name: "scroll",
    verb: "scroll",
    pattern: /^scroll\b(.*)$/i,
    build: (m) => {
      const rest = m[1] ?? "";
      const target = scrollDirection(rest);
      const amount = rest.match(/(\d+)/)?.[1];
      return amount !== undefined && (target === "up" || target === "down")
        ? { verb: "scroll", target, amount: Number(amount) }
        : { verb: "scroll", target };
    },
  },
  {
    name: "jump-to-edge",
    verb: "scroll",
    pattern: /^(?:go|jump|move)\s+to\s+(?:the\s+)?(top|bottom)(?:\s+of\s+(?:the\s+|this\s+)?page)?$/i,
    build: (m) => ({ verb: "scroll", target: scrollDirection(m[1] ?? "") }),
  },
  {
    name: "fill-with",
    verb: "fill",
    pattern:
      /^(?:fill(?:\s+in|\s+out)?|populate)\s+(?:the\s+)?("[^"]*"|'[^']*'|.+?)\s+(?:with|as)\s+(.+)$/i,
    build: (m, ctx) => {
      const text = unquote(m[2] ?? "");
      if (!text) return missing(ctx, "fill", "text");
      return { verb: "fill", target: toFieldSelector(m[1] ?? ""), payload: text };
    },
  },
  {
    name: "type-into",
    verb: "fill",
    pattern:
      /^(?:type|enter|input|write|put|insert)\s+("[^"]*"|'[^']*'|.+?)\s+(?:into|in|inside|on|to)\s+(?:the\s+)?(.+)$/i,
    build: (m, ctx) => {
      const field = m[2] ?? "";
      if (!field.trim()) return missing(ctx, "fill", "field");
      return { verb: "fill", target: toFieldSelector(field), payload: unquote(m[1] ?? "") };
    },
  },
  {
    name: "fill-incomplete",
    verb: "fill",
    pattern: /^(fill(?:\s+in|\s+out)?|type|enter|input|write|insert)\b\s*(.*)$/i,
    build: (m, ctx) => {
      const isFill = /^fill/i.test(m[1] ?? "");
      const rest = (m[2] ?? "").trim();
      if (isFill) return missing(ctx, "fill", rest ? "text" : "field");
      return missing(ctx, "fill", rest ? "field" : "text");
    },
  },
  {
    name: "search",
    verb: "fill",
    pattern: /^(?:search|look\s+up|google)\s+(?:for\s+|up\s+)?(.+)$/i,
    build: (m, ctx) => {
      const query = unquote(m[1] ?? "");
      if (!query) return missing(ctx, "fill", "text");
      return [
        { verb: "fill", target: SEARCH_INPUT_SELECTOR, payload: query },
        { verb: "click", target: SEARCH_SUBMIT_SELECTOR },
      ];
    },
  },
  {
    name: "click",
    verb: "click",
    pattern: /^(?:click|tap|press|hit|push|select|choose)\b(?:\s+on)?\s*(?:the\s+)?(.*)$/i,
    build: (m, ctx) => {
      const target = (m[1] ?? "").trim();
      if (!target) return missing(ctx, "click", "element");
      return { verb: "click", target: toElementSelector(target) };
    },
  },
  {
    name: "navigate",
    verb: "navigate",
    pattern:
      /^(?:go|navigate|browse|head|surf|take\s+me|bring\s+me|point\s+(?:the\s+browser|it))(?:\s+over)?\s+to\b\s*(.*)$/i,
    build: (m, ctx) => {
      const url = extractUrl(m[1] ?? "");
      if (!url) return missing(ctx, "navigate", "url");
      return { verb: "navigate", target: url };
    },
  },
  {
    name: "navigate-verb",
    verb: "navigate",
    pattern: /^(?:goto|visit|open|load|navigate|browse)\b\s*(.*)$/i,
    build: (m, ctx) => {
      const url = extractUrl(m[1] ?? "");
      if (!url) return missing(ctx, "navigate", "url");
      return { verb: "navigate", target: url };
    },
  },
  {
    name: "bare-url",
    verb: "navigate",
    pattern: /^(\S+)$/,
    build: (m, ctx) => {
      const token = cleanToken(m[1] ?? "");
      if (!URL_TOKEN.test(token)) return ParseError.unrecognized(ctx.input);
      return { verb: "navigate", target: token };
    },
  },
];

function buildScreenshot(rest: string, clause: string): ScreenshotAction {
  const quoted = quotedSpans(rest).map((s) => s.value);
  const tokens = rest.trim().split(/\s+/).map(cleanToken);
  const path =
    quoted.find((q) => /\.(?:png|jpe?g)$/i.test(q)) ??
    tokens.find((t) => /\.(?:png|jpe?g)$/i.test(t));
  const fullPage = /\b(?:full[\s-]?page|full|whole[\s-]page|entire[\s-]page)\b/i.test(clause)
    ? true
    : /\b(?:visible|viewport)\b/i.test(clause)
      ? false
      : undefined;
  const action: ScreenshotAction = { verb: "screenshot" };
  if (path) action.target = path;
  if (fullPage !== undefined) action.fullPage = fullPage;
  return action;
}

// --- Clause handling ---

const POLITE_PREFIX =
  /^(?:please|pls|kindly|now|and|then|also|next|can\s+you|could\s+you|would\s+you|will\s+you|i\s+want\s+(?:you\s+)?to|i'd\s+like\s+(?:you\s+)?to|let's|go\s+ahead\s+and)\s+/i;

export function normalizeClause(clause: string): string {
  let text = clause.trim();
  for (;;) {
    const next = text.replace(POLITE_PREFIX, "");
    if (next === text) break;
    text = next;
  }
  text = text.replace(/\s+please$/i, "");
  // Trailing sentence punctuation, but never a closing quote's content
  text = text.replace(/[.!?]+$/, "");
  return text.trim();
}

const TAB_QUALIFIER =
  /^(.*\S)\s+(?:in|on)\s+(?:the\s+)?(?:tab\s+(?:#\s*)?(\d+)|(first|second|third|fourth|fifth|sixth|seventh|eighth|ninth|tenth)\s+tab)$/i;

function applyRules(clause: string, input: string): Built | null {
  for (const rule of RULES) {
    const m = clause.match(rule.pattern);
    if (m) return rule.build(m, { clause, input });
  }
  return null;
}

function toList(built: Action | Action[]): Action[] {
  return Array.isArray(built) ? built : [built];
}

/** Parse one clause. `null` means no rule matched at all. */
function parseClause(raw: string, input: string): Action[] | ParseError | null {
  const clause = normalizeClause(raw);
  if (!clause) return null;

  // "click #go in tab 2" → page action pinned to tab 2
  const qualified = clause.match(TAB_QUALIFIER);
  if (qualified && !insideSpan(quotedSpans(clause), (qualified[1] ?? "").length)) {
    const position = extractPosition(qualified[2] ?? qualified[3] ?? "");
    const inner = applyRules(qualified[1] ?? "", input);
    if (inner && !(inner instanceof ParseError) && position !== undefined) {
      const actions = toList(inner);
      if (actions.every(isPageAction)) {
        return actions.map((a) => ({ ...a, tab: position }));
      }
    }
  }

  const built = applyRules(clause, input);
  if (built === null || built instanceof ParseError) return built;
  return toList(built);
}

function startsClause(segment: string, input: string): boolean {
  const parsed = parseClause(segment, input);
  if (parsed === null) return false;
  return !(parsed instanceof ParseError && parsed.kind === "unrecognized");
}

const CONJUNCTION =
  /\s*;\s*|\s*,\s*(?:and\s+)?then\s+|\s*,\s*and\s+|\s+and\s+then\s+|\s+then\s+|\s+and\s+/gi;

/**
 * Split an instruction into clauses at conjunctions outside quotes.
 * A segment that is not itself a recognizable instruction stays attached
 * to the clause before it, separator included.
 */
export function splitClauses(text: string, input = text): string[] {
  const spans = quotedSpans(text);
  const segments: Array<{ sep: string; text: string }> = [];
  let cursor = 0;
  let pendingSep = "";
  for (const m of text.matchAll(CONJUNCTION)) {
    const at = m.index ?? 0;
    if (at === 0 || insideSpan(spans, at)) continue;
    segments.push({ sep: pendingSep, text: text.slice(cursor, at) });
    pendingSep = m[0];
    cursor = at + m[0].length;
  }
  segments.push({ sep: pendingSep, text: text.slice(cursor) });

  const clauses: string[] = [];
  for (const seg of segments) {
    const last = clauses.length - 1;
    if (last >= 0 && !startsClause(seg.text, input)) {
      clauses[last] = `${clauses[last]}${seg.sep}${seg.text}`;
    } else {
      clauses.push(seg.text);
    }
  }
  return clauses;
}

/**
 * Translate a free-form instruction into one or more Actions.
 * Never throws; identical text always yields an equal result.
 */
export function parseCommand(text: string): ParseResult {
  const input = text;
  const trimmed = text.trim();
  if (!trimmed) return { ok: false, error: ParseError.unrecognized(input) };

  const actions: Action[] = [];
  for (const clause of splitClauses(trimmed, input)) {
    const parsed = parseClause(clause, input);
    if (parsed === null) return { ok: false, error: ParseError.unrecognized(input) };
    if (parsed instanceof ParseError) return { ok: false, error: parsed };
    actions.push(...parsed);
  }
  if (actions.length === 0) return { ok: false, error: ParseError.unrecognized(input) };
  return { ok: true, actions };
}
