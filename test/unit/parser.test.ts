// Unit tests for parser.ts
// Pure functions: no driver, no daemon.

import { describe, it, expect } from "vitest";
import {
  parseCommand,
  splitClauses,
  normalizeClause,
  toElementSelector,
  toFieldSelector,
  extractPosition,
  extractUrl,
  isUrlLike,
  unquote,
  RULES,
  SEARCH_INPUT_SELECTOR,
  SEARCH_SUBMIT_SELECTOR,
} from "../../src/parser.js";
import { ParseError } from "../../src/errors.js";
import { ERROR_CODES } from "../../src/protocol.js";
import type { Action } from "../../src/types.js";

function actionsOf(text: string): Action[] {
  const result = parseCommand(text);
  if (!result.ok) throw new Error(`expected "${text}" to parse: ${result.error.message}`);
  return result.actions;
}

function errorOf(text: string): ParseError {
  const result = parseCommand(text);
  if (result.ok) throw new Error(`expected "${text}" to fail`);
  return result.error;
}

describe("parseCommand — session verbs", () => {
  it("opens a blank tab", () => {
    expect(actionsOf("open a new tab")).toEqual([{ verb: "open_tab" }]);
    expect(actionsOf("new tab")).toEqual([{ verb: "open_tab" }]);
  });

  it("opens a tab at a URL", () => {
    expect(actionsOf("open example.com in a new tab")).toEqual([
      { verb: "open_tab", target: "example.com" },
    ]);
    expect(actionsOf("open a new tab https://example.org/docs")).toEqual([
      { verb: "open_tab", target: "https://example.org/docs" },
    ]);
  });

  it("switches tabs by number or ordinal", () => {
    expect(actionsOf("switch to tab 5")).toEqual([{ verb: "switch_tab", target: 5 }]);
    expect(actionsOf("go to the second tab")).toEqual([{ verb: "switch_tab", target: 2 }]);
    expect(actionsOf("tab 3")).toEqual([{ verb: "switch_tab", target: 3 }]);
    expect(actionsOf("focus tab #4")).toEqual([{ verb: "switch_tab", target: 4 }]);
  });

  it("navigates to a host that starts with tab", () => {
    expect(actionsOf("go to tab.com")).toEqual([{ verb: "navigate", target: "tab.com" }]);
    expect(errorOf("go to the tab").missing).toBe("tab number");
  });

  it("closes the active tab or a numbered one", () => {
    expect(actionsOf("close tab")).toEqual([{ verb: "close_tab" }]);
    expect(actionsOf("close this tab")).toEqual([{ verb: "close_tab" }]);
    expect(actionsOf("close tab 2")).toEqual([{ verb: "close_tab", target: 2 }]);
    expect(actionsOf("close the third tab")).toEqual([{ verb: "close_tab", target: 3 }]);
  });

  it("lists tabs and reports the current one", () => {
    expect(actionsOf("list tabs")).toEqual([{ verb: "list_tabs" }]);
    expect(actionsOf("show me all the tabs")).toEqual([{ verb: "list_tabs" }]);
    expect(actionsOf("which tab am i on")).toEqual([{ verb: "current_tab" }]);
    expect(actionsOf("current tab")).toEqual([{ verb: "current_tab" }]);
  });

  it("closes the browser", () => {
    expect(actionsOf("close the browser")).toEqual([{ verb: "close_browser" }]);
    expect(actionsOf("quit")).toEqual([{ verb: "close_browser" }]);
  });
});

describe("parseCommand — page verbs", () => {
  it("navigates with or without a verb", () => {
    expect(actionsOf("go to example.com")).toEqual([{ verb: "navigate", target: "example.com" }]);
    expect(actionsOf("visit https://example.com/a?b=1")).toEqual([
      { verb: "navigate", target: "https://example.com/a?b=1" },
    ]);
    expect(actionsOf("example.com")).toEqual([{ verb: "navigate", target: "example.com" }]);
  });

  it("drops trailing sentence punctuation from a URL", () => {
    expect(actionsOf("go to https://example.com.")).toEqual([
      { verb: "navigate", target: "https://example.com" },
    ]);
  });

  it("clicks CSS selectors and visible text", () => {
    expect(actionsOf("click #submit")).toEqual([{ verb: "click", target: "#submit" }]);
    expect(actionsOf("click on the Login button")).toEqual([{ verb: "click", target: "text=Login" }]);
    expect(actionsOf('click the "Sign in" button')).toEqual([
      { verb: "click", target: 'text="Sign in"' },
    ]);
  });

  it("fills fields", () => {
    expect(actionsOf("fill #email with test@example.com")).toEqual([
      { verb: "fill", target: "#email", payload: "test@example.com" },
    ]);
    expect(actionsOf('type "hello" into the search box')).toEqual([
      {
        verb: "fill",
        target:
          'input[name="search"], textarea[name="search"], [id="search"], [placeholder*="search"], [aria-label*="search"]',
        payload: "hello",
      },
    ]);
  });

  it("expands a search into fill + submit", () => {
    expect(actionsOf("search for cats")).toEqual([
      { verb: "fill", target: SEARCH_INPUT_SELECTOR, payload: "cats" },
      { verb: "click", target: SEARCH_SUBMIT_SELECTOR },
    ]);
  });

  it("takes screenshots with optional path and page mode", () => {
    expect(actionsOf("take a screenshot")).toEqual([{ verb: "screenshot" }]);
    expect(actionsOf("take a full page screenshot /tmp/shot.png")).toEqual([
      { verb: "screenshot", target: "/tmp/shot.png", fullPage: true },
    ]);
    expect(actionsOf("take a visible screenshot")).toEqual([{ verb: "screenshot", fullPage: false }]);
  });

  it("runs scripts", () => {
    expect(actionsOf("run js document.title")).toEqual([
      { verb: "execute_script", payload: "document.title" },
    ]);
  });

  it("scrolls", () => {
    expect(actionsOf("scroll down 300")).toEqual([{ verb: "scroll", target: "down", amount: 300 }]);
    expect(actionsOf("scroll to the bottom")).toEqual([{ verb: "scroll", target: "bottom" }]);
    expect(actionsOf("scroll")).toEqual([{ verb: "scroll", target: "down" }]);
    expect(actionsOf("go to the top of the page")).toEqual([{ verb: "scroll", target: "top" }]);
  });

  it("reads title, content and element text", () => {
    expect(actionsOf("what is the title")).toEqual([{ verb: "get_title" }]);
    expect(actionsOf("get the page content")).toEqual([{ verb: "get_content" }]);
    expect(actionsOf("read this page")).toEqual([{ verb: "get_content" }]);
    expect(actionsOf("get text of #main")).toEqual([{ verb: "get_text", target: "#main" }]);
  });

  it("waits for elements with an optional timeout", () => {
    expect(actionsOf("wait for #results")).toEqual([{ verb: "wait_for", target: "#results" }]);
    expect(actionsOf("wait for #results for 5 seconds")).toEqual([
      { verb: "wait_for", target: "#results", timeoutMs: 5000 },
    ]);
  });

  it("pins page steps to a tab with an 'in tab N' suffix", () => {
    expect(actionsOf('click the "Sign in" button in tab 2')).toEqual([
      { verb: "click", target: 'text="Sign in"', tab: 2 },
    ]);
    expect(actionsOf("take a screenshot on the first tab")).toEqual([
      { verb: "screenshot", tab: 1 },
    ]);
  });
});

describe("parseCommand — compound instructions", () => {
  it("splits on 'and' into ordered steps", () => {
    expect(actionsOf("open a new tab and go to example.com")).toEqual([
      { verb: "open_tab" },
      { verb: "navigate", target: "example.com" },
    ]);
  });

  it("splits on 'then' and semicolons", () => {
    expect(actionsOf("go to example.com then take a screenshot; list tabs")).toEqual([
      { verb: "navigate", target: "example.com" },
      { verb: "screenshot" },
      { verb: "list_tabs" },
    ]);
  });

  it("never splits inside quotes", () => {
    expect(actionsOf('fill #q with "salt and pepper"')).toEqual([
      { verb: "fill", target: "#q", payload: "salt and pepper" },
    ]);
  });

  it("keeps a conjunction that does not start a new instruction", () => {
    expect(actionsOf("click Terms and Conditions")).toEqual([
      { verb: "click", target: "text=Terms and Conditions" },
    ]);
  });

  it("strips polite prefixes from every clause", () => {
    expect(actionsOf("please go to example.com and then please take a screenshot!")).toEqual([
      { verb: "navigate", target: "example.com" },
      { verb: "screenshot" },
    ]);
  });
});

describe("parseCommand — errors", () => {
  it("rejects text no rule understands", () => {
    const error = errorOf("make me a sandwich");
    expect(error).toBeInstanceOf(ParseError);
    expect(error.kind).toBe("unrecognized");
    expect(error.message).toBe('Could not understand command: "make me a sandwich"');
    expect(error.rpcCode).toBe(ERROR_CODES.COMMAND_NOT_UNDERSTOOD);
  });

  it("rejects empty and blank input", () => {
    expect(errorOf("").kind).toBe("unrecognized");
    expect(errorOf("   ").kind).toBe("unrecognized");
  });

  it("does not treat a plain word as a URL", () => {
    expect(errorOf("hello").kind).toBe("unrecognized");
  });

  it("reports the missing argument of a recognized verb", () => {
    const noUrl = errorOf("go to");
    expect(noUrl.kind).toBe("missing_argument");
    expect(noUrl.missing).toBe("url");
    expect(noUrl.message).toBe('Missing url for navigate: "go to"');
    expect(noUrl.rpcCode).toBe(ERROR_CODES.MISSING_ARGUMENT);

    expect(errorOf("click").message).toBe('Missing element for click: "click"');
    expect(errorOf("switch to tab").missing).toBe("tab number");
    expect(errorOf("fill #email").missing).toBe("text");
  });

  it("fails the whole instruction when one clause fails", () => {
    const error = errorOf("go to example.com and switch to tab");
    expect(error.kind).toBe("missing_argument");
    expect(error.input).toBe("go to example.com and switch to tab");
  });

  it("is deterministic", () => {
    const inputs = [
      "open a new tab and go to example.com",
      "make me a sandwich",
      "click the \"Sign in\" button in tab 2",
      "go to",
    ];
    for (const text of inputs) {
      expect(parseCommand(text)).toEqual(parseCommand(text));
    }
  });
});

describe("splitClauses", () => {
  it("returns the raw clauses", () => {
    expect(splitClauses("open a new tab and go to example.com")).toEqual([
      "open a new tab",
      "go to example.com",
    ]);
  });

  it("keeps a single clause whole", () => {
    expect(splitClauses("list tabs")).toEqual(["list tabs"]);
  });
});

describe("normalizeClause", () => {
  it("strips polite prefixes, suffixes and trailing punctuation", () => {
    expect(normalizeClause("  please go to example.com!")).toBe("go to example.com");
    expect(normalizeClause("can you list tabs please")).toBe("list tabs");
    expect(normalizeClause("then take a screenshot.")).toBe("take a screenshot");
  });
});

describe("selectors", () => {
  it("passes CSS and engine selectors through", () => {
    expect(toElementSelector("#go")).toBe("#go");
    expect(toElementSelector("button")).toBe("button");
    expect(toElementSelector("text=Foo")).toBe("text=Foo");
    expect(toElementSelector("a.nav")).toBe("a.nav");
  });

  it("matches visible text, exact when quoted", () => {
    expect(toElementSelector("Submit button")).toBe("text=Submit");
    expect(toElementSelector("'Log out'")).toBe('text="Log out"');
  });

  it("matches form fields by name, id, placeholder or label", () => {
    expect(toFieldSelector("email")).toBe(
      'input[name="email"], textarea[name="email"], [id="email"], [placeholder*="email"], [aria-label*="email"]',
    );
    expect(toFieldSelector("#email")).toBe("#email");
  });
});

describe("helpers", () => {
  it("extractPosition reads digits and ordinals", () => {
    expect(extractPosition("3")).toBe(3);
    expect(extractPosition("#4")).toBe(4);
    expect(extractPosition("2nd")).toBe(2);
    expect(extractPosition("third")).toBe(3);
    expect(extractPosition("none")).toBeUndefined();
  });

  it("extractUrl picks the last URL-shaped token", () => {
    expect(extractUrl("visit https://a.example.org/x?y=1 now")).toBe("https://a.example.org/x?y=1");
    expect(extractUrl("the docs")).toBeUndefined();
  });

  it("isUrlLike accepts hosts, ports and schemes", () => {
    expect(isUrlLike("localhost:3000")).toBe(true);
    expect(isUrlLike("192.168.0.1")).toBe(true);
    expect(isUrlLike("about:blank")).toBe(true);
    expect(isUrlLike("hello")).toBe(false);
  });

  it("unquote strips one pair of matching quotes", () => {
    expect(unquote('"a b"')).toBe("a b");
    expect(unquote("'x'")).toBe("x");
    expect(unquote('"mismatched\'')).toBe('"mismatched\'');
  });

  it("every rule has a unique name", () => {
    const names = RULES.map((r) => r.name);
    expect(new Set(names).size).toBe(names.length);
  });
});
