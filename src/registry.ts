// registry.ts — Ordered tab list with an active-tab pointer
// Every mutation is synchronous: no other registry call or snapshot can
// observe a half-applied change.

import { RegistryError } from "./errors.js";
import type { TabPosition, TabSummary } from "./types.js";

/** Anything the registry can own and hand back for release. */
export interface TabHandle {
  close(): Promise<void>;
}

export interface Tab<H extends TabHandle = TabHandle> {
  readonly id: number;
  readonly handle: H;
  title: string;
  url: string;
  readonly createdAt: number;
}

export class TabRegistry<H extends TabHandle = TabHandle> {
  private tabs: Tab<H>[] = [];
  private activeId: number | null = null;
  private lastId = 0;

  get size(): number {
    return this.tabs.length;
  }

  /** Append a tab and make it active. Ids are never reused. */
  openTab(handle: H, url = "about:blank"): Tab<H> {
    const tab: Tab<H> = { id: ++this.lastId, handle, title: "", url, createdAt: Date.now() };
    this.tabs.push(tab);
    this.activeId = tab.id;
    return tab;
  }

  switchTab(position: TabPosition): Tab<H> {
    const id = this.idAt(position);
    if (id === undefined) {
      throw new RegistryError("tab_not_found", `tab not found: no tab at position ${position}`);
    }
    this.activeId = id;
    return this.require(id);
  }

  /**
   * Remove a tab (the active one when no id is given) and return it; the caller
   * releases its handle. A closed active tab passes activity to the tab before
   * it, else to the new first tab.
   */
  closeTab(id?: number): Tab<H> {
    const targetId = id ?? this.activeId;
    if (targetId === null) throw new RegistryError("no_active_tab");
    const index = this.tabs.findIndex((t) => t.id === targetId);
    const tab = this.tabs[index];
    if (tab === undefined) {
      throw new RegistryError("tab_not_found", `tab not found: id ${targetId}`);
    }
    this.tabs.splice(index, 1);
    if (this.activeId === targetId) {
      const successor = this.tabs[index - 1] ?? this.tabs[0];
      this.activeId = successor?.id ?? null;
    }
    return tab;
  }

  listTabs(): readonly TabSummary[] {
    return Object.freeze(
      this.tabs.map((t, i) =>
        Object.freeze({
          index: i + 1,
          id: t.id,
          title: t.title,
          url: t.url,
          active: t.id === this.activeId,
        }),
      ),
    );
  }

  get(id: number): Tab<H> | undefined {
    return this.tabs.find((t) => t.id === id);
  }

  active(): Tab<H> | undefined {
    return this.activeId === null ? undefined : this.get(this.activeId);
  }

  idAt(position: TabPosition): number | undefined {
    if (!Number.isInteger(position) || position < 1) return undefined;
    return this.tabs[position - 1]?.id;
  }

  positionOf(id: number): TabPosition | undefined {
    const index = this.tabs.findIndex((t) => t.id === id);
    return index === -1 ? undefined : index + 1;
  }

  /** Refresh cached page metadata. Unknown ids are ignored (the tab may have closed meanwhile). */
  update(id: number, meta: { title?: string; url?: string }): void {
    const tab = this.get(id);
    if (!tab) return;
    if (meta.title !== undefined) tab.title = meta.title;
    if (meta.url !== undefined) tab.url = meta.url;
  }

  /** Remove every tab, in order. */
  drain(): Tab<H>[] {
    const all = this.tabs;
    this.tabs = [];
    this.activeId = null;
    return all;
  }

  private require(id: number): Tab<H> {
    const tab = this.get(id);
    if (!tab) throw new RegistryError("tab_not_found", `tab not found: id ${id}`);
    return tab;
  }
}
