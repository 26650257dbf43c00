/**
 * History Module
 * Back-stack of documents left by following links
 */

import type { NavEntry } from "../types";

export class NavigationHistory {
  private entries: NavEntry[] = [];

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  push(entry: NavEntry): void {
    this.entries.push({ ...entry });
  }

  /**
   * Remove and return the most recent entry
   */
  pop(): NavEntry | undefined {
    return this.entries.pop();
  }

  peek(): NavEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  clear(): void {
    this.entries = [];
  }
}
