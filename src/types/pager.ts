/**
 * Pager state machine types
 * Events flow into PagerModel.update(), effects flow out to the session
 */

import type { LinkRegistry } from "../modules/registry";

export interface MarkdownDocument {
  localPath: string; // Absolute path on disk ("" when unknown)
  note: string; // Root-relative display name for the status bar
  body: string; // Markdown source
}

export interface NavEntry {
  path: string;
  yOffset: number;
}

export interface StatusMessage {
  message: string;
  isError: boolean;
}

export type KeyName =
  | "tab"
  | "shift+tab"
  | "enter"
  | "backspace"
  | "up"
  | "down"
  | "pageup"
  | "pagedown"
  | "halfpageup"
  | "halfpagedown"
  | "home"
  | "end"
  | "reload"
  | "help"
  | "quit"
  | "esc";

export type PagerEvent =
  | { type: "key"; key: KeyName }
  | { type: "resize"; width: number; height: number }
  | {
      type: "documentLoaded";
      requestId: number;
      document: MarkdownDocument;
      links: LinkRegistry;
    }
  | { type: "contentRendered"; content: string }
  | { type: "fileChanged" }
  | { type: "statusTimeout"; id: number }
  | { type: "error"; error: Error; requestId?: number };

export type PagerEffect =
  | { type: "load"; path: string; requestId: number }
  | { type: "render"; body: string; width: number }
  | { type: "watch"; path: string }
  | { type: "unwatch" }
  | { type: "statusTimer"; id: number; ms: number }
  | { type: "quit" };

/** Operation kinds reported by the directory watcher */
export type ChangeOp = "write" | "create" | "remove";

export interface ChangeEvent {
  path: string;
  op: ChangeOp;
}
