/**
 * Pager Module
 * Single owner of pager state: focus, link registry, history and scroll
 *
 * update() handles one event to completion and returns the effects the
 * session must run. Effects report back only through new events.
 */

import type {
  KeyName,
  MarkdownDocument,
  PagerEffect,
  PagerEvent,
  StatusMessage,
} from "../types";
import { Logger } from "../utils";
import { highlightFocusedLink } from "./highlighter";
import { NavigationHistory } from "./history";
import { LinkRegistry } from "./registry";
import { Viewport } from "./viewport";

export const STATUS_BAR_HEIGHT = 1;

export type PagerState = "browse" | "statusMessage";

export interface PagerOptions {
  statusMessageTimeout: number;
  watch: boolean;
  /** Lines taken by the help view while it is shown */
  helpHeight?: number;
}

const EMPTY_DOCUMENT: MarkdownDocument = { localPath: "", note: "", body: "" };

export class PagerModel {
  readonly viewport = new Viewport();
  readonly history = new NavigationHistory();

  state: PagerState = "browse";
  showHelp = false;
  statusMessage: StatusMessage | null = null;

  currentDocument: MarkdownDocument = EMPTY_DOCUMENT;
  rendered = "";
  links: LinkRegistry = LinkRegistry.empty();
  focusedLink = -1;
  pendingRestoreYOffset: number | null = null;

  width = 0;
  height = 0;

  private statusTimerId = 0;
  private loadRequestId = 0;

  constructor(
    private options: PagerOptions,
    private logger: Logger = Logger.silent(),
  ) {}

  /** Id of the newest load request */
  get latestLoadRequest(): number {
    return this.loadRequestId;
  }

  /**
   * Request the first document
   */
  open(path: string): PagerEffect[] {
    return [this.loadEffect(path)];
  }

  update(event: PagerEvent): PagerEffect[] {
    switch (event.type) {
      case "key":
        return this.handleKey(event.key);

      case "resize":
        this.setSize(event.width, event.height);
        return this.renderCurrent();

      case "documentLoaded":
        if (event.requestId !== this.loadRequestId) {
          this.logger.debug("stale load ignored", {
            file: event.document.localPath,
            requestId: event.requestId,
          });
          return [];
        }
        this.logger.debug("document loaded", {
          file: event.document.localPath,
          links: event.links.length,
        });
        this.currentDocument = event.document;
        this.links = event.links;
        if (this.focusedLink >= this.links.length) {
          this.focusedLink = -1;
        }
        return this.renderCurrent();

      case "contentRendered": {
        this.logger.debug("content rendered", { state: this.state });
        this.rendered = event.content;
        this.applyRenderedContent();
        if (this.pendingRestoreYOffset !== null) {
          this.viewport.setYOffset(this.pendingRestoreYOffset);
          this.pendingRestoreYOffset = null;
        }
        const path = this.currentDocument.localPath;
        return this.options.watch && path ? [{ type: "watch", path }] : [];
      }

      case "fileChanged":
        return this.reload();

      case "statusTimeout":
        if (event.id === this.statusTimerId) {
          this.state = "browse";
          this.statusMessage = null;
        }
        return [];

      case "error":
        if (
          event.requestId !== undefined &&
          event.requestId !== this.loadRequestId
        ) {
          return [];
        }
        this.pendingRestoreYOffset = null;
        return this.showStatusMessage({
          message: event.error.message,
          isError: true,
        });
    }
  }

  /**
   * Drop the current document and everything derived from it
   */
  unload(): PagerEffect[] {
    this.logger.debug("unload");
    if (this.showHelp) {
      this.toggleHelp();
    }
    this.state = "browse";
    this.statusMessage = null;
    this.statusTimerId++;
    this.currentDocument = EMPTY_DOCUMENT;
    this.rendered = "";
    this.viewport.setContent("");
    this.viewport.gotoTop();
    this.links = LinkRegistry.empty();
    this.focusedLink = -1;
    this.history.clear();
    this.pendingRestoreYOffset = null;
    return [{ type: "unwatch" }];
  }

  setSize(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.viewport.width = width;
    this.viewport.height = Math.max(0, height - STATUS_BAR_HEIGHT);

    if (this.showHelp) {
      this.viewport.height = Math.max(
        0,
        this.viewport.height - STATUS_BAR_HEIGHT - (this.options.helpHeight ?? 0),
      );
    }
  }

  private handleKey(key: KeyName): PagerEffect[] {
    switch (key) {
      case "quit":
      case "esc":
        if (this.state !== "browse") {
          this.state = "browse";
          this.statusMessage = null;
          return [];
        }
        return [...this.unload(), { type: "quit" }];

      case "tab":
        return this.cycleFocus(1);

      case "shift+tab":
        return this.cycleFocus(-1);

      case "enter":
        if (this.focusedLink >= 0 && this.focusedLink < this.links.length) {
          return this.followFocusedLink();
        }
        if (this.links.length > 0) {
          return this.showStatusMessage({
            message: "Tab to select a link",
            isError: false,
          });
        }
        return [];

      case "backspace":
        if (this.history.isEmpty) {
          return this.showStatusMessage({
            message: "No previous document",
            isError: false,
          });
        }
        return this.goBack();

      case "up":
        this.viewport.lineUp();
        return [];
      case "down":
        this.viewport.lineDown();
        return [];
      case "pageup":
        this.viewport.pageUp();
        return [];
      case "pagedown":
        this.viewport.pageDown();
        return [];
      case "halfpageup":
        this.viewport.halfPageUp();
        return [];
      case "halfpagedown":
        this.viewport.halfPageDown();
        return [];
      case "home":
        this.viewport.gotoTop();
        return [];
      case "end":
        this.viewport.gotoBottom();
        return [];

      case "reload":
        return this.reload();

      case "help":
        this.toggleHelp();
        return [];
    }
  }

  private cycleFocus(step: 1 | -1): PagerEffect[] {
    const count = this.links.length;
    if (count === 0) {
      return this.showStatusMessage({
        message: "No followable links",
        isError: false,
      });
    }

    if (this.focusedLink < 0) {
      this.focusedLink = step > 0 ? 0 : count - 1;
    } else {
      this.focusedLink = (this.focusedLink + step + count) % count;
    }

    this.applyRenderedContent();

    const link = this.links.at(this.focusedLink);
    return this.showStatusMessage({
      message: `Open: ${link?.resolvedNote ?? ""}`,
      isError: false,
    });
  }

  private followFocusedLink(): PagerEffect[] {
    const link = this.links.at(this.focusedLink);
    if (!link?.resolvedPath) {
      return [];
    }

    const current = this.currentDocument.localPath;
    if (current) {
      this.history.push({ path: current, yOffset: this.viewport.yOffset });
    }

    this.logger.info("follow link", { from: current, to: link.resolvedPath });

    this.focusedLink = -1;
    this.viewport.gotoTop();
    this.pendingRestoreYOffset = null;

    return [this.loadEffect(link.resolvedPath)];
  }

  private goBack(): PagerEffect[] {
    const last = this.history.pop();
    if (!last) {
      return [];
    }

    this.logger.info("go back", { to: last.path, yOffset: last.yOffset });

    this.focusedLink = -1;
    this.pendingRestoreYOffset = last.yOffset;
    this.viewport.gotoTop();

    return [this.loadEffect(last.path)];
  }

  private reload(): PagerEffect[] {
    const path = this.currentDocument.localPath;
    return path ? [this.loadEffect(path)] : [];
  }

  /**
   * Only the newest load may replace the document; earlier ones still in
   * flight are ignored when they complete
   */
  private loadEffect(path: string): PagerEffect {
    this.loadRequestId++;
    return { type: "load", path, requestId: this.loadRequestId };
  }

  private renderCurrent(): PagerEffect[] {
    if (!this.currentDocument.localPath) {
      return [];
    }
    return [
      {
        type: "render",
        body: this.currentDocument.body,
        width: this.viewport.width,
      },
    ];
  }

  private applyRenderedContent(): void {
    let content = this.rendered;
    if (this.focusedLink >= 0) {
      content = highlightFocusedLink(content, this.links, this.focusedLink);
    }
    this.viewport.setContent(content);
  }

  private toggleHelp(): void {
    this.showHelp = !this.showHelp;
    this.setSize(this.width, this.height);
    if (this.viewport.pastBottom()) {
      this.viewport.gotoBottom();
    }
  }

  private showStatusMessage(message: StatusMessage): PagerEffect[] {
    this.state = "statusMessage";
    this.statusMessage = message;
    this.statusTimerId++;
    return [
      {
        type: "statusTimer",
        id: this.statusTimerId,
        ms: this.options.statusMessageTimeout,
      },
    ];
  }
}
