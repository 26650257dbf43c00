/**
 * Watcher Module
 * Watches one directory at a time and reports changed files
 */

import path from "node:path";
import { watch, type WatchEventType } from "node:fs";
import type { ChangeEvent, ChangeOp } from "../types";
import { Logger, fileExists } from "../utils";

export type ChangeListener = (event: ChangeEvent) => void;

export interface Watcher {
  start(directory: string, onChange: ChangeListener): void;
  stop(): void;
}

/**
 * Only writes and creations of the displayed file trigger a reload
 */
export function shouldReload(event: ChangeEvent, currentPath: string): boolean {
  if (event.path !== currentPath) {
    return false;
  }
  return event.op === "write" || event.op === "create";
}

async function classifyChange(
  eventType: WatchEventType,
  filePath: string,
): Promise<ChangeOp> {
  if (eventType === "change") {
    return "write";
  }
  // "rename" covers both creation and removal
  return (await fileExists(filePath)) ? "create" : "remove";
}

export class DirectoryWatcher implements Watcher {
  private controller: AbortController | null = null;
  private watchedDir = "";

  constructor(private logger: Logger = Logger.silent()) {}

  get directory(): string {
    return this.watchedDir;
  }

  /**
   * Watch a directory, replacing any previous watch
   */
  start(directory: string, onChange: ChangeListener): void {
    this.stop();

    const controller = new AbortController();
    const { signal } = controller;

    const watcher = watch(directory, { signal }, (eventType, filename) => {
      if (signal.aborted || !filename) return;

      const changed = path.join(directory, filename);
      void classifyChange(eventType, changed).then((op) => {
        // A canceled watch delivers nothing
        if (signal.aborted) return;
        this.logger.debug("fs event", { file: changed, op });
        onChange({ path: changed, op });
      });
    });

    watcher.on("error", (error) => {
      if (signal.aborted) return;
      this.logger.debug("fs watch error", { dir: directory, error });
    });

    this.controller = controller;
    this.watchedDir = directory;
    this.logger.info("watching dir", { dir: directory });
  }

  stop(): void {
    if (!this.controller) {
      return;
    }

    this.controller.abort();
    this.controller = null;
    this.logger.debug("dir unwatched", { dir: this.watchedDir });
    this.watchedDir = "";
  }
}
