/**
 * Session Module
 * Runs a PagerModel: feeds it one event at a time and executes its effects
 *
 * Effects complete asynchronously and come back as events on the same
 * queue, so the model is never touched by two handlers at once.
 */

import path from "node:path";
import type { PagerEffect, PagerEvent } from "../types";
import { Logger, toError } from "../utils";
import type { DocumentLoader } from "./loader";
import type { PagerModel } from "./pager";
import { shouldReload, type Watcher } from "./watcher";

export type RenderFunction = (body: string, width: number) => string;

export interface SessionDependencies {
  loader: DocumentLoader;
  render: RenderFunction;
  watcher: Watcher;
  /** Called after every batch of events has been handled */
  draw: (model: PagerModel) => void;
  logger?: Logger;
}

export class PagerSession {
  readonly done: Promise<void>;

  private queue: PagerEvent[] = [];
  private draining = false;
  private closed = false;
  private timers = new Set<ReturnType<typeof setTimeout>>();
  private resolveDone: () => void = () => {};
  private logger: Logger;

  constructor(
    private model: PagerModel,
    private deps: SessionDependencies,
  ) {
    this.logger = deps.logger ?? Logger.silent();
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Load the first document
   */
  open(filePath: string): void {
    this.runAll(this.model.open(filePath));
    this.deps.draw(this.model);
  }

  dispatch(event: PagerEvent): void {
    if (this.closed) return;
    this.queue.push(event);
    this.drain();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.deps.watcher.stop();
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.queue = [];
    this.resolveDone();
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;

    try {
      let event = this.queue.shift();
      while (event && !this.closed) {
        this.runAll(this.model.update(event));
        event = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }

    if (!this.closed) {
      this.deps.draw(this.model);
    }
  }

  private runAll(effects: PagerEffect[]): void {
    for (const effect of effects) {
      this.run(effect);
    }
  }

  private run(effect: PagerEffect): void {
    switch (effect.type) {
      case "load": {
        this.logger.debug("loading", { file: effect.path });
        const { requestId } = effect;
        void this.deps.loader(effect.path).then(
          ({ document, links }) =>
            this.dispatch({
              type: "documentLoaded",
              requestId,
              document,
              links,
            }),
          (error: unknown) => {
            this.logger.error("error loading document", {
              file: effect.path,
              error: toError(error),
            });
            this.dispatch({
              type: "error",
              error: toError(error),
              requestId,
            });
          },
        );
        return;
      }

      case "render": {
        // Rendering runs off the event sequence and reports back as an event
        const { body, width } = effect;
        setImmediate(() => {
          let content: string;
          try {
            content = this.deps.render(body, width);
          } catch (error) {
            this.logger.error("error rendering", { error: toError(error) });
            this.dispatch({ type: "error", error: toError(error) });
            return;
          }
          this.dispatch({ type: "contentRendered", content });
        });
        return;
      }

      case "watch": {
        const watchedPath = effect.path;
        try {
          this.deps.watcher.start(path.dirname(watchedPath), (change) => {
            if (shouldReload(change, watchedPath)) {
              this.dispatch({ type: "fileChanged" });
            }
          });
        } catch (error) {
          this.logger.error("error watching dir", {
            dir: path.dirname(watchedPath),
            error: toError(error),
          });
        }
        return;
      }

      case "unwatch":
        this.deps.watcher.stop();
        return;

      case "statusTimer": {
        const timer = setTimeout(() => {
          this.timers.delete(timer);
          this.dispatch({ type: "statusTimeout", id: effect.id });
        }, effect.ms);
        this.timers.add(timer);
        return;
      }

      case "quit":
        this.close();
        return;
    }
  }
}
