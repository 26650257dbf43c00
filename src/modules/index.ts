/**
 * Module exports
 */

export { extractRawLinks, parseMarkdown } from "./extractor";
export { isFollowableHref, resolveFollowableLink } from "./resolver";
export { LinkRegistry, followableLinksForDocument } from "./registry";
export {
  highlightFocusedLink,
  printableRunesAndOffsets,
  truncateAnsi,
  REVERSE_ON,
  REVERSE_OFF,
} from "./highlighter";
export type { PrintableScan } from "./highlighter";
export { NavigationHistory } from "./history";
export { Viewport } from "./viewport";
export { PagerModel } from "./pager";
export type { PagerOptions, PagerState } from "./pager";
export { pagerView, statusBarView, helpView, HELP_HEIGHT } from "./pager-view";
export { renderMarkdown } from "./renderer";
export type { RenderOptions } from "./renderer";
export { createDocumentLoader } from "./loader";
export type { DocumentLoader, LoadedDocument } from "./loader";
export { DirectoryWatcher, shouldReload } from "./watcher";
export type { Watcher, ChangeListener } from "./watcher";
export { keyFromKeypress } from "./keys";
export type { Keypress } from "./keys";
export { PagerSession } from "./session";
export type { SessionDependencies, RenderFunction } from "./session";
