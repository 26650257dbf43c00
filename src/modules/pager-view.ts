/**
 * Pager View
 * Draws the viewport, status bar and help screen of a PagerModel
 */

import chalk, { type ChalkInstance } from "chalk";
import { printableRunesAndOffsets, truncateAnsi } from "./highlighter";
import type { PagerModel } from "./pager";

const ELLIPSIS = "…";

const HELP_ROWS: Array<[string, string]> = [
  ["k/↑      up", "g/home  go to top"],
  ["j/↓      down", "G/end   go to bottom"],
  ["b/pgup   page up", "tab     next link"],
  ["f/pgdn   page down", "⇧tab    prev link"],
  ["u        ½ page up", "enter   follow link"],
  ["d        ½ page down", "⌫       go back"],
  ["", "r       reload this document"],
  ["", "?       toggle help"],
  ["", "q/esc   quit"],
];

/** Lines the help view adds below the status bar */
export const HELP_HEIGHT = HELP_ROWS.length + 1;

function printableWidth(text: string): number {
  return printableRunesAndOffsets(text).chars.length;
}

function truncateWithTail(text: string, width: number): string {
  const { chars } = printableRunesAndOffsets(text);
  if (chars.length <= width) return text;
  if (width <= 0) return "";
  return chars.slice(0, width - 1).join("") + ELLIPSIS;
}

/**
 * Status bar: logo, note or status message, scroll percentage, help hint
 */
export function statusBarView(
  model: PagerModel,
  style: ChalkInstance = chalk,
): string {
  const showingMessage = model.state === "statusMessage";
  const isError = model.statusMessage?.isError ?? false;

  const noteStyle = showingMessage
    ? isError
      ? style.white.bgRed
      : style.hex("#89F0CB").bgHex("#1C8760")
    : style.gray.bgHex("#242424");

  const logo = style.bold.hex("#ECFD65").bgHex("#FF5F87")(" mdnav ");

  const percent = Math.round(model.viewport.scrollPercent() * 100);
  const scrollPercent = noteStyle(` ${String(percent).padStart(3)}% `);
  const helpNote = noteStyle(" ? Help ");

  const text = showingMessage
    ? (model.statusMessage?.message ?? "")
    : model.currentDocument.note;

  const available =
    model.width -
    printableWidth(logo) -
    printableWidth(scrollPercent) -
    printableWidth(helpNote);
  const note = noteStyle(truncateWithTail(` ${text} `, Math.max(0, available)));

  const padding = Math.max(0, available - printableWidth(note));
  const emptySpace = noteStyle(" ".repeat(padding));

  return `${logo}${note}${emptySpace}${scrollPercent}${helpNote}`;
}

export function helpView(width: number, style: ChalkInstance = chalk): string {
  const lines = [""];
  for (const [left, right] of HELP_ROWS) {
    lines.push(`  ${left.padEnd(24)}${right}`);
  }
  return lines
    .map((line) => style.gray(line.padEnd(Math.max(width, line.length))))
    .join("\n");
}

/**
 * Full screen contents for the current model state
 */
export function pagerView(
  model: PagerModel,
  style: ChalkInstance = chalk,
): string {
  const body = model.viewport
    .visibleLines()
    .map((line) => truncateAnsi(line, model.width))
    .join("\n");

  let out = `${body}\n${statusBarView(model, style)}`;
  if (model.showHelp) {
    out += `\n${helpView(model.width, style)}`;
  }
  return out;
}
