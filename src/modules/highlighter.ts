/**
 * Highlighter Module
 * Marks the focused link inside text that is already ANSI-styled
 *
 * Offsets are UTF-16 code-unit indexes into the JavaScript string.
 * A printable character is one code point, so surrogate pairs stay whole.
 */

import type { FollowableLink } from "../types";

export const REVERSE_ON = "\x1b[7m";
export const REVERSE_OFF = "\x1b[27m";
export const RESET = "\x1b[0m";

const ESC = 0x1b;
const CSI_FINAL_MIN = 0x40;
const CSI_FINAL_MAX = 0x7e;

export interface PrintableScan {
  chars: string[]; // Printable characters, escape sequences removed
  offsets: number[]; // Start offset of each char in the source, plus a sentinel
}

/**
 * Split styled text into printable characters and their source offsets
 * "ESC [" through the first char in 0x40-0x7E is one escape sequence
 * and produces nothing.
 *
 * @example
 * printableRunesAndOffsets("\x1b[1mHi\x1b[0m")
 * // { chars: ["H", "i"], offsets: [4, 5, 10] }
 */
export function printableRunesAndOffsets(text: string): PrintableScan {
  const chars: string[] = [];
  const offsets: number[] = [];

  let i = 0;
  while (i < text.length) {
    if (text.charCodeAt(i) === ESC && text.charAt(i + 1) === "[") {
      i += 2;
      while (i < text.length) {
        const c = text.charCodeAt(i);
        i++;
        if (c >= CSI_FINAL_MIN && c <= CSI_FINAL_MAX) break;
      }
      continue;
    }

    // Lone surrogates come back as themselves and count as one unit
    const codePoint = text.codePointAt(i) ?? 0;
    const size = codePoint > 0xffff ? 2 : 1;

    chars.push(text.slice(i, i + size));
    offsets.push(i);
    i += size;
  }

  offsets.push(text.length);

  return { chars, offsets };
}

interface Span {
  start: number;
  end: number;
}

/**
 * Wrap the focused link's label in reverse video
 * Labels are searched in registry order with a cursor that only moves
 * forward, so repeated labels map to successive occurrences.
 * Returns the input unchanged when focus is out of range or the label
 * cannot be found.
 */
export function highlightFocusedLink(
  rendered: string,
  links: Iterable<FollowableLink>,
  focused: number,
): string {
  const list = [...links];
  if (focused < 0 || focused >= list.length) {
    return rendered;
  }

  const { chars, offsets } = printableRunesAndOffsets(rendered);
  if (chars.length === 0) {
    return rendered;
  }
  const printable = chars.join("");

  // Printable code-unit index -> printable char index
  const charIndex: number[] = [];
  chars.forEach((char, index) => {
    for (let k = 0; k < char.length; k++) charIndex.push(index);
  });

  let span: Span | null = null;
  let searchFrom = 0;

  for (let i = 0; i <= focused; i++) {
    const label = list[i].label.trim();
    if (label === "" || searchFrom >= printable.length) continue;

    const found = printable.indexOf(label, searchFrom);
    if (found < 0) continue;
    searchFrom = found + label.length;

    if (i === focused) {
      // The span runs up to the next printable char (or the sentinel), so
      // escapes right after the label fall inside the markers
      const first = charIndex[found];
      const labelCharCount = charIndex[found + label.length - 1] - first + 1;
      const start = offsets[first];
      const end = offsets[first + labelCharCount];
      if (end >= start && end <= rendered.length) {
        span = { start, end };
      }
    }
  }

  if (!span) {
    return rendered;
  }

  return (
    rendered.slice(0, span.start) +
    REVERSE_ON +
    rendered.slice(span.start, span.end) +
    REVERSE_OFF +
    rendered.slice(span.end)
  );
}

/**
 * Cut a styled line to at most width printable characters
 * Never splits an escape sequence; a cut line ends with a reset.
 */
export function truncateAnsi(line: string, width: number): string {
  const { chars, offsets } = printableRunesAndOffsets(line);
  if (chars.length <= width) {
    return line;
  }
  return line.slice(0, offsets[Math.max(0, width)]) + RESET;
}
