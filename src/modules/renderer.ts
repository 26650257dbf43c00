/**
 * Renderer Module
 * Minimal markdown to ANSI rendering for the terminal pager
 *
 * Link labels are printed verbatim (no destination after them) so the
 * highlighter can find them in the output.
 */

import chalk, { type ChalkInstance } from "chalk";
import type { PhrasingContent, RootContent } from "mdast";
import { parseMarkdown } from "./extractor";

export interface RenderOptions {
  style?: ChalkInstance;
  showLineNumbers?: boolean;
}

const LINE_NUMBER_WIDTH = 4;
const RULE_WIDTH = 40;

function renderInline(nodes: PhrasingContent[], style: ChalkInstance): string {
  return nodes.map((node) => renderInlineNode(node, style)).join("");
}

function renderInlineNode(node: PhrasingContent, style: ChalkInstance): string {
  switch (node.type) {
    case "text":
    case "html":
      return node.value;
    case "inlineCode":
      return style.cyan(node.value);
    case "emphasis":
      return style.italic(renderInline(node.children, style));
    case "strong":
      return style.bold(renderInline(node.children, style));
    case "delete":
      return style.strikethrough(renderInline(node.children, style));
    case "break":
      return "\n";
    case "link":
    case "linkReference":
      return style.underline.blue(renderInline(node.children, style));
    case "image":
    case "imageReference":
      return style.dim(`Image: ${node.alt ?? ""}`);
    default:
      return "";
  }
}

function indent(text: string, first: string, rest: string): string {
  return text
    .split("\n")
    .map((line, i) => (i === 0 ? first : rest) + line)
    .join("\n");
}

function renderBlocks(nodes: RootContent[], style: ChalkInstance): string {
  return nodes
    .map((node) => renderBlock(node, style))
    .filter((block) => block !== null)
    .join("\n\n");
}

function renderBlock(node: RootContent, style: ChalkInstance): string | null {
  switch (node.type) {
    case "heading": {
      const text = `${"#".repeat(node.depth)} ${renderInline(node.children, style)}`;
      return node.depth === 1 ? style.bold.magenta(text) : style.bold.cyan(text);
    }
    case "paragraph":
      return renderInline(node.children, style);
    case "blockquote":
      return indent(renderBlocks(node.children, style), "│ ", "│ ");
    case "list": {
      const start = node.start ?? 1;
      return node.children
        .map((item, i) => {
          const marker = node.ordered ? `${start + i}. ` : "• ";
          const body = item.children
            .map((child) => renderBlock(child, style))
            .filter((block) => block !== null)
            .join(node.spread ? "\n\n" : "\n");
          return indent(body, marker, " ".repeat(marker.length));
        })
        .join(node.spread ? "\n\n" : "\n");
    }
    case "code":
      return indent(style.yellow(node.value), "  ", "  ");
    case "thematicBreak":
      return style.dim("─".repeat(RULE_WIDTH));
    case "html":
      return style.dim(node.value);
    case "definition":
      return null;
    default:
      // GFM and frontmatter nodes are never produced by the CommonMark parser
      return null;
  }
}

/**
 * Render markdown source to styled terminal text
 */
export function renderMarkdown(
  markdown: string,
  options: RenderOptions = {},
): string {
  const style = options.style ?? chalk;
  const tree = parseMarkdown(markdown);
  const out = renderBlocks(tree.children, style);

  if (!options.showLineNumbers) {
    return out;
  }

  return out
    .split("\n")
    .map((line, i) => {
      const number = String(i + 1).padStart(LINE_NUMBER_WIDTH);
      return `${style.gray(number)} ${line}`;
    })
    .join("\n");
}
