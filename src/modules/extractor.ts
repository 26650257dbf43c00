/**
 * Extractor Module
 * Pulls link destinations and visible labels out of a markdown parse tree
 *
 * Inline and reference-style links are both reported. Images never are:
 * they are separate node types in mdast, though an image inside a link
 * gives the link its alt text as label. Autolinks share the link node type,
 * so they are told apart by their source text.
 */

import type { Link, LinkReference, Root } from "mdast";
import remarkParse from "remark-parse";
import { unified } from "unified";
import { visit } from "unist-util-visit";
import type { RawLink } from "../types";

const parser = unified().use(remarkParse);

/**
 * Parse markdown source into an mdast tree (CommonMark, no extensions)
 */
export function parseMarkdown(source: string): Root {
  return parser.parse(source);
}

/**
 * Concatenate the literal text inside a link
 * Emphasis and other wrappers contribute only their text children;
 * images contribute their alt text
 */
function labelText(node: Link | LinkReference): string {
  const parts: string[] = [];
  visit(node, (child) => {
    if (child.type === "text" || child.type === "inlineCode") {
      parts.push(child.value);
    } else if (child.type === "image" || child.type === "imageReference") {
      parts.push(child.alt ?? "");
    }
  });
  return parts.join("").trim();
}

function isAutolink(node: Link, source: string): boolean {
  const offset = node.position?.start.offset;
  return offset !== undefined && source.charAt(offset) === "<";
}

/**
 * Extract every link of the document in document order
 *
 * @example
 * extractRawLinks("See [Guide](docs/guide.md).")
 * // [{ href: "docs/guide.md", label: "Guide" }]
 */
export function extractRawLinks(markdown: string): RawLink[] {
  const tree = parseMarkdown(markdown);

  // First definition of an identifier wins
  const definitions = new Map<string, string>();
  visit(tree, "definition", (node) => {
    if (!definitions.has(node.identifier)) {
      definitions.set(node.identifier, node.url);
    }
  });

  const links: RawLink[] = [];

  visit(tree, (node) => {
    let destination: string | undefined;

    if (node.type === "link") {
      if (isAutolink(node, markdown)) return;
      destination = node.url;
    } else if (node.type === "linkReference") {
      destination = definitions.get(node.identifier);
    } else {
      return;
    }

    const href = destination?.trim() ?? "";
    if (href === "") return;

    links.push({ href, label: labelText(node) });
  });

  return links;
}
