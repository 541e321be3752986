/**
 * DOM Helpers
 *
 * Small cheerio helpers shared by the page parsers.
 */

import type { Cheerio } from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';

/**
 * Non-blank text nodes under the selection, trimmed, in document order
 *
 * @example
 * // <a>Dana Levi<span>Team</span></a>
 * textPieces($('a')) // ['Dana Levi', 'Team']
 */
export function textPieces(selection: Cheerio<AnyNode>): string[] {
  const pieces: string[] = [];
  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      const text = node.data.trim();
      if (text) pieces.push(text);
      return;
    }
    if (hasChildren(node)) node.children.forEach(walk);
  };
  selection.toArray().forEach(walk);
  return pieces;
}

export function classList(selection: Cheerio<AnyNode>): string[] {
  return (selection.attr('class') ?? '').split(/\s+/).filter(Boolean);
}

/**
 * Field key carried by a `data-<key>` class, e.g. "data-fgs" → "fgs"
 */
export function dataClassKey(classes: readonly string[]): string | undefined {
  const cls = classes.find(c => c.startsWith('data-'));
  return cls ? cls.slice('data-'.length) : undefined;
}
