/**
 * Generic Markdown rendering for non-internal links
 */

import type { LinkDescription } from '../../types/index.js';

// Link types whose path is written without the type prefix
const LOCAL_TYPES = new Set(['file', 'fuzzy']);

/**
 * Link destination as written in Markdown
 */
export function linkTarget(link: LinkDescription): string {
  if (LOCAL_TYPES.has(link.type)) {
    return link.path;
  }
  return `${link.type}:${link.path}`;
}

/**
 * `[label](target)`, or an autolink `<target>` when there is no label.
 * Unlabelled fuzzy links (`[[Some heading]]`) stay as plain text.
 */
export function renderMarkdownLink(link: LinkDescription, label?: string): string {
  const target = linkTarget(link);
  if (label) {
    return `[${label}](${target.replace(/ /g, '%20')})`;
  }
  if (link.type === 'fuzzy') {
    return link.path.startsWith('#') ? `[${link.path}](${link.path})` : link.path;
  }
  if (link.type === 'file') {
    return `[${link.path}](${link.path.replace(/ /g, '%20')})`;
  }
  return `<${target}>`;
}
