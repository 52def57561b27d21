/**
 * Note header parsing
 *
 * Markdown notes carry YAML front matter (read with gray-matter); Org
 * notes carry `#+KEY: value` keyword lines before the body.
 */

import matter from 'gray-matter';

/**
 * Parse YAML frontmatter from markdown content
 */
export function parseFrontmatter(content: string): {
  frontmatter: Record<string, unknown>;
  body: string;
} {
  const { data, content: body } = matter(content);
  return {
    frontmatter: { ...data },
    body: body.replace(/^\n+/, ''),
  };
}

const KEYWORD_LINE = /^#\+([A-Za-z][\w-]*):[ \t]*(.*?)\s*$/;

/**
 * Parse the leading keyword block of an Org document.
 * Keys are upper-cased; the block ends at the first line that is neither
 * a keyword nor blank. Later duplicates win.
 */
export function parseOrgKeywords(content: string): {
  keywords: Map<string, string>;
  body: string;
} {
  const keywords = new Map<string, string>();
  const lines = content.split(/\r?\n/);
  let index = 0;

  for (; index < lines.length; index++) {
    const line = lines[index] ?? '';
    const match = line.match(KEYWORD_LINE);
    if (match && match[1] !== undefined) {
      keywords.set(match[1].toUpperCase(), match[2] ?? '');
      continue;
    }
    if (line.trim() === '') {
      continue;
    }
    break;
  }

  return {
    keywords,
    body: lines.slice(index).join('\n'),
  };
}
