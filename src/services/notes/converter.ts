/**
 * Body conversion to Markdown
 *
 * A small Org → Markdown pass covering headings, blocks,
 * lists, inline markup and links. Every link goes through the link hook,
 * so internal references reach the link transformer. Markdown bodies are
 * kept as written apart from their internal links.
 */

import type { LinkDescription, Note } from '../../types/index.js';
import type { LinkHook } from '../links/index.js';

const ORG_LINK = /\[\[([^\]]+)\](?:\[([^\]]+)\])?\]/g;
const MARKDOWN_INTERNAL_LINK = /\[([^\]]*)\]\((denote:[^)\s]+)\)/g;
const FENCE = /^\s*(```|~~~)/;

const PLACEHOLDER = '\u0000';
const PLACEHOLDER_PATTERN = /\u0000(\d+)\u0000/g;

/**
 * Split an Org link target into type and path.
 * `https://x` → https, `file:notes.org` → file, `./a.org` → file,
 * anything else without a scheme → fuzzy.
 */
export function parseLinkTarget(raw: string): LinkDescription {
  const target = raw.trim();
  const scheme = target.match(/^([A-Za-z][\w+.-]*):(.*)$/s);
  if (scheme && scheme[1] !== undefined) {
    return { type: scheme[1].toLowerCase(), path: scheme[2] ?? '' };
  }
  if (/^(?:\/|\.\.?\/|~\/)/.test(target)) {
    return { type: 'file', path: target };
  }
  return { type: 'fuzzy', path: target };
}

/**
 * Stash fragments that inline markup must not touch
 */
class Stash {
  private readonly parts: string[] = [];

  put(text: string): string {
    this.parts.push(text);
    return `${PLACEHOLDER}${this.parts.length - 1}${PLACEHOLDER}`;
  }

  restore(text: string): string {
    return text.replace(PLACEHOLDER_PATTERN, (_match, index: string) => this.parts[Number(index)] ?? '');
  }
}

// Emphasis markers need whitespace or punctuation on the outside
function emphasis(text: string, marker: string, open: string, close = open): string {
  const m = marker.replace(/[*+/]/g, '\\$&');
  const pattern = new RegExp(
    `(^|[\\s('"{])${m}([^\\s${m}](?:[^${m}\\n]*?[^\\s${m}])?)${m}(?=$|[\\s)'".,;:!?}-])`,
    'g'
  );
  return text.replace(pattern, (_match, before: string, inner: string) => `${before}${open}${inner}${close}`);
}

/**
 * Convert inline Org markup on one line
 */
export function convertInline(line: string, hook: LinkHook): string {
  const stash = new Stash();

  let text = line.replace(ORG_LINK, (_match, target: string, label?: string) =>
    stash.put(hook(parseLinkTarget(target), label))
  );

  text = text.replace(/(^|[\s('"])[=~]([^\s=~](?:[^=~\n]*?[^\s=~])?)[=~](?=$|[\s)'".,;:!?])/g,
    (_match, before: string, code: string) => `${before}${stash.put(`\`${code}\``)}`
  );

  text = emphasis(text, '*', '**');
  text = emphasis(text, '/', '*');
  text = emphasis(text, '+', '~~');

  return stash.restore(text);
}

/**
 * Convert an Org body to Markdown
 */
export function convertOrgBody(body: string, hook: LinkHook): string {
  const output: string[] = [];
  let inBlock = false;
  let inQuote = false;
  let inDrawer = false;

  for (const line of body.split(/\r?\n/)) {
    const trimmed = line.trim();
    const directive = trimmed.toLowerCase();

    if (inBlock) {
      if (directive.startsWith('#+end_src') || directive.startsWith('#+end_example')) {
        output.push('```');
        inBlock = false;
      } else {
        output.push(line);
      }
      continue;
    }

    if (inDrawer) {
      if (directive === ':end:') inDrawer = false;
      continue;
    }

    const src = trimmed.match(/^#\+begin_src(?:\s+([\w+-]+))?/i);
    if (src) {
      output.push(`\`\`\`${src[1] ?? ''}`);
      inBlock = true;
      continue;
    }
    if (directive.startsWith('#+begin_example')) {
      output.push('```');
      inBlock = true;
      continue;
    }
    if (directive.startsWith('#+begin_quote')) {
      inQuote = true;
      continue;
    }
    if (directive.startsWith('#+end_quote')) {
      inQuote = false;
      continue;
    }
    if (/^:[\w-]+:$/.test(trimmed) && directive !== ':end:') {
      inDrawer = true;
      continue;
    }
    // Remaining directives and comment lines have no Markdown form
    if (trimmed.startsWith('#+') || trimmed === '#' || trimmed.startsWith('# ')) {
      continue;
    }

    output.push(convertLine(line, hook, inQuote));
  }

  const markdown = collapseBlankLines(output).join('\n').trim();
  return markdown ? `${markdown}\n` : '';
}

function convertLine(line: string, hook: LinkHook, inQuote: boolean): string {
  const heading = line.match(/^(\*+)\s+(.*?)(?:\s+:[\w@#%:]+:)?\s*$/);
  let converted: string;

  if (heading && heading[1] !== undefined) {
    const level = Math.min(6, heading[1].length);
    converted = `${'#'.repeat(level)} ${convertInline(heading[2] ?? '', hook)}`;
  } else {
    const item = line.match(/^(\s*)(?:[-+]|(\d+)[.)])\s+(.*)$/);
    if (item) {
      const marker = item[2] !== undefined ? `${item[2]}.` : '-';
      converted = `${item[1] ?? ''}${marker} ${convertInline(item[3] ?? '', hook)}`;
    } else {
      converted = convertInline(line, hook);
    }
  }

  if (inQuote) {
    return converted.trim() ? `> ${converted.trim()}` : '>';
  }
  return converted;
}

function collapseBlankLines(lines: string[]): string[] {
  const result: string[] = [];
  for (const line of lines) {
    if (line.trim() === '' && (result.length === 0 || result[result.length - 1]?.trim() === '')) {
      continue;
    }
    result.push(line);
  }
  return result;
}

/**
 * Rewrite internal links in a Markdown body, leaving fenced code alone.
 * Both `[label](denote:ID)` and Org-style `[[denote:ID][label]]` are accepted.
 */
export function convertMarkdownBody(body: string, hook: LinkHook): string {
  let inFence = false;

  const lines = body.split(/\r?\n/).map((line) => {
    if (FENCE.test(line)) {
      inFence = !inFence;
      return line;
    }
    if (inFence) return line;

    return line
      .replace(ORG_LINK, (match, target: string, label?: string) => {
        const link = parseLinkTarget(target);
        return link.type === 'denote' ? hook(link, label) : match;
      })
      .replace(MARKDOWN_INTERNAL_LINK, (_match, label: string, target: string) =>
        hook(parseLinkTarget(target), label || undefined)
      );
  });

  return lines.join('\n');
}

/**
 * Convert a note body to Markdown according to its format
 */
export function convertBody(note: Note, hook: LinkHook): string {
  return note.format === 'org' ? convertOrgBody(note.body, hook) : convertMarkdownBody(note.body, hook);
}
