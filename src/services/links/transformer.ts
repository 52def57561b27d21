/**
 * Link transformer
 *
 * Formats internal `denote:` references as HTML anchors carrying the
 * configured style class. Every other link type is handed to the host's
 * generic renderer.
 */

import type { LinkDescription, ResolvedReference } from '../../types/index.js';

export const INTERNAL_LINK_TYPE = 'denote';

/**
 * Maps a raw internal link path to (identifier, query)
 */
export type ReferenceResolver = (path: string) => ResolvedReference;

/**
 * Renders a non-internal link in the target format
 */
export type GenericLinkRenderer = (link: LinkDescription, label?: string) => string;

/**
 * Host collaborators the transformer delegates to
 */
export interface LinkTransformerDeps {
  resolve: ReferenceResolver;
  fallback: GenericLinkRenderer;
}

/**
 * The narrow hook a body converter calls once per inline link
 */
export type LinkHook = (link: LinkDescription, label?: string) => string;

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function isInternalLink(link: LinkDescription): boolean {
  return link.type === INTERNAL_LINK_TYPE;
}

/**
 * Visible text: explicit label, else `identifier::query`, else identifier
 */
export function referenceLabel(ref: ResolvedReference, explicitLabel?: string): string {
  if (explicitLabel) return explicitLabel;
  if (ref.query) return `${ref.identifier}::${ref.query}`;
  return ref.identifier;
}

/**
 * Anchor destination: `denote:<identifier>.html` followed by the query
 * verbatim. No suffix at all when there is no query.
 */
export function referenceHref(ref: ResolvedReference): string {
  const targetPath = `${INTERNAL_LINK_TYPE}:${ref.identifier}`;
  return `${targetPath}.html${ref.query ?? ''}`;
}

/**
 * Render one resolved internal reference as an anchor
 */
export function renderReference(
  ref: ResolvedReference,
  explicitLabel: string | undefined,
  styleClass: string
): string {
  const href = escapeHtml(referenceHref(ref));
  const label = escapeHtml(referenceLabel(ref, explicitLabel));
  return `<a href="${href}" class="${escapeHtml(styleClass)}">${label}</a>`;
}

/**
 * Render a link: internal references become styled anchors, everything
 * else goes to the generic renderer.
 */
export function renderLink(
  link: LinkDescription,
  explicitLabel: string | undefined,
  styleClass: string,
  deps: LinkTransformerDeps
): string {
  if (!isInternalLink(link)) {
    return deps.fallback(link, explicitLabel);
  }
  return renderReference(deps.resolve(link.path), explicitLabel, styleClass);
}

/**
 * Bind the transformer to a style class and host collaborators
 */
export function createLinkHook(deps: LinkTransformerDeps, styleClass: string): LinkHook {
  return (link, label) => renderLink(link, label, styleClass, deps);
}
