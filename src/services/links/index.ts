/**
 * Links service barrel export
 */

export {
  INTERNAL_LINK_TYPE,
  isInternalLink,
  referenceLabel,
  referenceHref,
  renderReference,
  renderLink,
  createLinkHook,
  type ReferenceResolver,
  type GenericLinkRenderer,
  type LinkTransformerDeps,
  type LinkHook,
} from './transformer.js';

export { parseInternalPath, createReferenceResolver } from './resolver.js';

export { linkTarget, renderMarkdownLink } from './markdown.js';
