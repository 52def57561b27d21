/**
 * Internal reference resolution against the note corpus
 */

import type { ResolvedReference } from '../../types/index.js';
import { UnresolvedReferenceError } from '../../utils/errors.js';
import type { ReferenceResolver } from './transformer.js';

const QUERY_SEPARATOR = '::';

/**
 * Split `20240104T093000::#intro` into identifier and query.
 * An empty query counts as none.
 */
export function parseInternalPath(path: string): ResolvedReference {
  const index = path.indexOf(QUERY_SEPARATOR);
  if (index === -1) {
    return { identifier: path.trim() };
  }

  const identifier = path.slice(0, index).trim();
  const query = path.slice(index + QUERY_SEPARATOR.length).trim();
  return query ? { identifier, query } : { identifier };
}

/**
 * Resolver that only accepts identifiers present in the corpus
 *
 * @param identifiers - Known note identifiers
 */
export function createReferenceResolver(identifiers: Iterable<string>): ReferenceResolver {
  const known = new Set(identifiers);

  return (path) => {
    const ref = parseInternalPath(path);
    if (!known.has(ref.identifier)) {
      throw new UnresolvedReferenceError(ref.identifier);
    }
    return ref;
  };
}
