/**
 * List serializer: renders a sequence as a YAML flow list
 */

import { InvalidListElementError } from '../../utils/errors.js';
import { isAtom, quoteScalar } from './quote.js';

/**
 * Render one list element.
 * Numbers go through their text form first, so they come out quoted.
 */
function renderElement(field: string, item: unknown): string {
  if (typeof item === 'number' && Number.isFinite(item)) {
    return quoteScalar(String(item));
  }
  if (isAtom(item)) {
    return quoteScalar(item);
  }
  if (typeof item === 'string' && item.length > 0) {
    return quoteScalar(item);
  }
  throw new InvalidListElementError(field, item);
}

/**
 * Serialize items as `[a, b, c]`.
 *
 * @param field - Owning field name, reported when an element is invalid
 * @throws InvalidListElementError on anything but a number, atom or non-empty string
 */
export function serializeList(field: string, items: readonly unknown[]): string {
  return `[${items.map((item) => renderElement(field, item)).join(', ')}]`;
}
