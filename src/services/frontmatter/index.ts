/**
 * Front-matter service barrel export
 */

export {
  atom,
  isAtom,
  isSelfQuoting,
  doubleQuote,
  quoteScalar,
  type QuoteOptions,
} from './quote.js';

export { serializeList } from './list.js';

export {
  classifyField,
  normalizeOptionKey,
  lookupOption,
  resolveField,
  type FieldKind,
} from './fields.js';

export {
  synthesizeFrontMatter,
  renderField,
  FRONT_MATTER_SEPARATOR,
  type SynthesizeOptions,
} from './synthesizer.js';
