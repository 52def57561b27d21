/**
 * Notes service barrel export
 */

export {
  noteFormat,
  parseNote,
  readNote,
  listNotes,
  buildIdentifierIndex,
} from './reader.js';

export {
  parseLinkTarget,
  convertInline,
  convertOrgBody,
  convertMarkdownBody,
  convertBody,
} from './converter.js';
