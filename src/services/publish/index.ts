/**
 * Publish service barrel export
 */

export {
  resolveOutputDir,
  createCorpusLinkHook,
  renderNote,
  writeAtomic,
  previewNote,
  publishNote,
  publishAll,
  unpublishNote,
  type PublishOptions,
  type RenderedNote,
  type PublishResult,
  type PublishFailure,
  type PublishSummary,
} from './publisher.js';

export { startWatcher, stopWatcher, isWatching } from './watcher.js';
