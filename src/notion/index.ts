export { NotionPageSource, type NotionPageSourceOptions } from './client.js';
export { normalizeBlock, resolveImageUrl } from './blocks.js';
export { parsePageProperties } from './properties.js';
export { renderRichText, toRichTextRuns } from './rich-text.js';
export {
  extractNotionId,
  extractPageId,
  extractDatabaseId,
  sameNotionId,
  type NotionIdKind,
} from './ids.js';
