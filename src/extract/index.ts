/**
 * Public API exports for the extract module
 */
export { parseArticle, extractArticle } from './article-parser.js';
export type { ParseArticleOptions } from './article-parser.js';
export { parseDocument, collapseWhitespace } from './dom.js';
export type { DomNode, DomTree } from './dom.js';
export {
  buildContainerStrategies,
  applyStrategy,
  locateContainer,
  describeStrategy,
  BOILERPLATE_SELECTORS,
} from './container-strategies.js';
export type { ContainerStrategy, LocatedContainer } from './container-strategies.js';
export {
  extractParagraphText,
  extractFullText,
  gradeText,
  buildPlaceholderText,
  MIN_TEXT_LENGTH,
  SHORT_TEXT_THRESHOLD,
} from './text.js';
export { normalizeDate } from './date.js';
export { extractMetadata } from './metadata.js';
export type { ArticleMetadata } from './metadata.js';
