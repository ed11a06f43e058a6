/**
 * Body text extraction with a graded quality fallback
 */
import { collapseWhitespace, type DomNode } from './dom.js';
import type { ExtractionKind } from '../article/article.js';

/** Every record's text is at least this long. */
export const MIN_TEXT_LENGTH = 50;

/** Paragraph text shorter than this triggers the coarse full-text retry. */
export const SHORT_TEXT_THRESHOLD = 200;

export interface GradedText {
  text: string;
  extraction: ExtractionKind;
}

/**
 * Paragraph blocks with collapsed whitespace, joined by newlines.
 * Containers without paragraphs yield their whole text instead.
 */
export function extractParagraphText(container: DomNode): string {
  const blocks = container
    .findAll('p')
    .map((p) => collapseWhitespace(p.text()))
    .filter(Boolean);

  if (blocks.length === 0) return extractFullText(container);
  return blocks.join('\n');
}

/** All text of the container as one whitespace-collapsed block. */
export function extractFullText(container: DomNode): string {
  return collapseWhitespace(container.text());
}

/**
 * Diagnostic body used when no genuine text is available.
 * The fixed prefix alone keeps it above MIN_TEXT_LENGTH.
 */
export function buildPlaceholderText(url: string, reason: string): string {
  return `No article text could be extracted from ${url}. Reason: ${reason}.`;
}

export function gradeText(container: DomNode, url: string): GradedText {
  let text = extractParagraphText(container);
  let extraction: ExtractionKind = 'content';

  if (text.length < SHORT_TEXT_THRESHOLD) {
    const coarse = extractFullText(container);
    if (coarse.length > text.length) {
      text = coarse;
      extraction = 'fallback-text';
    }
  }

  if (text.length < MIN_TEXT_LENGTH) {
    return {
      text: buildPlaceholderText(url, `extracted text shorter than ${MIN_TEXT_LENGTH} characters`),
      extraction: 'placeholder',
    };
  }

  return { text, extraction };
}
