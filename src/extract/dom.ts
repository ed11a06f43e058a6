/**
 * Minimal DOM query capability over linkedom.
 * Extraction code depends on these interfaces only, never on the parser.
 */
import { parseHTML } from 'linkedom';

export interface DomNode {
  /** First descendant matching a CSS selector. Throws on an invalid selector. */
  findFirst(selector: string): DomNode | null;
  findAll(selector: string): DomNode[];
  /** Remove every descendant matching the selector; returns how many were removed. */
  decompose(selector: string): number;
  /** Raw text content, whitespace untouched */
  text(): string;
  attr(name: string): string | null;
  /** Detached deep copy, safe to decompose without touching the source tree. */
  clone(): DomNode;
}

export interface DomTree extends DomNode {
  body(): DomNode | null;
}

class ElementNode implements DomNode {
  constructor(protected readonly element: Element) {}

  findFirst(selector: string): DomNode | null {
    const el = this.element.querySelector(selector);
    return el ? new ElementNode(el) : null;
  }

  findAll(selector: string): DomNode[] {
    return Array.from(this.element.querySelectorAll(selector), (el) => new ElementNode(el));
  }

  decompose(selector: string): number {
    const matches = Array.from(this.element.querySelectorAll(selector));
    for (const el of matches) el.remove();
    return matches.length;
  }

  text(): string {
    return this.element.textContent ?? '';
  }

  attr(name: string): string | null {
    return this.element.getAttribute(name);
  }

  clone(): DomNode {
    return new ElementNode(this.element.cloneNode(true) as Element);
  }
}

class DocumentTree extends ElementNode implements DomTree {
  constructor(private readonly document: Document) {
    super(document.documentElement);
  }

  /**
   * The body element, or for documents that omit the `<body>` tag (linkedom
   * infers none) a detached copy of the root without its head.
   */
  body(): DomNode | null {
    const body = this.document.querySelector('body');
    if (body) return new ElementNode(body);
    if (!this.document.documentElement) return null;
    const root = this.clone();
    root.decompose('head');
    return root;
  }
}

/**
 * Parse HTML into a queryable tree. Fragments and body-only markup are wrapped
 * in an html element first, since linkedom only builds a root for full documents.
 */
export function parseDocument(html: string): DomTree {
  let markup = html;
  if (!/<html[\s>]/i.test(markup)) {
    const body = /<body[\s>]/i.test(markup) ? markup : `<body>${markup}</body>`;
    markup = `<!DOCTYPE html><html>${body}</html>`;
  }
  const { document } = parseHTML(markup);
  return new DocumentTree(document);
}

/** Collapse runs of whitespace to single spaces and trim. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
