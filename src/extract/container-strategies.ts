/**
 * Ordered strategies for locating an article's main content container.
 * Each strategy is tried in turn until one yields an element with visible text.
 */
import type { DomNode, DomTree } from './dom.js';
import type { SiteProfile } from '../sites/site-profile.js';
import { logger } from '../logger.js';

export type ContainerStrategy =
  | { kind: 'by-class'; selector: string }
  | { kind: 'by-tag'; tag: string }
  | { kind: 'by-body-fallback'; strip: readonly string[] };

/** Never article text, wherever they appear */
const NON_CONTENT_SELECTORS = ['script', 'style', 'noscript', 'template'];

/** Page chrome removed when the whole body has to serve as the container */
export const BOILERPLATE_SELECTORS = [
  ...NON_CONTENT_SELECTORS,
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  'iframe',
  'embed',
  'object',
] as const;

export interface LocatedContainer {
  container: DomNode;
  strategy: ContainerStrategy;
}

export function buildContainerStrategies(profile: SiteProfile): ContainerStrategy[] {
  return [
    ...profile.contentSelectors.map(
      (selector): ContainerStrategy => ({ kind: 'by-class', selector })
    ),
    { kind: 'by-tag', tag: 'article' },
    { kind: 'by-body-fallback', strip: BOILERPLATE_SELECTORS },
  ];
}

export function describeStrategy(strategy: ContainerStrategy): string {
  switch (strategy.kind) {
    case 'by-class':
      return `by-class:${strategy.selector}`;
    case 'by-tag':
      return `by-tag:${strategy.tag}`;
    case 'by-body-fallback':
      return 'by-body-fallback';
  }
}

function stripAll(node: DomNode, selectors: readonly string[]): DomNode {
  for (const selector of selectors) node.decompose(selector);
  return node;
}

function select(
  tree: DomTree,
  strategy: ContainerStrategy
): { found: DomNode | null; strip: readonly string[] } {
  switch (strategy.kind) {
    case 'by-class':
      return { found: tree.findFirst(strategy.selector), strip: NON_CONTENT_SELECTORS };
    case 'by-tag':
      return { found: tree.findFirst(strategy.tag), strip: NON_CONTENT_SELECTORS };
    case 'by-body-fallback':
      return { found: tree.body(), strip: strategy.strip };
  }
}

/**
 * Apply one strategy. Returns a cleaned, detached copy of the container, or
 * null when the strategy finds nothing or only blank text.
 */
export function applyStrategy(tree: DomTree, strategy: ContainerStrategy): DomNode | null {
  const { found, strip } = select(tree, strategy);
  if (!found) return null;
  const container = stripAll(found.clone(), strip);
  return container.text().trim() ? container : null;
}

/**
 * Try strategies in order and return the first non-empty container.
 * A strategy that throws (e.g. an invalid selector in a site profile) is skipped.
 */
export function locateContainer(
  tree: DomTree,
  strategies: readonly ContainerStrategy[]
): LocatedContainer | null {
  for (const strategy of strategies) {
    try {
      const container = applyStrategy(tree, strategy);
      if (container) return { container, strategy };
    } catch (e) {
      logger.debug(
        { strategy: describeStrategy(strategy), error: String(e) },
        'Container strategy failed'
      );
    }
  }
  return null;
}
