/**
 * Extraction Strategies
 *
 * How a loaded page becomes a document's content. The set is closed: a name
 * outside ExtractStrategyName is rejected when the loader is configured.
 */

import TurndownService from 'turndown';
import type { ExtractStrategyName } from '../config/loader-config.js';

/**
 * What a strategy may read from a page
 */
export interface ExtractionTarget {
  /** Full serialized HTML of the page */
  content(): Promise<string>;
  /** Rendered text of the first element matching the selector */
  innerText(selector: string): Promise<string>;
}

export interface ExtractionStrategy {
  readonly name: ExtractStrategyName;
  extract(page: ExtractionTarget): Promise<string>;
}

const turndown = new TurndownService({
  headingStyle: 'atx',
  codeBlockStyle: 'fenced',
  bulletListMarker: '-',
});
turndown.remove(['script', 'style', 'noscript']);

/**
 * Convert an HTML document or fragment to Markdown.
 */
export function htmlToMarkdown(html: string): string {
  return turndown.turndown(html);
}

export const EXTRACTION_STRATEGIES: Readonly<Record<ExtractStrategyName, ExtractionStrategy>> =
  Object.freeze({
    text: {
      name: 'text',
      extract: (page) => page.innerText('body'),
    },
    html: {
      name: 'html',
      extract: (page) => page.content(),
    },
    markdown: {
      name: 'markdown',
      extract: async (page) => htmlToMarkdown(await page.content()),
    },
  });

export function getExtractionStrategy(name: ExtractStrategyName): ExtractionStrategy {
  return EXTRACTION_STRATEGIES[name];
}
