/**
 * Shopping Tools
 *
 * Product search, result filtering and price comparison on top of WebTools.
 */

import { DEFAULT_SEARCH_URL_TEMPLATE } from './tool-schemas.js';
import { buildSearchUrl, normalizeUrl, withFilterParam } from './url-utils.js';
import { WebTools, type WebToolsOptions } from './web-tools.js';

export interface ShoppingToolsOptions extends WebToolsOptions {
  /** Search page with a {query} placeholder */
  searchUrlTemplate?: string;
}

export class ShoppingTools extends WebTools {
  private readonly searchUrlTemplate: string;

  constructor(options: ShoppingToolsOptions = {}) {
    super(options);
    this.searchUrlTemplate = options.searchUrlTemplate ?? DEFAULT_SEARCH_URL_TEMPLATE;
  }

  async searchProduct(query: string, searchUrlTemplate?: string): Promise<string> {
    const url = buildSearchUrl(searchUrlTemplate ?? this.searchUrlTemplate, query);
    try {
      const document = await this.loadOne(normalizeUrl(url), 'text');
      return document?.pageContent ?? 'Failed to load search results';
    } catch (error) {
      return this.failure('Error loading search results', url, error);
    }
  }

  async filterResults(url: string, criteria: string): Promise<string> {
    try {
      const target = withFilterParam(normalizeUrl(url), criteria);
      const document = await this.loadOne(target, 'text');
      return document?.pageContent ?? 'Failed to load filtered results';
    } catch (error) {
      return this.failure('Error loading filtered results', url, error);
    }
  }

  /**
   * Load two product pages one after the other and put them side by side.
   */
  async comparePrices(url1: string, url2: string): Promise<string> {
    try {
      const first = await this.loadOne(normalizeUrl(url1), 'text');
      const second = await this.loadOne(normalizeUrl(url2), 'text');
      if (!first || !second) {
        return 'Failed to load one or both pages';
      }
      return `Price comparison:\n\nSite 1:\n${first.pageContent}\n\nSite 2:\n${second.pageContent}`;
    } catch (error) {
      return this.failure('Error comparing prices', `${url1}, ${url2}`, error);
    }
  }
}
