/**
 * Agent tool sets
 *
 * AI SDK tool definitions over the web and shopping tools.
 */

import { tool, type ToolSet } from 'ai';
import type { WebTools } from '../tools/web-tools.js';
import type { ShoppingTools } from '../tools/shopping-tools.js';
import {
  BrowsePageInputSchema,
  ComparePricesInputSchema,
  FilterResultsInputSchema,
  GetPageHtmlInputSchema,
  SearchProductInputSchema,
} from '../tools/tool-schemas.js';

export function createWebToolSet(webTools: WebTools): ToolSet {
  return {
    browsePage: tool({
      description:
        'Browse a webpage and extract its text content. Use this to understand the main content of a page.',
      inputSchema: BrowsePageInputSchema,
      execute: ({ url }) => webTools.browsePage(url),
    }),
    getPageHtml: tool({
      description:
        "Get the HTML structure of a webpage. Use this to analyze page layout or find specific elements, only when browsePage doesn't give you what you need.",
      inputSchema: GetPageHtmlInputSchema,
      execute: ({ url }) => webTools.getPageHtml(url),
    }),
  };
}

export function createShoppingToolSet(shoppingTools: ShoppingTools): ToolSet {
  return {
    searchProduct: tool({
      description: "Search for a product on a shopping website. Input is a search query (e.g. 'laptop').",
      inputSchema: SearchProductInputSchema,
      execute: ({ query, searchUrlTemplate }) =>
        shoppingTools.searchProduct(query, searchUrlTemplate),
    }),
    filterResults: tool({
      description:
        "Filter search results on a shopping website. Input is a results URL and filter criteria (e.g. 'price:low-to-high').",
      inputSchema: FilterResultsInputSchema,
      execute: ({ url, criteria }) => shoppingTools.filterResults(url, criteria),
    }),
    comparePrices: tool({
      description: 'Compare prices of products on two different shopping websites.',
      inputSchema: ComparePricesInputSchema,
      execute: ({ url1, url2 }) => shoppingTools.comparePrices(url1, url2),
    }),
  };
}
