/**
 * Loader module exports
 */

export { WebLoader } from './web-loader.js';
export type { WebLoaderOptions, WebLoaderDeps, DocumentLoader } from './web-loader.js';
export type { Document, DocumentMetadata } from './document.js';
