/**
 * Document
 *
 * Unit of output of the loader: extracted page content plus where it came from.
 */

import type { ExtractStrategyName } from '../config/loader-config.js';

export interface DocumentMetadata {
  /** URL the content was loaded from */
  source: string;
  sessionId: string;
  viewerUrl?: string;
  extractStrategy: ExtractStrategyName;
}

export interface Document {
  pageContent: string;
  metadata: DocumentMetadata;
}
