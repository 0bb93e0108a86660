export {
  EXTRACTION_STRATEGIES,
  getExtractionStrategy,
  htmlToMarkdown,
} from './strategies.js';
export type { ExtractionStrategy, ExtractionTarget } from './strategies.js';
