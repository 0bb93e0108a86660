/**
 * Tool Schemas
 *
 * Zod schemas for tool inputs. Shared by the agent tool sets and the MCP
 * server, so both surfaces validate the same way.
 */

import { z } from 'zod';

/** Default search page used by searchProduct */
export const DEFAULT_SEARCH_URL_TEMPLATE = 'https://www.example.com/search?q={query}';

const UrlInput = z
  .string()
  .min(1)
  .describe('URL of the page (e.g. example.com or www.example.com)');

// ============================================================================
// Web tools
// ============================================================================

export const BrowsePageInputSchema = z.object({
  url: UrlInput,
});

export const GetPageHtmlInputSchema = z.object({
  url: UrlInput,
});

// ============================================================================
// Shopping tools
// ============================================================================

export const SearchProductInputSchema = z.object({
  query: z.string().min(1).describe('Search query (e.g. "laptop")'),
  searchUrlTemplate: z
    .string()
    .includes('{query}')
    .optional()
    .describe('Search page URL containing a {query} placeholder'),
});

export const FilterResultsInputSchema = z.object({
  url: UrlInput,
  criteria: z.string().min(1).describe('Filter criteria (e.g. "price:low-to-high")'),
});

export const ComparePricesInputSchema = z.object({
  url1: UrlInput,
  url2: UrlInput,
});

// ============================================================================
// Form and authentication tools
// ============================================================================

export const FieldValueSchema = z.union([z.string(), z.boolean()]);

export const FillFormInputSchema = z.object({
  url: UrlInput,
  fields: z
    .record(FieldValueSchema)
    .describe('Field values keyed by name, id, aria-label or placeholder'),
  submit: z.boolean().default(false).describe('Click the submit button after filling'),
  submitSelector: z.string().optional().describe('CSS selector of the submit control'),
});

export const CredentialsSchema = z.object({
  username: z.string().optional(),
  password: z.string().optional(),
  token: z.string().optional(),
});

export const AuthenticateInputSchema = z.object({
  url: UrlInput,
  type: z.enum(['form', 'token']).describe('form: login form; token: bearer token header'),
  credentials: CredentialsSchema,
  mfaCode: z.string().optional().describe('One-time code, for forms that ask for one'),
});

// ============================================================================
// Session tools
// ============================================================================

export const SessionInfoInputSchema = z.object({});

export const ReleaseAllSessionsInputSchema = z.object({});

// ============================================================================
// Type exports
// ============================================================================

export type BrowsePageInput = z.infer<typeof BrowsePageInputSchema>;
export type GetPageHtmlInput = z.infer<typeof GetPageHtmlInputSchema>;
export type SearchProductInput = z.infer<typeof SearchProductInputSchema>;
export type FilterResultsInput = z.infer<typeof FilterResultsInputSchema>;
export type ComparePricesInput = z.infer<typeof ComparePricesInputSchema>;
export type FieldValue = z.infer<typeof FieldValueSchema>;
export type FillFormInput = z.input<typeof FillFormInputSchema>;
export type Credentials = z.infer<typeof CredentialsSchema>;
export type AuthenticateInput = z.infer<typeof AuthenticateInputSchema>;
