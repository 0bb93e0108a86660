/**
 * Tools module exports
 */

export { WebTools, TOOL_LOADER_DEFAULTS } from './web-tools.js';
export type { WebToolsOptions, LoaderFactory } from './web-tools.js';
export { ShoppingTools } from './shopping-tools.js';
export type { ShoppingToolsOptions } from './shopping-tools.js';
export { FormTools, describeFillFormResult } from './form-tools.js';
export type { FillFormResult } from './form-tools.js';
export { AuthTools } from './auth-tools.js';
export type { AuthenticateResult } from './auth-tools.js';
export { SessionTools } from './session-tools.js';
export type { SessionToolsOptions, SessionMaintenanceApi } from './session-tools.js';
export { PageSession } from './page-session.js';
export type { PageSessionOptions, PageContext } from './page-session.js';
export { normalizeUrl, buildSearchUrl, withFilterParam } from './url-utils.js';
export * from './tool-schemas.js';
