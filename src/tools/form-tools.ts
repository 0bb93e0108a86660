/**
 * Form Tools
 *
 * Fills a form on a page inside a scoped session. Fields are matched by name,
 * id, aria-label or placeholder, in that order.
 */

import { createLogger } from '../shared/services/logging.service.js';
import { PageSession, type PageSessionOptions } from './page-session.js';
import { DEFAULT_SUBMIT_SELECTOR, locateField, setFieldValue, submitForm } from './page-actions.js';
import { FillFormInputSchema, type FillFormInput } from './tool-schemas.js';
import { normalizeUrl } from './url-utils.js';

const logger = createLogger('FormTools');

export interface FillFormResult {
  url: string;
  finalUrl: string;
  sessionId: string;
  filled: string[];
  missing: string[];
  submitted: boolean;
}

export class FormTools {
  private readonly pageSession: PageSession;

  constructor(options: PageSessionOptions | PageSession = {}) {
    this.pageSession = options instanceof PageSession ? options : new PageSession(options);
  }

  async fillForm(input: FillFormInput): Promise<FillFormResult> {
    const { url, fields, submit, submitSelector } = FillFormInputSchema.parse(input);
    const target = normalizeUrl(url);

    return this.pageSession.run(target, async (page, { handle, timeout }) => {
      const filled: string[] = [];
      const missing: string[] = [];

      for (const [key, value] of Object.entries(fields)) {
        const field = await locateField(page, key);
        if (!field) {
          missing.push(key);
          continue;
        }
        try {
          await setFieldValue(page, field, value);
          filled.push(key);
        } finally {
          await field.element.dispose();
        }
      }

      const submitted = submit
        ? await submitForm(page, timeout, submitSelector ?? DEFAULT_SUBMIT_SELECTOR)
        : false;

      logger.info('Form filled', {
        url: target,
        sessionId: handle.sessionId,
        filled: filled.length,
        missing: missing.length,
        submitted,
      });

      return {
        url: target,
        finalUrl: page.url(),
        sessionId: handle.sessionId,
        filled,
        missing,
        submitted,
      };
    });
  }
}

/**
 * One-paragraph summary of a fill result for a model to read.
 */
export function describeFillFormResult(result: FillFormResult): string {
  const lines = [`Filled ${result.filled.length} field(s) on ${result.url}.`];
  if (result.filled.length > 0) {
    lines.push(`Filled: ${result.filled.join(', ')}`);
  }
  if (result.missing.length > 0) {
    lines.push(`Not found: ${result.missing.join(', ')}`);
  }
  lines.push(result.submitted ? `Submitted; now at ${result.finalUrl}` : 'Not submitted');
  return lines.join('\n');
}
