/**
 * Page Actions
 *
 * Field lookup, typing and submission helpers shared by the form and
 * authentication tools.
 */

import type { ElementHandle, Page } from 'puppeteer-core';
import { createLogger } from '../shared/services/logging.service.js';
import { extractErrorMessage } from '../shared/errors/index.js';
import type { FieldValue } from './tool-schemas.js';

const logger = createLogger('PageActions');

export const DEFAULT_SUBMIT_SELECTOR = 'button[type="submit"], input[type="submit"]';

export type FieldKind = 'select' | 'checkable' | 'text';

export interface LocatedField {
  selector: string;
  element: ElementHandle<Element>;
}

const TRUTHY_VALUES = new Set(['true', 'on', 'yes', '1', 'checked']);

function escapeAttributeValue(value: string): string {
  return value.replace(/["\\]/g, '\\$&');
}

/**
 * Selectors tried, in order, for a field key.
 */
export function fieldSelectors(key: string): string[] {
  const value = escapeAttributeValue(key);
  return [
    `[name="${value}"]`,
    `[id="${value}"]`,
    `[aria-label="${value}"]`,
    `[placeholder="${value}"]`,
  ];
}

/**
 * First element matching any of the selectors.
 */
export async function findFirst(page: Page, selectors: readonly string[]): Promise<LocatedField | null> {
  for (const selector of selectors) {
    const element = await page.$(selector);
    if (element) {
      return { selector, element };
    }
  }
  return null;
}

export function locateField(page: Page, key: string): Promise<LocatedField | null> {
  return findFirst(page, fieldSelectors(key));
}

export function isTruthy(value: FieldValue): boolean {
  return typeof value === 'boolean' ? value : TRUTHY_VALUES.has(value.trim().toLowerCase());
}

export function fieldKind(element: ElementHandle<Element>): Promise<FieldKind> {
  return element.evaluate((node): FieldKind => {
    if (node instanceof HTMLSelectElement) return 'select';
    if (node instanceof HTMLInputElement && (node.type === 'checkbox' || node.type === 'radio')) {
      return 'checkable';
    }
    return 'text';
  });
}

/**
 * Set a located field to a value according to its kind.
 */
export async function setFieldValue(page: Page, field: LocatedField, value: FieldValue): Promise<void> {
  const kind = await fieldKind(field.element);

  switch (kind) {
    case 'select':
      await page.select(field.selector, String(value));
      return;
    case 'checkable': {
      const checked = await field.element.evaluate(
        (node) => node instanceof HTMLInputElement && node.checked,
      );
      if (checked !== isTruthy(value)) {
        await field.element.click();
      }
      return;
    }
    case 'text':
      await field.element.evaluate((node) => {
        if (node instanceof HTMLInputElement || node instanceof HTMLTextAreaElement) {
          node.value = '';
        }
      });
      await field.element.type(String(value));
      return;
  }
}

/**
 * Type a value into the first field matching the selectors.
 *
 * @returns false when no field matched
 */
export async function typeInto(
  page: Page,
  selectors: readonly string[],
  value: string,
): Promise<boolean> {
  const field = await findFirst(page, selectors);
  if (!field) {
    return false;
  }
  try {
    await setFieldValue(page, field, value);
  } finally {
    await field.element.dispose();
  }
  return true;
}

/**
 * Click the submit control and wait for the navigation it triggers, if any.
 *
 * @returns false when no submit control was found
 */
export async function submitForm(
  page: Page,
  timeout: number,
  selector: string = DEFAULT_SUBMIT_SELECTOR,
): Promise<boolean> {
  const button = await page.$(selector);
  if (!button) {
    return false;
  }

  try {
    await Promise.all([
      page.waitForNavigation({ waitUntil: 'networkidle2', timeout }).catch((error: unknown) => {
        logger.debug('No navigation after submit', { error: extractErrorMessage(error) });
        return null;
      }),
      button.click(),
    ]);
  } finally {
    await button.dispose();
  }
  return true;
}
