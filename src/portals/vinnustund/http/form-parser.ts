/**
 * Vinnustund page parsing
 *
 * Form extraction for the login and shift-query POSTs, and the classifier
 * that decides whether a fetched page means the session has expired.
 */

import * as cheerio from 'cheerio';
import type { FetchedPage } from '../../../shared/utils/http-client.js';
import { Helpers } from '../../../shared/utils/helpers.js';
import {
  DEFAULT_PAGE_MARKERS,
  type ExpiryReason,
  type LoginFormFields,
  type PageMarkers
} from '../types/index.js';

/**
 * Extract all hidden input fields, optionally only those of the form named `formName`.
 * Returns an empty mapping when there is no such form.
 */
export function extractHiddenFields(html: string, formName?: string): LoginFormFields {
  const $ = cheerio.load(html);
  const fields: LoginFormFields = {};

  const inputs = formName === undefined
    ? $('input[type="hidden"]')
    : $(`form[name="${formName}"], form#${formName}`).first().find('input[type="hidden"]');

  inputs.each((_, element) => {
    const name = $(element).attr('name');
    if (name) {
      fields[name] = $(element).attr('value') ?? '';
    }
  });

  return fields;
}

/**
 * Absolute action URL of the login form: the first form holding a password
 * input, else the first form. A form without an action posts to the page itself.
 */
export function extractFormAction(html: string, pageUrl: string): string | null {
  const $ = cheerio.load(html);

  let form = $('form').filter((_, element) => $(element).find('input[type="password"]').length > 0).first();
  if (form.length === 0) {
    form = $('form').first();
  }
  if (form.length === 0) {
    return null;
  }

  const action = form.attr('action')?.trim();
  if (!action) {
    return pageUrl;
  }
  return new URL(action, pageUrl).href;
}

export function isLoginLocation(location: string): boolean {
  return location.toLowerCase().includes('login');
}

/**
 * Classify a fetched page. Returns why the session looks expired, or null
 * when the page is usable content.
 */
export function detectExpiry(page: Pick<FetchedPage, 'status' | 'url' | 'location' | 'html'>, markers: PageMarkers = DEFAULT_PAGE_MARKERS): ExpiryReason | null {
  if (Helpers.isRedirectStatus(page.status) && page.location !== undefined && isLoginLocation(page.location)) {
    return 'login-redirect';
  }

  if (page.html.includes(markers.loginForm) && !page.html.includes(markers.authenticatedContent)) {
    return 'login-form';
  }

  if (page.html.length < markers.minContentLength) {
    return 'too-short';
  }

  return null;
}
