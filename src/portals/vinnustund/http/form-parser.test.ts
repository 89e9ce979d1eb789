import { test } from 'node:test';
import * as assert from 'node:assert';
import { detectExpiry, extractFormAction, extractHiddenFields, isLoginLocation } from './form-parser.js';
import { loadFixture } from '../testing/fixtures.js';

const LOGIN_URL = 'https://portal.example.com/VS_MX/VSLogin.jsp';
const CONTENT = `<form name="detail_form"></form>${'x'.repeat(600)}`;

// ============================================================================
// Form extraction
// ============================================================================

test('extracts every hidden field of the login page', () => {
  assert.deepStrictEqual(extractHiddenFields(loadFixture('login-page.html')), {
    __token: 'abc123',
    lang: 'is'
  });
});

test('scopes hidden fields to a named form', () => {
  assert.deepStrictEqual(extractHiddenFields(loadFixture('timesheet-page.html'), 'detail_form'), {
    sj: 'true',
    starfsmNr: '1042',
    timabilFra: '',
    timabilTil: '',
    formToken: 'ft-77'
  });
});

test('returns an empty mapping when there is no form', () => {
  assert.deepStrictEqual(extractHiddenFields('<html><body>Villa</body></html>'), {});
  assert.deepStrictEqual(extractHiddenFields(loadFixture('login-page.html'), 'detail_form'), {});
});

test('resolves the login form action against the page URL', () => {
  assert.strictEqual(
    extractFormAction(loadFixture('login-page.html'), LOGIN_URL),
    'https://portal.example.com/VS_MX/VSLoginServlet'
  );
});

test('prefers the form holding a password input', () => {
  const html = '<form action="/search"></form><form action="/auth"><input type="password" name="pw"></form>';
  assert.strictEqual(extractFormAction(html, LOGIN_URL), 'https://portal.example.com/auth');
});

test('a form without action posts back to the page; no form gives null', () => {
  assert.strictEqual(extractFormAction('<form><input name="a"></form>', LOGIN_URL), LOGIN_URL);
  assert.strictEqual(extractFormAction('<p>no form</p>', LOGIN_URL), null);
});

// ============================================================================
// Expiry classification
// ============================================================================

test('isLoginLocation matches login paths case-insensitively', () => {
  assert.strictEqual(isLoginLocation(LOGIN_URL), true);
  assert.strictEqual(isLoginLocation('https://portal.example.com/LOGIN'), true);
  assert.strictEqual(isLoginLocation('https://portal.example.com/VS_MX/starfsmadur/forsida.jsp'), false);
});

test('a redirect to the login page is expired', () => {
  assert.strictEqual(
    detectExpiry({ status: 302, url: 'https://portal.example.com/x', location: LOGIN_URL, html: '' }),
    'login-redirect'
  );
});

test('a redirect elsewhere is judged by its body', () => {
  assert.strictEqual(
    detectExpiry({ status: 302, url: 'https://portal.example.com/x', location: 'https://portal.example.com/y', html: CONTENT }),
    null
  );
});

test('a login page served in place of content is expired', () => {
  assert.strictEqual(
    detectExpiry({ status: 200, url: LOGIN_URL, html: loadFixture('login-page.html') }),
    'login-form'
  );
});

test('a password field next to the content marker is not a login page', () => {
  const html = `${CONTENT}<input type="password" name="password">`;
  assert.strictEqual(detectExpiry({ status: 200, url: LOGIN_URL, html }), null);
});

test('a body under the minimum size is expired', () => {
  assert.strictEqual(detectExpiry({ status: 200, url: LOGIN_URL, html: '<html></html>' }), 'too-short');
  assert.strictEqual(detectExpiry({ status: 200, url: LOGIN_URL, html: 'x'.repeat(511) }), 'too-short');
  assert.strictEqual(detectExpiry({ status: 200, url: LOGIN_URL, html: 'x'.repeat(512) }), null);
});

test('real content pages are not expired', () => {
  assert.strictEqual(
    detectExpiry({ status: 200, url: LOGIN_URL, html: loadFixture('timesheet-page.html') }),
    null
  );
});
