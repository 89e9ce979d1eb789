import fs from 'fs';

export type FixtureName =
  | 'login-page.html'
  | 'timesheet-page.html'
  | 'shift-page.html'
  | 'shift-page-single.html';

/**
 * Read an HTML fixture from ./fixtures
 */
export function loadFixture(name: FixtureName): string {
  return fs.readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}
