/**
 * Vitest setup — shared cleanup for jsdom-backed tests.
 */
import { afterEach } from 'vitest';

afterEach(() => {
  document.body.innerHTML = '';
});
