import { describe, expect, it } from 'vitest';
import { isPageClosing } from './keyboard';

describe('isPageClosing', () => {
  it('treats an unloading page as a close', () => {
    expect(isPageClosing({ persisted: false })).toBe(true);
  });

  it('ignores a hide into the back/forward cache', () => {
    expect(isPageClosing({ persisted: true })).toBe(false);
  });
});
