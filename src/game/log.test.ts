import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './log';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('prefixes messages with the scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    createLogger('assets').warn('missing file', { key: 'jungle-bg' });
    expect(warn).toHaveBeenCalledWith('[mole-attack:assets]', 'missing file', { key: 'jungle-bg' });
  });

  it('keeps debug output quiet unless verbose', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    createLogger('scene', false).debug('frame');
    expect(debug).not.toHaveBeenCalled();
    createLogger('scene', true).debug('frame');
    expect(debug).toHaveBeenCalledWith('[mole-attack:scene]', 'frame');
  });
});
