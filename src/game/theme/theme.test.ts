import { describe, expect, it } from 'vitest';
import { beachTheme, defaultTheme, desertTheme, jungleTheme, resolveSkin, resolveTheme, themeKeys, themes } from '.';
import { HIDEOUT_COLOR, TARGET_COLOR } from './skin';

describe('resolveTheme', () => {
  it('finds each theme by display name or key', () => {
    expect(resolveTheme('Jungle')).toBe(jungleTheme);
    expect(resolveTheme('BEACH')).toBe(beachTheme);
    expect(resolveTheme('desert')).toBe(desertTheme);
    expect(resolveTheme('Default')).toBe(defaultTheme);
  });

  it('falls back to Default for unknown names', () => {
    expect(resolveTheme('Arctic')).toBe(defaultTheme);
    expect(resolveTheme('')).toBe(defaultTheme);
    expect(resolveTheme(undefined)).toBe(defaultTheme);
  });

  it('registers every theme under its own key', () => {
    for (const key of themeKeys) expect(themes[key].key).toBe(key);
    expect(Object.isFrozen(themes)).toBe(true);
  });
});

describe('resolveSkin', () => {
  it('draws the Default theme procedurally even when textures exist', () => {
    expect(resolveSkin(defaultTheme, () => true)).toEqual({
      key: 'default',
      name: 'Default',
      background: { kind: 'gradient', top: 0x0a4632, bottom: 0xe68c46 },
      target: { kind: 'shape', color: TARGET_COLOR },
      hideout: { kind: 'shape', color: HIDEOUT_COLOR },
      music: '/assets/sounds/bg_music.mp3',
    });
  });

  it('uses sprites for every loaded texture', () => {
    const skin = resolveSkin(beachTheme, () => true);
    expect(skin.background).toEqual({ kind: 'image', textureKey: 'beach-bg' });
    expect(skin.target).toEqual({ kind: 'sprite', textureKey: 'beach-target' });
    expect(skin.hideout).toEqual({ kind: 'sprite', textureKey: 'beach-hideout' });
  });

  it('falls back per visual when a file did not load', () => {
    const skin = resolveSkin(jungleTheme, (key) => key === 'jungle-target');
    expect(skin.background).toEqual({ kind: 'gradient', top: 0x0a3c28, bottom: 0x28643c });
    expect(skin.target).toEqual({ kind: 'sprite', textureKey: 'jungle-target' });
    expect(skin.hideout).toEqual({ kind: 'shape', color: HIDEOUT_COLOR });
  });
});
