import type { EntityVisual, ThemeConfig, ThemeSkin } from './types';

export const TARGET_COLOR = 0x965a32;
export const HIDEOUT_COLOR = 0x5a371e;

export const textureKeys = (theme: Pick<ThemeConfig, 'key'>) => ({
  background: `${theme.key}-bg`,
  target: `${theme.key}-target`,
  hideout: `${theme.key}-hideout`,
});

const entityVisual = (path: string | undefined, textureKey: string, color: number, hasTexture: (key: string) => boolean): EntityVisual => (
  path && hasTexture(textureKey) ? { kind: 'sprite', textureKey } : { kind: 'shape', color }
);

/**
 * Picks sprite or procedural drawing for every visual of a theme. Runs once after loading;
 * a file that failed to load simply has no texture and falls back to its shape.
 */
export const resolveSkin = (theme: ThemeConfig, hasTexture: (key: string) => boolean): ThemeSkin => {
  const keys = textureKeys(theme);
  const [top, bottom] = theme.background.colors;
  return {
    key: theme.key,
    name: theme.name,
    background: theme.background.image && hasTexture(keys.background)
      ? { kind: 'image', textureKey: keys.background }
      : { kind: 'gradient', top, bottom },
    target: entityVisual(theme.sprites.target, keys.target, TARGET_COLOR, hasTexture),
    hideout: entityVisual(theme.sprites.hideout, keys.hideout, HIDEOUT_COLOR, hasTexture),
    music: theme.music,
  };
};
