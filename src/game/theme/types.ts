import type { ThemeKey } from '../core/types';

export type { ThemeKey };

export type ThemeConfig = {
  key: ThemeKey;
  name: string;
  background: {
    /** Top and bottom of the fallback vertical gradient. */
    colors: readonly [number, number];
    image?: string;
  };
  music?: string;
  sprites: {
    target?: string;
    hideout?: string;
  };
};

export type BackgroundVisual =
  | { kind: 'image'; textureKey: string }
  | { kind: 'gradient'; top: number; bottom: number };

/** Sprite when the theme's image loaded, a filled circle otherwise. */
export type EntityVisual =
  | { kind: 'sprite'; textureKey: string }
  | { kind: 'shape'; color: number };

export type ThemeSkin = {
  key: ThemeKey;
  name: string;
  background: BackgroundVisual;
  target: EntityVisual;
  hideout: EntityVisual;
  music?: string;
};
