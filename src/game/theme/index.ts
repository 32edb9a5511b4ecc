import type { ThemeKey } from '../core/types';
import { beachTheme } from './beachTheme';
import { defaultTheme } from './defaultTheme';
import { desertTheme } from './desertTheme';
import { jungleTheme } from './jungleTheme';
import type { ThemeConfig } from './types';

export * from './skin';
export type * from './types';
export { beachTheme, defaultTheme, desertTheme, jungleTheme };

export const themes: Readonly<Record<ThemeKey, ThemeConfig>> = Object.freeze({
  default: defaultTheme,
  jungle: jungleTheme,
  beach: beachTheme,
  desert: desertTheme,
});

export const themeKeys: readonly ThemeKey[] = ['default', 'jungle', 'beach', 'desert'];

/** Matches a key or a display name, case-insensitively; anything else is the Default theme. */
export const resolveTheme = (name: string | null | undefined): ThemeConfig => {
  const wanted = (name ?? '').trim().toLowerCase();
  const key = themeKeys.find((k) => k === wanted || themes[k].name.toLowerCase() === wanted);
  return key ? themes[key] : defaultTheme;
};
