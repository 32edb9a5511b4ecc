import type { ThemeConfig } from './types';

export const defaultTheme: ThemeConfig = {
  key: 'default',
  name: 'Default',
  background: { colors: [0x0a4632, 0xe68c46] },
  music: '/assets/sounds/bg_music.mp3',
  sprites: {},
};
