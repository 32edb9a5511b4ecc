import type { ThemeConfig } from './types';

export const desertTheme: ThemeConfig = {
  key: 'desert',
  name: 'Desert',
  background: {
    colors: [0xb48c50, 0xf0c882],
    image: '/assets/images/desert_bg.png',
  },
  music: '/assets/sounds/desert_bg.mp3',
  sprites: {
    target: '/assets/images/desert_mole.png',
    hideout: '/assets/images/desert_hole.png',
  },
};
