import type { ThemeConfig } from './types';

export const beachTheme: ThemeConfig = {
  key: 'beach',
  name: 'Beach',
  background: {
    colors: [0x1e8cc8, 0xf0dca0],
    image: '/assets/images/beach_bg.png',
  },
  music: '/assets/sounds/beach_bg.mp3',
  sprites: {
    target: '/assets/images/beach_mole.png',
    hideout: '/assets/images/beach_hole.png',
  },
};
