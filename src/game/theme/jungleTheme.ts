import type { ThemeConfig } from './types';

export const jungleTheme: ThemeConfig = {
  key: 'jungle',
  name: 'Jungle',
  background: {
    colors: [0x0a3c28, 0x28643c],
    image: '/assets/images/jungle_bg.png',
  },
  music: '/assets/sounds/jungle_bg.mp3',
  sprites: {
    target: '/assets/images/jungle_mole.png',
    hideout: '/assets/images/jungle_hole.png',
  },
};
