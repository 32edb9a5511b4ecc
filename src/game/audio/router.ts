import type { GameEvent } from '../core/types';

export type SoundCue = 'hit' | 'click' | 'game-over';

export type AudioPort = {
  playCue: (cue: SoundCue) => void;
  stopMusic: () => void;
};

/** Turns core events into sound. Misses and countdown steps make none. */
export const routeAudioEvents = (events: readonly GameEvent[], port: AudioPort) => {
  for (const event of events) {
    switch (event.type) {
      case 'hit':
        port.playCue('hit');
        break;
      case 'exit':
        port.playCue('click');
        break;
      case 'game-over':
        port.stopMusic();
        port.playCue('game-over');
        break;
      case 'countdown-tick':
      case 'spawn':
      case 'miss':
        break;
    }
  }
};
