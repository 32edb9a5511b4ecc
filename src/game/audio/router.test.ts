import { describe, expect, it } from 'vitest';
import type { GameEvent } from '../core/types';
import { routeAudioEvents, type AudioPort } from './router';

const recordingPort = () => {
  const calls: string[] = [];
  const port: AudioPort = {
    playCue: (cue) => calls.push(`cue:${cue}`),
    stopMusic: () => calls.push('stop-music'),
  };
  return { calls, port };
};

describe('routeAudioEvents', () => {
  it('plays the hit cue and keeps misses silent', () => {
    const { calls, port } = recordingPort();
    routeAudioEvents([{ type: 'spawn', index: 2 }, { type: 'hit', index: 2, score: 1 }, { type: 'miss', livesRemaining: 2 }], port);
    expect(calls).toEqual(['cue:hit']);
  });

  it('stops the theme track before the game over cue', () => {
    const { calls, port } = recordingPort();
    routeAudioEvents([{ type: 'game-over', finalScore: 4, reason: 'time' }], port);
    expect(calls).toEqual(['stop-music', 'cue:game-over']);
  });

  it('clicks for the exit control only', () => {
    const { calls, port } = recordingPort();
    const events: GameEvent[] = [{ type: 'countdown-tick', numeral: 3 }, { type: 'countdown-tick', numeral: 2 }, { type: 'exit' }];
    routeAudioEvents(events, port);
    expect(calls).toEqual(['cue:click']);
  });
});
