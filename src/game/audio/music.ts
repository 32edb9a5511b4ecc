import { createLogger } from '../log';

const log = createLogger('music');

/** The slice of HTMLAudioElement the track drives. */
export type MediaElementLike = {
  src: string;
  loop: boolean;
  volume: number;
  currentTime: number;
  play: () => Promise<void>;
  pause: () => void;
  addEventListener: (type: 'error', listener: () => void) => void;
};

/**
 * One looping background track. Every call returns immediately; a track that cannot load or
 * play is logged and stays silent.
 */
export class MusicTrack {
  private element: MediaElementLike | null = null;
  private path: string | null = null;
  private volume = 0.5;

  constructor(private readonly createElement: () => MediaElementLike = () => new Audio()) {}

  get currentPath() {
    return this.path;
  }

  load(path: string) {
    this.stop();
    this.path = path;
    try {
      const element = this.createElement();
      element.addEventListener('error', () => log.warn(`could not load ${path}`));
      element.src = path;
      element.volume = this.volume;
      this.element = element;
    } catch (err) {
      log.warn(`could not create audio for ${path}`, err);
      this.element = null;
    }
  }

  play(loop = true) {
    const element = this.element;
    if (!element) return;
    element.loop = loop;
    element.play().catch((err: unknown) => log.warn(`could not play ${this.path ?? ''}`, err));
  }

  stop() {
    if (!this.element) return;
    this.element.pause();
    this.element.currentTime = 0;
  }

  setVolume(v: number) {
    this.volume = Math.max(0, Math.min(1, v));
    if (this.element) this.element.volume = this.volume;
  }
}
