import type { DifficultyKey, DifficultyProfile, DifficultySet, SessionConfig } from './types';

export const WINDOW = { width: 800, height: 600 } as const;
export const GRID = { rows: 3, cols: 3 } as const;
export const FPS = 60;

export const STARTING_LIVES = 3;
export const COUNTDOWN_FROM = 3;
export const COUNTDOWN_STEP_MS = 1000;

export const DEFAULT_PLAYER_NAME = 'Player1';

export const EXIT_CONTROL = {
  label: 'Exit',
  padding: { x: 10, y: 6 },
  // Top-right corner of the button.
  anchor: { x: WINDOW.width - 10, y: 70 },
  // Measured size of the label at the HUD font (28px Arial); the scene re-measures when it can.
  estimatedLabelSize: { width: 44, height: 32 },
} as const;

export const difficulties: DifficultySet = {
  easy: {
    key: 'easy',
    label: 'Easy',
    targetVisibleMs: 1200,
    spawnIntervalMs: 900,
    sessionLengthSeconds: 30,
  },
  medium: {
    key: 'medium',
    label: 'Medium',
    targetVisibleMs: 900,
    spawnIntervalMs: 700,
    sessionLengthSeconds: 25,
  },
  hard: {
    key: 'hard',
    label: 'Hard',
    targetVisibleMs: 650,
    spawnIntervalMs: 550,
    sessionLengthSeconds: 20,
  },
};

Object.values(difficulties).forEach((d) => Object.freeze(d));
Object.freeze(difficulties);

export const difficultyKeys: readonly DifficultyKey[] = ['easy', 'medium', 'hard'];

/** Matches a key or a label, case-insensitively. Anything else is Easy. */
export const resolveDifficulty = (name: string | null | undefined): DifficultyProfile => {
  const wanted = (name ?? '').trim().toLowerCase();
  const key = difficultyKeys.find((k) => k === wanted);
  if (key) return difficulties[key];
  return Object.values(difficulties).find((d) => d.label.toLowerCase() === wanted) ?? difficulties.easy;
};

export const defaultSessionConfig: SessionConfig = {
  playerName: DEFAULT_PLAYER_NAME,
  difficulty: 'easy',
  theme: 'default',
};
