export type DifficultyKey = 'easy' | 'medium' | 'hard';
export type ThemeKey = 'default' | 'jungle' | 'beach' | 'desert';

export type Vec2 = { x: number; y: number };
export type Size = { width: number; height: number };
export type Rect = { x: number; y: number; width: number; height: number };

export type DifficultyProfile = {
  key: DifficultyKey;
  label: string;
  targetVisibleMs: number;
  spawnIntervalMs: number;
  sessionLengthSeconds: number;
};

export type DifficultySet = Record<DifficultyKey, DifficultyProfile>;

export type SessionConfig = {
  playerName: string;
  difficulty: DifficultyKey;
  theme: ThemeKey;
};

export type BoardLayout = {
  positions: readonly Vec2[];
  radius: number;
};

export type Target = {
  index: number;
  pos: Vec2;
  radius: number;
  visibleMs: number;
  active: boolean;
  activatedAt: number;
};

export type SessionMode = 'running' | 'gameOver';

/** Where control goes once a phase is done: back to the menu, or the whole game closes. */
export type PhaseOutcome = 'menu' | 'quit';

export type SessionState = {
  mode: SessionMode;
  config: SessionConfig;
  difficulty: DifficultyProfile;
  layout: BoardLayout;
  exitRect: Rect;
  startedAt: number;
  now: number;
  /** `null` until the first spawn, which then happens on the first frame. */
  lastSpawnAt: number | null;
  remainingMs: number;
  score: number;
  lives: number;
  hits: number;
  misses: number;
  spawns: number;
  targets: Target[];
  /** Index into `targets`; the slot it names is always `active`. */
  activeIndex: number | null;
  outcome: PhaseOutcome | null;
  pendingEvents: GameEvent[];
};

export type CountdownState = {
  /** Set by the first step, so the count starts on the frame loop's clock. */
  startedAt: number | null;
  numeral: number;
  done: boolean;
  outcome: PhaseOutcome | null;
  pendingEvents: GameEvent[];
};

export type SessionSummary = {
  playerName: string;
  difficulty: DifficultyKey;
  score: number;
  hits: number;
  misses: number;
  spawns: number;
  accuracy: number;
};

export type InputEvent =
  | { type: 'press'; pos: Vec2 }
  | { type: 'escape' }
  | { type: 'close' };

export type GameEvent =
  | { type: 'countdown-tick'; numeral: number }
  | { type: 'spawn'; index: number }
  | { type: 'hit'; index: number; score: number }
  | { type: 'miss'; livesRemaining: number }
  | { type: 'game-over'; finalScore: number; reason: 'time' | 'lives' }
  | { type: 'exit' };
