import { GRID, STARTING_LIVES, WINDOW, resolveDifficulty } from './config';
import { computeExitRect, computeLayout } from './layout';
import { pickIndex, rectContains, type RandomSource } from './math';
import { activateTarget, createTarget, deactivateTarget, hitTestTarget, tickTarget } from './target';
import type { InputEvent, SessionConfig, SessionState, SessionSummary, Size, Vec2 } from './types';

export type SessionOptions = {
  /** Rendered size of the Exit label; the button box is built around it. */
  exitLabelSize?: Size;
};

export const createSession = (config: SessionConfig, now: number, options: SessionOptions = {}): SessionState => {
  const difficulty = resolveDifficulty(config.difficulty);
  const layout = computeLayout(WINDOW.width, WINDOW.height, GRID.rows, GRID.cols);
  return {
    mode: 'running',
    config: { ...config },
    difficulty,
    layout,
    exitRect: computeExitRect(options.exitLabelSize),
    startedAt: now,
    now,
    lastSpawnAt: null,
    remainingMs: difficulty.sessionLengthSeconds * 1000,
    score: 0,
    lives: STARTING_LIVES,
    hits: 0,
    misses: 0,
    spawns: 0,
    targets: layout.positions.map((pos, index) => createTarget(index, pos, layout.radius, difficulty.targetVisibleMs)),
    activeIndex: null,
    outcome: null,
    pendingEvents: [],
  };
};

const remainingMsAt = (state: SessionState, now: number) => (
  Math.max(0, state.difficulty.sessionLengthSeconds * 1000 - (now - state.startedAt))
);

/** Whole seconds left, rounded up so the clock reads 00 only once time is really gone. */
export const displaySeconds = (state: Pick<SessionState, 'remainingMs'>) => Math.ceil(state.remainingMs / 1000);

const enterGameOverIfDone = (state: SessionState) => {
  if (state.mode !== 'running') return;
  if (state.remainingMs > 0 && state.lives > 0) return;
  state.mode = 'gameOver';
  state.pendingEvents.push({
    type: 'game-over',
    finalScore: state.score,
    reason: state.lives <= 0 ? 'lives' : 'time',
  });
};

const spawnNewTarget = (state: SessionState, now: number, random: RandomSource) => {
  if (state.activeIndex !== null) deactivateTarget(state.targets[state.activeIndex]);
  // Any hideout may come up next, including the one that just went down.
  const index = pickIndex(state.targets.length, random);
  const target = state.targets[index];
  target.visibleMs = state.difficulty.targetVisibleMs;
  activateTarget(target, now);
  state.activeIndex = index;
  state.lastSpawnAt = now;
  state.spawns += 1;
  state.pendingEvents.push({ type: 'spawn', index });
};

const isSpawnDue = (state: SessionState, now: number) => (
  state.lastSpawnAt === null || now - state.lastSpawnAt > state.difficulty.spawnIntervalMs
);

const syncActiveIndex = (state: SessionState) => {
  if (state.activeIndex !== null && !state.targets[state.activeIndex].active) state.activeIndex = null;
};

const handlePress = (state: SessionState, pos: Vec2) => {
  if (rectContains(state.exitRect, pos)) {
    state.outcome = 'menu';
    state.pendingEvents.push({ type: 'exit' });
    return;
  }
  if (state.mode !== 'running') return;

  const hit = state.targets.find((t) => hitTestTarget(t, pos));
  if (hit) {
    state.score += 1;
    state.hits += 1;
    deactivateTarget(hit);
    syncActiveIndex(state);
    state.pendingEvents.push({ type: 'hit', index: hit.index, score: state.score });
    return;
  }

  state.lives = Math.max(0, state.lives - 1);
  state.misses += 1;
  state.pendingEvents.push({ type: 'miss', livesRemaining: state.lives });
};

const handleInput = (state: SessionState, input: InputEvent) => {
  switch (input.type) {
    case 'close':
      state.outcome = 'quit';
      return;
    case 'escape':
      if (state.mode === 'gameOver') state.outcome = 'menu';
      return;
    case 'press':
      handlePress(state, input.pos);
  }
};

/**
 * Advances one frame. `now` is sampled once by the caller and used for every comparison in
 * the frame. Inputs are applied in arrival order after the terminal check; once an outcome is
 * set the rest of the frame is dropped.
 */
export const stepSession = (
  prev: SessionState,
  inputs: readonly InputEvent[],
  now: number,
  random: RandomSource = Math.random,
): SessionState => {
  const state: SessionState = {
    ...prev,
    now,
    targets: prev.targets.map((t) => ({ ...t, pos: { ...t.pos } })),
    pendingEvents: [],
  };
  if (state.outcome !== null) return state;

  state.remainingMs = remainingMsAt(state, now);
  enterGameOverIfDone(state);

  for (const input of inputs) {
    handleInput(state, input);
    if (state.outcome !== null) return state;
  }

  if (state.mode !== 'running') return state;

  if (isSpawnDue(state, now)) spawnNewTarget(state, now, random);
  state.targets.forEach((t) => tickTarget(t, now));
  syncActiveIndex(state);
  return state;
};

export const countActiveTargets = (state: Pick<SessionState, 'targets'>) => state.targets.filter((t) => t.active).length;

export const summarizeSession = (state: SessionState): SessionSummary => {
  const attempts = state.hits + state.misses;
  return {
    playerName: state.config.playerName,
    difficulty: state.difficulty.key,
    score: state.score,
    hits: state.hits,
    misses: state.misses,
    spawns: state.spawns,
    accuracy: attempts > 0 ? state.hits / attempts : 0,
  };
};
