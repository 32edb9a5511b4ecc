import { COUNTDOWN_FROM, COUNTDOWN_STEP_MS } from './config';
import type { CountdownState, InputEvent } from './types';

/** 3, 2, 1. */
export const countdownNumerals = (): number[] => Array.from({ length: COUNTDOWN_FROM }, (_, i) => COUNTDOWN_FROM - i);

export const createCountdown = (): CountdownState => ({
  startedAt: null,
  numeral: COUNTDOWN_FROM,
  done: false,
  outcome: null,
  pendingEvents: [{ type: 'countdown-tick', numeral: COUNTDOWN_FROM }],
});

/**
 * Holds each numeral for one step, then reports `done`. Only a close request is honoured while
 * counting; presses and key strokes are dropped.
 */
export const stepCountdown = (prev: CountdownState, inputs: readonly InputEvent[], now: number): CountdownState => {
  const state: CountdownState = { ...prev, pendingEvents: [] };
  if (state.done || state.outcome !== null) return state;
  const startedAt = state.startedAt ?? now;
  state.startedAt = startedAt;

  if (inputs.some((input) => input.type === 'close')) {
    state.outcome = 'quit';
    return state;
  }

  const step = Math.floor(Math.max(0, now - startedAt) / COUNTDOWN_STEP_MS);
  if (step >= COUNTDOWN_FROM) {
    state.done = true;
    return state;
  }

  const numeral = COUNTDOWN_FROM - step;
  if (numeral !== state.numeral) {
    state.numeral = numeral;
    state.pendingEvents.push({ type: 'countdown-tick', numeral });
  }
  return state;
};
