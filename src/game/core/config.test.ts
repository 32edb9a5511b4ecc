import { describe, expect, it } from 'vitest';
import { difficulties, difficultyKeys, resolveDifficulty } from './config';

describe('difficulty presets', () => {
  it('keeps every timing strictly positive', () => {
    for (const key of difficultyKeys) {
      const d = difficulties[key];
      expect(d.targetVisibleMs).toBeGreaterThan(0);
      expect(d.spawnIntervalMs).toBeGreaterThan(0);
      expect(d.sessionLengthSeconds).toBeGreaterThan(0);
    }
  });

  it('ships the Easy, Medium and Hard tables', () => {
    expect(difficulties.easy).toMatchObject({ targetVisibleMs: 1200, spawnIntervalMs: 900, sessionLengthSeconds: 30 });
    expect(difficulties.medium).toMatchObject({ targetVisibleMs: 900, spawnIntervalMs: 700, sessionLengthSeconds: 25 });
    expect(difficulties.hard).toMatchObject({ targetVisibleMs: 650, spawnIntervalMs: 550, sessionLengthSeconds: 20 });
  });

  it('cannot be modified at runtime', () => {
    expect(Object.isFrozen(difficulties)).toBe(true);
    expect(Object.isFrozen(difficulties.hard)).toBe(true);
  });
});

describe('resolveDifficulty', () => {
  it('matches labels and keys regardless of case', () => {
    expect(resolveDifficulty('Hard').key).toBe('hard');
    expect(resolveDifficulty('medium').key).toBe('medium');
    expect(resolveDifficulty('  EASY ').key).toBe('easy');
  });

  it('falls back to Easy for anything unknown', () => {
    expect(resolveDifficulty('Nightmare').key).toBe('easy');
    expect(resolveDifficulty('constructor').key).toBe('easy');
    expect(resolveDifficulty(null).key).toBe('easy');
    expect(resolveDifficulty(undefined).key).toBe('easy');
  });
});
