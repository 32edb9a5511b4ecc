import { describe, expect, it } from 'vitest';
import { InputQueue } from './queue';

describe('InputQueue', () => {
  it('hands inputs over in arrival order, once', () => {
    const queue = new InputQueue();
    queue.push({ type: 'press', pos: { x: 1, y: 2 } });
    queue.push({ type: 'escape' });
    expect(queue.size).toBe(2);
    expect(queue.drain()).toEqual([{ type: 'press', pos: { x: 1, y: 2 } }, { type: 'escape' }]);
    expect(queue.drain()).toEqual([]);
  });

  it('can be emptied without reading', () => {
    const queue = new InputQueue();
    queue.push({ type: 'close' });
    queue.clear();
    expect(queue.size).toBe(0);
  });
});
