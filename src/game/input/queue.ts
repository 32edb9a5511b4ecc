import type { InputEvent } from '../core/types';

/** Inputs gathered between frames, handed to the core once per frame in arrival order. */
export class InputQueue {
  private items: InputEvent[] = [];

  push(input: InputEvent) {
    this.items.push(input);
  }

  drain(): InputEvent[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  clear() {
    this.items = [];
  }

  get size() {
    return this.items.length;
  }
}
