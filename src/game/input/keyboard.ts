import type { InputQueue } from './queue';

/** A hide that keeps the page in the back/forward cache is not a close. */
export const isPageClosing = (e: Pick<PageTransitionEvent, 'persisted'>) => !e.persisted;

type ListenerTarget = Pick<Window, 'addEventListener' | 'removeEventListener'>;

/** Escape returns to the menu; leaving the page counts as closing the game window. */
export class KeyboardInput {
  constructor(private readonly queue: InputQueue, private readonly target: ListenerTarget = window) {
    target.addEventListener('keydown', this.onKeyDown);
    target.addEventListener('pagehide', this.onPageHide);
  }

  destroy() {
    this.target.removeEventListener('keydown', this.onKeyDown);
    this.target.removeEventListener('pagehide', this.onPageHide);
  }

  private onKeyDown = (e: KeyboardEvent) => {
    if (e.key !== 'Escape' || e.repeat) return;
    e.preventDefault();
    this.queue.push({ type: 'escape' });
  };

  private onPageHide = (e: PageTransitionEvent) => {
    if (!isPageClosing(e)) return;
    this.queue.push({ type: 'close' });
  };
}
