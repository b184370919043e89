import type { VisualSurface } from '../types';

/**
 * What the stack needs from a page. The stack calls these in a fixed order
 * during a transition:
 *
 * push: `afterLoad` (new page) → `beforeExit` (old top) → `beforeEnter`
 * (new page) → `exit` + `enter` together → `afterExit` (old top).
 *
 * pop: `beforeExit` (every removed page) → `beforeEnter` (exposed page) →
 * `exit` + `enter` together → `afterExit` (every removed page).
 *
 * `destroy` runs once, after the page has left the stack.
 */
export interface Page {
  afterLoad?(parentSurface: VisualSurface): void;
  beforeEnter(): void;
  enter(isPush: boolean, animate: boolean, signal?: AbortSignal): Promise<void>;
  beforeExit(): void;
  exit(isPush: boolean, animate: boolean, signal?: AbortSignal): Promise<void>;
  afterExit(): void;
  destroy(): void;
}
