import type { TransitionAnimationProvider } from '../animation/TransitionAnimationProvider';
import type { VisualSurface } from '../types';
import type { Page } from './Page';

export type SurfacePageOptions = {
  animations: TransitionAnimationProvider;
  /**
   * Layering among sibling pages; lower values render behind higher ones.
   */
  renderingOrder?: number;
};

/**
 * Default page behaviour over a `VisualSurface`: hidden until it enters,
 * fully opaque while shown, inactive once it has exited. Pages with their own
 * visuals can extend this or implement `Page` directly.
 */
export class SurfacePage implements Page {
  public readonly surface: VisualSurface;
  public readonly renderingOrder: number;
  public destroyed = false;

  private readonly animations: TransitionAnimationProvider;
  private parentSurface: VisualSurface | null = null;

  constructor(surface: VisualSurface, options: SurfacePageOptions) {
    this.surface = surface;
    this.animations = options.animations;
    this.renderingOrder = options.renderingOrder ?? 0;
  }

  public afterLoad(parentSurface: VisualSurface): void {
    this.parentSurface = parentSurface;
    parentSurface.attach(this.surface, this.renderingOrder);
    this.fillParent();
    this.surface.opacity = 0;
  }

  public beforeEnter(): void {
    this.surface.active = true;
    this.fillParent();
    this.surface.opacity = 0;
  }

  public async enter(
    isPush: boolean,
    animate: boolean,
    signal?: AbortSignal
  ): Promise<void> {
    this.surface.opacity = 1;

    if (animate) {
      await this.animations.get(isPush, true).play(this.surface, signal);
    }

    this.fillParent();
  }

  public beforeExit(): void {
    this.surface.active = true;
    this.fillParent();
    this.surface.opacity = 1;
  }

  public async exit(
    isPush: boolean,
    animate: boolean,
    signal?: AbortSignal
  ): Promise<void> {
    if (animate) {
      await this.animations.get(isPush, false).play(this.surface, signal);
    }

    this.surface.opacity = 0;
  }

  public afterExit(): void {
    this.surface.active = false;
  }

  public destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.surface.active = false;
    this.parentSurface?.detach(this.surface);
    this.parentSurface = null;
  }

  private fillParent(): void {
    this.surface.offset = { x: 0, y: 0 };
  }
}
