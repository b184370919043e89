import type { Size, Vector2, VisualSurface } from '../types';

type ChildSlot = { surface: VisualSurface; order: number };

/**
 * A `VisualSurface` that only records state. Useful when the stack runs
 * without a renderer, and as the container surface in tests.
 */
export class MemorySurface implements VisualSurface {
  public active = true;
  public opacity = 1;
  public offset: Vector2 = { x: 0, y: 0 };
  public interactable = true;
  public readonly name: string;

  private currentParent: MemorySurface | null = null;
  private readonly slots: ChildSlot[] = [];
  private currentSize: Size;

  constructor(name = 'surface', size: Size = { width: 0, height: 0 }) {
    this.name = name;
    this.currentSize = { ...size };
  }

  public get size(): Size {
    return this.currentParent ? this.currentParent.size : this.currentSize;
  }

  public set size(size: Size) {
    this.currentSize = { ...size };
  }

  public get parent(): VisualSurface | null {
    return this.currentParent;
  }

  public get children(): readonly VisualSurface[] {
    return this.slots.map((slot) => slot.surface);
  }

  public attach(child: VisualSurface, order: number): void {
    this.detach(child);

    let index = this.slots.length;
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i];
      if (slot && order < slot.order) {
        index = i;
        break;
      }
    }
    this.slots.splice(index, 0, { surface: child, order });

    if (child instanceof MemorySurface) {
      child.currentParent = this;
    }
  }

  public detach(child: VisualSurface): void {
    const index = this.slots.findIndex((slot) => slot.surface === child);
    if (index === -1) return;
    this.slots.splice(index, 1);

    if (child instanceof MemorySurface && child.currentParent === this) {
      child.currentParent = null;
    }
  }
}
