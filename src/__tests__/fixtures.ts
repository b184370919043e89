import { PageStack } from '../PageStack';
import { SurfacePage } from '../Page/SurfacePage';
import { MemorySurface } from '../surface/MemorySurface';
import type { TransitionAnimationSet } from '../animation/TransitionAnimationProvider';
import type {
  AssetBackend,
  PageContext,
  PageFactory,
  Size,
  Vector2,
  VisualSurface,
} from '../types';

export type FakeAsset = { key: string; serial: number };

type Gate = {
  promise: Promise<void>;
  open: () => void;
};

function createGate(): Gate {
  let open: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

function abortable(promise: Promise<void>, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    signal.throwIfAborted();
    signal.addEventListener('abort', () => reject(signal.reason), {
      once: true,
    });
    promise.then(resolve, reject);
  });
}

/**
 * In-memory asset store. Records every load and release by key.
 */
export class FakeAssetBackend implements AssetBackend<FakeAsset> {
  public readonly loads: string[] = [];
  public readonly releases: string[] = [];
  public readonly missing = new Set<string>();
  public readonly failing = new Set<string>();
  /** When set, a held load rejects as soon as its signal aborts. */
  public honourSignal = false;

  private serial = 0;
  private readonly gates = new Map<string, Gate>();

  constructor(private readonly mode: 'sync' | 'async' = 'async') {}

  /** Holds loads of `key` until the returned function is called. */
  public hold(key: string): () => void {
    const gate = createGate();
    this.gates.set(key, gate);
    return () => {
      this.gates.delete(key);
      gate.open();
    };
  }

  public loadAsset(
    key: string,
    signal?: AbortSignal
  ): FakeAsset | null | Promise<FakeAsset | null> {
    this.loads.push(key);
    if (this.failing.has(key)) {
      throw new Error(`backend error for ${key}`);
    }
    if (this.missing.has(key)) {
      return this.mode === 'sync' ? null : Promise.resolve(null);
    }

    const asset = { key, serial: ++this.serial };
    const gate = this.gates.get(key);
    if (gate) {
      if (this.honourSignal && signal) {
        return abortable(gate.promise, signal).then(() => asset);
      }
      return gate.promise.then(() => asset);
    }
    return this.mode === 'sync' ? asset : Promise.resolve(asset);
  }

  public releaseAsset(asset: FakeAsset): void {
    this.releases.push(asset.key);
  }
}

/**
 * Writes every lifecycle call to a shared log as `<pageId>:<hook>`.
 */
export class RecordingPage extends SurfacePage {
  public readonly pageId: string;
  public readonly asset: FakeAsset;
  private readonly log: string[];

  constructor(asset: FakeAsset, context: PageContext, log: string[]) {
    super(new MemorySurface(context.pageId), {
      animations: context.animations,
    });
    this.pageId = context.pageId;
    this.asset = asset;
    this.log = log;
  }

  public afterLoad(parentSurface: VisualSurface): void {
    this.log.push(`${this.pageId}:afterLoad`);
    super.afterLoad(parentSurface);
  }

  public beforeEnter(): void {
    this.log.push(`${this.pageId}:beforeEnter`);
    super.beforeEnter();
  }

  public enter(
    isPush: boolean,
    animate: boolean,
    signal?: AbortSignal
  ): Promise<void> {
    this.log.push(`${this.pageId}:${hookLabel('enter', isPush, animate)}`);
    return super.enter(isPush, animate, signal);
  }

  public beforeExit(): void {
    this.log.push(`${this.pageId}:beforeExit`);
    super.beforeExit();
  }

  public exit(
    isPush: boolean,
    animate: boolean,
    signal?: AbortSignal
  ): Promise<void> {
    this.log.push(`${this.pageId}:${hookLabel('exit', isPush, animate)}`);
    return super.exit(isPush, animate, signal);
  }

  public afterExit(): void {
    this.log.push(`${this.pageId}:afterExit`);
    super.afterExit();
  }

  public destroy(): void {
    this.log.push(`${this.pageId}:destroy`);
    super.destroy();
  }
}

function hookLabel(hook: string, isPush: boolean, animate: boolean): string {
  return `${hook}:${isPush ? 'push' : 'pop'}${animate ? ':animated' : ''}`;
}

export function createRecordingFactory(
  log: string[]
): PageFactory<FakeAsset, RecordingPage> {
  return {
    instantiate: (asset, _parent, context) =>
      new RecordingPage(asset, context, log),
  };
}

export function createHarness(
  options: {
    animations?: Partial<TransitionAnimationSet>;
    backendMode?: 'sync' | 'async';
  } = {}
) {
  const log: string[] = [];
  const assets = new FakeAssetBackend(options.backendMode);
  const surface = new MemorySurface('root', { width: 400, height: 800 });
  let counter = 0;
  const stack = new PageStack<RecordingPage, FakeAsset>({
    surface,
    assets,
    factory: createRecordingFactory(log),
    animations: options.animations,
    createPageId: () => `page-${++counter}`,
  });
  const ids = () => stack.getStack().map((info) => info.pageId);

  return { stack, assets, surface, log, ids };
}

export const flush = () =>
  new Promise<void>((resolve) => setImmediate(resolve));

export async function waitFor(
  condition: () => boolean,
  attempts = 50
): Promise<void> {
  for (let i = 0; i < attempts; i++) {
    if (condition()) return;
    await flush();
  }
  throw new Error('condition not met');
}

/**
 * A surface that remembers every opacity and offset written to it.
 */
export class RecordingSurface implements VisualSurface {
  public active = true;
  public interactable = true;
  public readonly opacities: number[] = [];
  public readonly offsets: Vector2[] = [];
  public readonly parent: VisualSurface | null;

  private currentOpacity = 1;
  private currentOffset: Vector2 = { x: 0, y: 0 };

  constructor(parent: VisualSurface | null = null) {
    this.parent = parent;
  }

  public get size(): Size {
    return this.parent ? this.parent.size : { width: 0, height: 0 };
  }

  public get opacity(): number {
    return this.currentOpacity;
  }

  public set opacity(value: number) {
    this.currentOpacity = value;
    this.opacities.push(value);
  }

  public get offset(): Vector2 {
    return this.currentOffset;
  }

  public set offset(value: Vector2) {
    this.currentOffset = value;
    this.offsets.push(value);
  }

  public attach(): void {}

  public detach(): void {}
}
