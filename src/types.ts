import type { Page } from './Page/Page';
import type { TransitionAnimationProvider } from './animation/TransitionAnimationProvider';

export type Vector2 = { x: number; y: number };

export type Size = { width: number; height: number };

/**
 * The drawable area a page controls. The rendering engine behind it is opaque
 * to the stack: only these properties are read or written.
 */
export interface VisualSurface {
  active: boolean;
  /** 0 (transparent) to 1 (opaque). */
  opacity: number;
  /** Anchored position relative to the parent, in the parent's units. */
  offset: Vector2;
  /** When false the host rejects input on this surface and its children. */
  interactable: boolean;
  readonly size: Size;
  readonly parent: VisualSurface | null;
  /**
   * Places `child` under this surface. Children are kept ordered by
   * `order`; equal orders keep insertion order.
   */
  attach(child: VisualSurface, order: number): void;
  detach(child: VisualSurface): void;
}

/**
 * Asset storage. `loadAsset` may answer synchronously (an asset already in
 * memory) or asynchronously; `null`/`undefined` means the key did not resolve.
 */
export interface AssetBackend<TAsset> {
  loadAsset(
    key: string,
    signal?: AbortSignal
  ): TAsset | null | undefined | Promise<TAsset | null | undefined>;
  releaseAsset(asset: TAsset): void;
}

export type PageContext = {
  pageId: string;
  resourceKey: string;
  animations: TransitionAnimationProvider;
};

export interface PageFactory<TAsset, TPage extends Page = Page> {
  instantiate(
    asset: TAsset,
    parentSurface: VisualSurface,
    context: PageContext
  ): TPage;
}

export type PageStackInfo = {
  resourceKey: string;
  pageId: string;
  stacked: boolean;
};

export type PageHistoryEntry<TPage extends Page = Page> = {
  resourceKey: string;
  pageId: string;
  page: TPage;
};

export type PageStackState<TPage extends Page = Page> = {
  history: readonly PageHistoryEntry<TPage>[];
  stack: readonly PageStackInfo[];
  inTransition: boolean;
};

export type PushOptions = {
  playAnimation?: boolean;
  /**
   * Keep the pushed page resident when a later push covers it. A page pushed
   * with `stack: false` is replaced by the next push instead.
   */
  stack?: boolean;
  pageId?: string;
  signal?: AbortSignal;
};

export type PushResult<TPage extends Page = Page> = {
  pageId: string;
  page: TPage;
};

export type PopOptions = {
  playAnimation?: boolean;
  count?: number;
  /** Resolve without effect, instead of rejecting, when the stack is empty. */
  skipWhenEmpty?: boolean;
  signal?: AbortSignal;
};

export type PopToOptions = Omit<PopOptions, 'count' | 'skipWhenEmpty'>;

export type Listener = () => void;
