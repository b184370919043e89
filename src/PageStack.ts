import { nanoid } from 'nanoid/non-secure';
import { AssetHandle } from './AssetHandle';
import {
  TransitionAnimationProvider,
  type TransitionAnimationSet,
} from './animation/TransitionAnimationProvider';
import {
  DuplicatePreloadError,
  PreconditionViolationError,
  TransitionCancelledError,
} from './errors';
import type { Page } from './Page/Page';
import { PageRecord } from './PageRecord';
import { TransitionLock, type ReleaseLock } from './TransitionLock';
import { PopTransitionPlan } from './TransitionPlan/PopTransitionPlan';
import { PushTransitionPlan } from './TransitionPlan/PushTransitionPlan';
import { linkSignals } from './utils/linkSignals';
import type {
  AssetBackend,
  Listener,
  PageFactory,
  PageHistoryEntry,
  PageStackInfo,
  PageStackState,
  PopOptions,
  PopToOptions,
  PushOptions,
  PushResult,
  VisualSurface,
} from './types';

export interface PageStackOptions<TAsset, TPage extends Page = Page> {
  /** Container surface; pages are parented under it. */
  surface: VisualSurface;
  assets: AssetBackend<TAsset>;
  factory: PageFactory<TAsset, TPage>;
  animations?: TransitionAnimationProvider | Partial<TransitionAnimationSet>;
  createPageId?: () => string;
  debug?: boolean;
}

export type TransitionKind = 'push' | 'pop';

const EMPTY_STATE: PageStackState<never> = {
  history: [],
  stack: [],
  inTransition: false,
};

export class PageStack<TPage extends Page = Page, TAsset = unknown> {
  public readonly surface: VisualSurface;
  public readonly animations: TransitionAnimationProvider;

  private readonly assets: AssetBackend<TAsset>;
  private readonly factory: PageFactory<TAsset, TPage>;
  private readonly createPageId: () => string;
  private readonly debugEnabled: boolean;

  private records: readonly PageRecord<TPage, TAsset>[] = [];
  private readonly preloaded = new Map<string, AssetHandle<TAsset>>();
  private readonly lock = new TransitionLock();
  private readonly lifetime = new AbortController();
  private readonly listeners: Set<Listener> = new Set();
  private state: PageStackState<TPage> = EMPTY_STATE;
  private activeTransition: TransitionKind | null = null;
  // Handle of a page being loaded by the running push, not yet resident.
  private loadingHandle: AssetHandle<TAsset> | null = null;
  private disposed = false;

  constructor(options: PageStackOptions<TAsset, TPage>) {
    this.surface = options.surface;
    this.assets = options.assets;
    this.factory = options.factory;
    this.animations =
      options.animations instanceof TransitionAnimationProvider
        ? options.animations
        : new TransitionAnimationProvider(options.animations);
    this.createPageId = options.createPageId ?? (() => nanoid());
    this.debugEnabled = options.debug ?? false;

    this.log('ctor');
  }

  private log(message: string, data?: unknown): void {
    if (this.debugEnabled) {
      if (data !== undefined) {
        console.log(`[PageStack] ${message}`, data);
      } else {
        console.log(`[PageStack] ${message}`);
      }
    }
  }

  /**
   * Loads `resourceKey`, builds its page and transitions to it. Calls made
   * while another transition runs wait for it, in call order; preconditions
   * that depend on the stack are checked when the call's turn comes.
   */
  public async push(
    resourceKey: string,
    options: PushOptions = {}
  ): Promise<PushResult<TPage>> {
    const { playAnimation = true, stack = true, signal } = options;

    this.assertUsable();
    if (!resourceKey) {
      throw new PreconditionViolationError(
        'PageStack: resourceKey must not be empty'
      );
    }
    if (options.pageId === '') {
      throw new PreconditionViolationError('PageStack: pageId must not be empty');
    }

    return this.runTransition('push', signal, async (opSignal) => {
      const pageId = options.pageId ?? this.createPageId();
      this.assertPageIdAvailable(pageId);

      this.beginTransition('push');
      this.log('push', { resourceKey, pageId, playAnimation, stack });

      const record = await this.loadPage(resourceKey, pageId, stack, opSignal);

      let removed: PageRecord<TPage, TAsset> | undefined;
      try {
        const plan = PushTransitionPlan.create(record, this.records);
        await plan.run(playAnimation, opSignal);
        opSignal.throwIfAborted();

        const next = this.records.slice();
        if (plan.exitingIsRemoved) {
          removed = next.pop();
        }
        next.push(record);
        this.commit(next);
      } catch (error) {
        record.dispose();
        throw error;
      }

      if (removed) {
        this.log('push: dispose replaced page', { pageId: removed.pageId });
        removed.dispose();
      }

      return { pageId, page: record.page };
    });
  }

  /**
   * Removes the `count` topmost pages (default 1) and reveals the page
   * beneath them.
   */
  public async pop(options: PopOptions = {}): Promise<void> {
    const { playAnimation = true, count = 1, skipWhenEmpty = false, signal } =
      options;

    this.assertUsable();
    if (!Number.isInteger(count) || count < 1) {
      throw new PreconditionViolationError(
        `PageStack: pop count must be a positive integer (got ${count})`
      );
    }

    await this.runTransition('pop', signal, async (opSignal) => {
      if (skipWhenEmpty && this.records.length === 0) {
        this.log('pop: stack is empty, skipped');
        return;
      }
      if (count > this.records.length) {
        throw new PreconditionViolationError(
          `PageStack: cannot pop ${count} page(s) from a stack of ${this.records.length}`
        );
      }
      await this.popLocked(count, playAnimation, opSignal);
    });
  }

  /**
   * Pops until the page with `destinationPageId` is the current page. Resolves
   * without a transition when it already is.
   */
  public async popTo(
    destinationPageId: string,
    options: PopToOptions = {}
  ): Promise<void> {
    const { playAnimation = true, signal } = options;

    this.assertUsable();

    await this.runTransition('pop', signal, async (opSignal) => {
      const count = this.countAbove(destinationPageId);
      if (count === 0) {
        this.log('popTo: already current', { destinationPageId });
        return;
      }
      await this.popLocked(count, playAnimation, opSignal);
    });
  }

  /**
   * Loads an asset ahead of time. Pushes of the same key reuse it, and it
   * stays loaded until `unloadPreloadedAsset` or `dispose`.
   */
  public async preloadAsset(
    resourceKey: string,
    signal?: AbortSignal
  ): Promise<void> {
    this.assertUsable();
    if (!resourceKey) {
      throw new PreconditionViolationError(
        'PageStack: resourceKey must not be empty'
      );
    }
    if (this.preloaded.has(resourceKey)) {
      throw new DuplicatePreloadError(resourceKey);
    }

    const handle = new AssetHandle(resourceKey, this.assets);
    this.preloaded.set(resourceKey, handle);
    this.log('preload', { resourceKey });

    const operation = linkSignals(this.lifetime.signal, signal);
    try {
      await handle.load(operation.signal);
    } catch (error) {
      if (this.preloaded.get(resourceKey) === handle) {
        this.preloaded.delete(resourceKey);
      }
      if (!this.isHandleInUse(handle)) {
        handle.release();
      }
      throw this.toFailure('preload', error, operation.signal);
    } finally {
      operation.dispose();
    }
  }

  public unloadPreloadedAsset(resourceKey: string): void {
    const handle = this.preloaded.get(resourceKey);
    if (!handle) {
      throw new PreconditionViolationError(
        `PageStack: the resource with key "${resourceKey}" is not preloaded`
      );
    }
    if (this.isHandleInUse(handle)) {
      throw new PreconditionViolationError(
        `PageStack: the resource with key "${resourceKey}" is used by a page in the stack`
      );
    }

    this.preloaded.delete(resourceKey);
    handle.release();
    this.log('unloadPreloadedAsset', { resourceKey });
  }

  public isPreloaded(resourceKey: string): boolean {
    return this.preloaded.has(resourceKey);
  }

  /**
   * Destroys every resident page and releases every asset, preloaded ones
   * included. A running transition is cancelled; queued calls reject.
   */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.log('dispose', { pageCount: this.records.length });

    this.lifetime.abort(new TransitionCancelledError('PageStack: disposed'));

    const errors: unknown[] = [];
    const records = this.records;
    this.records = [];
    for (const record of [...records].reverse()) {
      try {
        record.dispose();
      } catch (error) {
        errors.push(error);
      }
    }

    for (const handle of this.preloaded.values()) {
      handle.release();
    }
    this.preloaded.clear();

    this.commit([]);
    this.listeners.clear();

    if (errors.length > 0) {
      throw new AggregateError(errors, 'PageStack: failed to dispose pages');
    }
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  public getCurrentPage(): PageStackInfo | undefined {
    return this.state.stack[this.state.stack.length - 1];
  }

  /** Oldest first. */
  public getStack(): readonly PageStackInfo[] {
    return this.state.stack;
  }

  /** Oldest first. */
  public getHistory(): readonly PageHistoryEntry<TPage>[] {
    return this.state.history;
  }

  public getPageCount(): number {
    return this.state.stack.length;
  }

  public isInTransition(): boolean {
    return this.activeTransition !== null;
  }

  /** False from the moment a transition starts until its cleanup is done. */
  public isInteractive(): boolean {
    return this.activeTransition === null;
  }

  public getState = (): PageStackState<TPage> => {
    return this.state;
  };

  public subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async popLocked(
    count: number,
    playAnimation: boolean,
    signal: AbortSignal
  ): Promise<void> {
    this.beginTransition('pop');
    this.log('pop', { count, playAnimation });

    const plan = PopTransitionPlan.create(this.records, count);
    await plan.run(playAnimation, signal);
    signal.throwIfAborted();

    const next = this.records.slice(0, this.records.length - count);
    plan.enteringRecord?.markStacked();
    this.commit(next);

    for (const record of plan.exitingRecords) {
      record.dispose();
    }
  }

  private async loadPage(
    resourceKey: string,
    pageId: string,
    stacked: boolean,
    signal: AbortSignal
  ): Promise<PageRecord<TPage, TAsset>> {
    const handle =
      this.preloaded.get(resourceKey) ?? new AssetHandle(resourceKey, this.assets);
    // A preload can fail while this push waits on its handle. The push then
    // owns the handle.
    const isPreloaded = () => this.preloaded.get(resourceKey) === handle;

    this.loadingHandle = handle;
    try {
      let page: TPage;
      let preloaded: boolean;
      try {
        const asset = await handle.load(signal);
        signal.throwIfAborted();
        preloaded = isPreloaded();
        page = this.factory.instantiate(asset, this.surface, {
          pageId,
          resourceKey,
          animations: this.animations,
        });
      } catch (error) {
        if (!isPreloaded()) handle.release();
        throw error;
      }

      const record = new PageRecord<TPage, TAsset>({
        resourceKey,
        pageId,
        page,
        stacked,
        assetHandle: handle,
        preloaded,
      });

      try {
        page.afterLoad?.(this.surface);
      } catch (error) {
        record.dispose();
        throw error;
      }
      return record;
    } finally {
      this.loadingHandle = null;
    }
  }

  private async runTransition<T>(
    kind: TransitionKind,
    signal: AbortSignal | undefined,
    body: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const operation = linkSignals(this.lifetime.signal, signal);

    let release: ReleaseLock;
    try {
      release = await this.lock.acquire(operation.signal);
    } catch (error) {
      operation.dispose();
      throw this.toFailure(kind, error, operation.signal);
    }

    try {
      return await body(operation.signal);
    } catch (error) {
      throw this.toFailure(kind, error, operation.signal);
    } finally {
      this.endTransition();
      release();
      operation.dispose();
    }
  }

  private toFailure(
    operation: TransitionKind | 'preload',
    error: unknown,
    signal: AbortSignal
  ): unknown {
    if (error instanceof TransitionCancelledError) {
      return error;
    }
    if (signal.aborted) {
      return new TransitionCancelledError(`PageStack: ${operation} cancelled`, {
        cause: signal.reason,
      });
    }
    return error;
  }

  private beginTransition(kind: TransitionKind): void {
    this.activeTransition = kind;
    this.surface.interactable = false;
    this.setState({ inTransition: true });
  }

  private endTransition(): void {
    if (this.activeTransition === null) return;
    this.activeTransition = null;
    this.surface.interactable = true;
    this.setState({ inTransition: false });
  }

  private commit(records: readonly PageRecord<TPage, TAsset>[]): void {
    this.records = records;
    this.setState({
      history: records.map((record) => record.toHistoryEntry()),
      stack: records.map((record) => record.toStackInfo()),
    });
  }

  private setState(next: Partial<PageStackState<TPage>>): void {
    this.state = { ...this.state, ...next };
    this.log('setState', {
      stack: this.state.stack.map((info) => info.pageId),
      inTransition: this.state.inTransition,
    });
    this.emit();
  }

  private emit(): void {
    // Do not allow one listener to break all others.
    for (const listener of Array.from(this.listeners)) {
      try {
        listener();
      } catch (e) {
        if (this.debugEnabled) {
          console.error('[PageStack] listener error', e);
        }
      }
    }
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new PreconditionViolationError('PageStack: stack is disposed');
    }
  }

  private assertPageIdAvailable(pageId: string): void {
    if (this.records.some((record) => record.pageId === pageId)) {
      throw new PreconditionViolationError(
        `PageStack: a page with id "${pageId}" is already in the stack`
      );
    }
  }

  private countAbove(pageId: string): number {
    for (let i = this.records.length - 1; i >= 0; i--) {
      if (this.records[i]?.pageId === pageId) {
        return this.records.length - 1 - i;
      }
    }
    throw new PreconditionViolationError(
      `PageStack: the page with id "${pageId}" is not found`
    );
  }

  private isHandleInUse(handle: AssetHandle<TAsset>): boolean {
    return (
      this.loadingHandle === handle ||
      this.records.some((record) => record.assetHandle === handle)
    );
  }
}
