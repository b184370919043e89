import {
  PageStackError,
  ResourceLoadError,
  TransitionCancelledError,
} from './errors';
import type { AssetBackend } from './types';

export type AssetHandleState = 'idle' | 'loading' | 'loaded' | 'released';

/**
 * One resource resolved from the asset backend by key.
 *
 * Concurrent `load` calls share a single backend request. A caller's signal
 * only stops that caller from waiting; the request itself is aborted once
 * every caller has given up, or on `release()`. A result that arrives after
 * that is freed on arrival.
 */
export class AssetHandle<TAsset> {
  public readonly key: string;

  private readonly backend: AssetBackend<TAsset>;
  private asset: TAsset | undefined;
  private pending: Promise<TAsset> | null = null;
  private requestController: AbortController | null = null;
  private waiting = 0;
  private currentState: AssetHandleState = 'idle';

  constructor(key: string, backend: AssetBackend<TAsset>) {
    this.key = key;
    this.backend = backend;
  }

  public get state(): AssetHandleState {
    return this.currentState;
  }

  public get isLoaded(): boolean {
    return this.currentState === 'loaded';
  }

  public load(signal?: AbortSignal): Promise<TAsset> {
    if (this.currentState === 'released') {
      return Promise.reject(
        new PageStackError(`Asset handle already released: "${this.key}"`)
      );
    }
    if (this.currentState === 'loaded' && this.asset !== undefined) {
      return Promise.resolve(this.asset);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (!this.pending) {
      const controller = new AbortController();
      this.currentState = 'loading';
      this.requestController = controller;
      const request = this.request(controller.signal);
      this.pending = request;
      request.then(
        () => this.settle(request),
        () => this.settle(request)
      );
    }

    return this.join(this.pending, signal);
  }

  public get(): TAsset {
    if (this.currentState !== 'loaded' || this.asset === undefined) {
      throw new PageStackError(`Asset not loaded: "${this.key}"`);
    }
    return this.asset;
  }

  public release(): void {
    if (this.currentState === 'released') return;
    this.currentState = 'released';
    this.pending = null;
    this.requestController?.abort(
      new TransitionCancelledError(`Asset handle released: "${this.key}"`)
    );
    this.requestController = null;

    const asset = this.asset;
    this.asset = undefined;
    if (asset !== undefined) {
      this.backend.releaseAsset(asset);
    }
  }

  private join(request: Promise<TAsset>, signal?: AbortSignal): Promise<TAsset> {
    this.waiting++;

    return new Promise<TAsset>((resolve, reject) => {
      let left = false;
      const leave = () => {
        left = true;
        this.waiting--;
        signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = () => {
        if (left) return;
        leave();
        if (this.waiting === 0 && this.pending === request) {
          this.cancelRequest(signal?.reason);
        }
        reject(signal?.reason);
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      request.then(
        (asset) => {
          if (left) return;
          leave();
          resolve(asset);
        },
        (error: unknown) => {
          if (left) return;
          leave();
          reject(error);
        }
      );
    });
  }

  // Nobody waits for the request any more.
  private cancelRequest(reason: unknown): void {
    this.requestController?.abort(reason);
    this.requestController = null;
    this.pending = null;
    if (this.currentState === 'loading') this.currentState = 'idle';
  }

  private settle(request: Promise<TAsset>): void {
    if (this.pending !== request) return;
    this.pending = null;
    this.requestController = null;
    if (this.currentState === 'loading') this.currentState = 'idle';
  }

  private async request(signal: AbortSignal): Promise<TAsset> {
    let asset: TAsset | null | undefined;
    try {
      asset = await this.backend.loadAsset(this.key, signal);
    } catch (error) {
      if (signal.aborted) {
        throw new TransitionCancelledError(
          `Asset load cancelled: "${this.key}"`,
          { cause: error }
        );
      }
      throw new ResourceLoadError(this.key, error);
    }

    if (asset === null || asset === undefined) {
      throw new ResourceLoadError(this.key);
    }

    if (signal.aborted) {
      this.backend.releaseAsset(asset);
      throw new TransitionCancelledError(`Asset load cancelled: "${this.key}"`, {
        cause: signal.reason,
      });
    }

    this.asset = asset;
    this.currentState = 'loaded';
    return asset;
  }
}
