import { AsyncQueue } from './AsyncQueue';
import {
  PreconditionViolationError,
  TransitionCancelledError,
} from './errors';
import type { Page } from './Page/Page';
import { resourceKeyOf, type PageType } from './Page/resourceKey';
import type { PageStack } from './PageStack';
import type { PopOptions, PushOptions, PushResult } from './types';
import { linkSignals } from './utils/linkSignals';

export type NavigationRequestQueueOptions = {
  debug?: boolean;
};

export type QueuedPopOptions = Omit<PopOptions, 'skipWhenEmpty'>;

type PushRequest<TPage extends Page> = {
  resourceKey: string;
  options: PushOptions;
  resolve: (result: PushResult<TPage>) => void;
  reject: (error: unknown) => void;
};

type PopRequest = {
  options: QueuedPopOptions;
  resolve: () => void;
  reject: (error: unknown) => void;
};

/**
 * Front door for navigation coming from anywhere in the app. Push and pop
 * requests each go into their own FIFO channel, drained by one consumer per
 * channel; both consumers go through the stack's transition lock, so at most
 * one transition runs and the two streams interleave in completion order.
 *
 * Every request returns a promise settled with its own outcome. A failed
 * request does not hold up the ones behind it.
 */
export class NavigationRequestQueue<TPage extends Page = Page, TAsset = unknown> {
  /** Settles once both consumers have stopped after `dispose()`. */
  public readonly closed: Promise<void>;

  private readonly stack: PageStack<TPage, TAsset>;
  private readonly pushChannel = new AsyncQueue<PushRequest<TPage>>();
  private readonly popChannel = new AsyncQueue<PopRequest>();
  private readonly lifetime = new AbortController();
  private readonly debugEnabled: boolean;
  private disposed = false;

  constructor(
    stack: PageStack<TPage, TAsset>,
    options: NavigationRequestQueueOptions = {}
  ) {
    this.stack = stack;
    this.debugEnabled = options.debug ?? false;

    this.closed = Promise.all([
      this.consume(this.pushChannel, (request) => this.servePush(request)),
      this.consume(this.popChannel, (request) => this.servePop(request)),
    ]).then(() => undefined);
  }

  private log(message: string, data?: unknown): void {
    if (this.debugEnabled) {
      if (data !== undefined) {
        console.log(`[NavigationRequestQueue] ${message}`, data);
      } else {
        console.log(`[NavigationRequestQueue] ${message}`);
      }
    }
  }

  public get pendingCount(): number {
    return this.pushChannel.size + this.popChannel.size;
  }

  public push(
    resourceKey: string,
    options: PushOptions = {}
  ): Promise<PushResult<TPage>> {
    if (this.disposed) {
      return Promise.reject(
        new PreconditionViolationError('NavigationRequestQueue: queue is disposed')
      );
    }
    if (!resourceKey) {
      return Promise.reject(
        new PreconditionViolationError(
          'NavigationRequestQueue: resourceKey must not be empty'
        )
      );
    }

    return new Promise<PushResult<TPage>>((resolve, reject) => {
      this.log('enqueue push', { resourceKey });
      this.pushChannel.write({ resourceKey, options, resolve, reject });
    });
  }

  /** Pushes the page class's `resourceKey`. */
  public pushPage(
    type: PageType,
    options: PushOptions = {}
  ): Promise<PushResult<TPage>> {
    let resourceKey: string;
    try {
      resourceKey = resourceKeyOf(type);
    } catch (error) {
      return Promise.reject(error);
    }
    return this.push(resourceKey, options);
  }

  /**
   * Pops when the request's turn comes. A pop that finds the stack empty
   * resolves without effect.
   */
  public pop(options: QueuedPopOptions = {}): Promise<void> {
    if (this.disposed) {
      return Promise.reject(
        new PreconditionViolationError('NavigationRequestQueue: queue is disposed')
      );
    }

    return new Promise<void>((resolve, reject) => {
      this.log('enqueue pop', options.count ?? 1);
      this.popChannel.write({ options, resolve, reject });
    });
  }

  /**
   * Stops both consumers. The running request is cancelled and requests not
   * yet started reject with `TransitionCancelledError`. The stack itself is
   * left to its owner.
   */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.log('dispose', { pending: this.pendingCount });

    const reason = new TransitionCancelledError(
      'NavigationRequestQueue: disposed'
    );
    for (const request of this.pushChannel.complete()) request.reject(reason);
    for (const request of this.popChannel.complete()) request.reject(reason);
    this.lifetime.abort(reason);
  }

  private async consume<T>(
    channel: AsyncQueue<T>,
    serve: (request: T) => Promise<void>
  ): Promise<void> {
    for await (const request of channel) {
      await serve(request);
    }
  }

  private async servePush(request: PushRequest<TPage>): Promise<void> {
    const operation = linkSignals(this.lifetime.signal, request.options.signal);
    try {
      const result = await this.stack.push(request.resourceKey, {
        ...request.options,
        signal: operation.signal,
      });
      request.resolve(result);
    } catch (error) {
      this.log('push failed', { resourceKey: request.resourceKey, error });
      request.reject(error);
    } finally {
      operation.dispose();
    }
  }

  private async servePop(request: PopRequest): Promise<void> {
    const operation = linkSignals(this.lifetime.signal, request.options.signal);
    try {
      await this.stack.pop({
        ...request.options,
        skipWhenEmpty: true,
        signal: operation.signal,
      });
      request.resolve();
    } catch (error) {
      this.log('pop failed', { error });
      request.reject(error);
    } finally {
      operation.dispose();
    }
  }
}
