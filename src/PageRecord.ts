import type { AssetHandle } from './AssetHandle';
import type { Page } from './Page/Page';
import type { PageHistoryEntry, PageStackInfo } from './types';

/**
 * A resident stack entry. The record owns its page instance; it owns its
 * asset handle only when the handle was not preloaded.
 */
export class PageRecord<TPage extends Page = Page, TAsset = unknown> {
  public readonly resourceKey: string;
  public readonly pageId: string;
  public readonly page: TPage;
  public readonly assetHandle: AssetHandle<TAsset>;
  public readonly preloaded: boolean;

  private isStacked: boolean;
  private disposed = false;

  constructor(init: {
    resourceKey: string;
    pageId: string;
    page: TPage;
    stacked: boolean;
    assetHandle: AssetHandle<TAsset>;
    preloaded: boolean;
  }) {
    this.resourceKey = init.resourceKey;
    this.pageId = init.pageId;
    this.page = init.page;
    this.isStacked = init.stacked;
    this.assetHandle = init.assetHandle;
    this.preloaded = init.preloaded;
  }

  /** Whether the record stays resident when a later push covers it. */
  public get stacked(): boolean {
    return this.isStacked;
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  public markStacked(): void {
    this.isStacked = true;
  }

  public toStackInfo(): PageStackInfo {
    return {
      resourceKey: this.resourceKey,
      pageId: this.pageId,
      stacked: this.isStacked,
    };
  }

  public toHistoryEntry(): PageHistoryEntry<TPage> {
    return {
      resourceKey: this.resourceKey,
      pageId: this.pageId,
      page: this.page,
    };
  }

  /**
   * Destroys the page and frees the asset unless it was preloaded. Runs at
   * most once.
   */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    try {
      this.page.destroy();
    } finally {
      if (!this.preloaded) {
        this.assetHandle.release();
      }
    }
  }
}
