import type { Page } from '../Page/Page';
import type { PageRecord } from '../PageRecord';
import { playTogether, type TransitionTask } from './playTogether';

export class PopTransitionPlan<TPage extends Page = Page, TAsset = unknown> {
  /** Top of the stack first. */
  public readonly exitingRecords: readonly PageRecord<TPage, TAsset>[];
  public readonly enteringRecord: PageRecord<TPage, TAsset> | undefined;

  private constructor(
    exitingRecords: readonly PageRecord<TPage, TAsset>[],
    enteringRecord: PageRecord<TPage, TAsset> | undefined
  ) {
    this.exitingRecords = exitingRecords;
    this.enteringRecord = enteringRecord;
  }

  /**
   * `popCount` must already be validated against `records.length`.
   */
  public static create<TPage extends Page, TAsset>(
    records: readonly PageRecord<TPage, TAsset>[],
    popCount: number
  ): PopTransitionPlan<TPage, TAsset> {
    const exiting: PageRecord<TPage, TAsset>[] = [];
    for (let i = records.length - 1; i >= records.length - popCount; i--) {
      const record = records[i];
      if (record) exiting.push(record);
    }

    const enterIndex = records.length - popCount - 1;
    const entering = enterIndex >= 0 ? records[enterIndex] : undefined;

    return new PopTransitionPlan(exiting, entering);
  }

  /**
   * Only the top page plays its exit animation; the pages under it are
   * hidden without one, at the same time.
   */
  public async run(playAnimation: boolean, signal?: AbortSignal) {
    const exitPages = this.exitingRecords.map((record) => record.page);
    const enterPage = this.enteringRecord?.page;

    for (const page of exitPages) page.beforeExit();
    enterPage?.beforeEnter();

    const tasks: TransitionTask[] = exitPages.map(
      (page, index) => (s) => page.exit(false, index === 0 && playAnimation, s)
    );
    if (enterPage) {
      tasks.push((s) => enterPage.enter(false, playAnimation, s));
    }
    await playTogether(tasks, signal);

    for (const page of exitPages) page.afterExit();
  }
}
