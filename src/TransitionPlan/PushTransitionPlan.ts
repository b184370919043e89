import type { Page } from '../Page/Page';
import type { PageRecord } from '../PageRecord';
import { playTogether, type TransitionTask } from './playTogether';

export class PushTransitionPlan<TPage extends Page = Page, TAsset = unknown> {
  public readonly enteringRecord: PageRecord<TPage, TAsset>;
  public readonly exitingRecord: PageRecord<TPage, TAsset> | undefined;
  public readonly exitingIsRemoved: boolean;

  private constructor(
    enteringRecord: PageRecord<TPage, TAsset>,
    exitingRecord: PageRecord<TPage, TAsset> | undefined
  ) {
    this.enteringRecord = enteringRecord;
    this.exitingRecord = exitingRecord;
    this.exitingIsRemoved =
      exitingRecord !== undefined && !exitingRecord.stacked;
  }

  /**
   * The current tail exits. It is removed when it was pushed with
   * `stack: false`.
   */
  public static create<TPage extends Page, TAsset>(
    enteringRecord: PageRecord<TPage, TAsset>,
    records: readonly PageRecord<TPage, TAsset>[]
  ): PushTransitionPlan<TPage, TAsset> {
    return new PushTransitionPlan(enteringRecord, records[records.length - 1]);
  }

  public async run(playAnimation: boolean, signal?: AbortSignal) {
    const enterPage = this.enteringRecord.page;
    const exitPage = this.exitingRecord?.page;

    exitPage?.beforeExit();
    enterPage.beforeEnter();

    const tasks: TransitionTask[] = [
      (s) => enterPage.enter(true, playAnimation, s),
    ];
    if (exitPage) {
      tasks.unshift((s) => exitPage.exit(true, playAnimation, s));
    }
    await playTogether(tasks, signal);

    exitPage?.afterExit();
  }
}
