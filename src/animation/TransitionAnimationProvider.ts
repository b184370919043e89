import { TransitionAnimations, type TransitionAnimation } from './TransitionAnimations';

export type TransitionAnimationSet = {
  pushEnter: TransitionAnimation;
  pushExit: TransitionAnimation;
  popEnter: TransitionAnimation;
  popExit: TransitionAnimation;
};

/**
 * Animations used by the pages of one stack, keyed by direction and role.
 * Every slot defaults to `TransitionAnimations.nop`.
 */
export class TransitionAnimationProvider {
  public pushEnter: TransitionAnimation;
  public pushExit: TransitionAnimation;
  public popEnter: TransitionAnimation;
  public popExit: TransitionAnimation;

  constructor(animations: Partial<TransitionAnimationSet> = {}) {
    this.pushEnter = animations.pushEnter ?? TransitionAnimations.nop;
    this.pushExit = animations.pushExit ?? TransitionAnimations.nop;
    this.popEnter = animations.popEnter ?? TransitionAnimations.nop;
    this.popExit = animations.popExit ?? TransitionAnimations.nop;
  }

  public get(isPush: boolean, isEnter: boolean): TransitionAnimation {
    if (isPush) {
      return isEnter ? this.pushEnter : this.pushExit;
    }
    return isEnter ? this.popEnter : this.popExit;
  }
}
