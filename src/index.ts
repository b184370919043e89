export { PageStack } from './PageStack';
export type { PageStackOptions, TransitionKind } from './PageStack';
export { NavigationRequestQueue } from './NavigationRequestQueue';
export type {
  NavigationRequestQueueOptions,
  QueuedPopOptions,
} from './NavigationRequestQueue';

export { AssetHandle } from './AssetHandle';
export type { AssetHandleState } from './AssetHandle';
export { PageRecord } from './PageRecord';
export { PushTransitionPlan } from './TransitionPlan/PushTransitionPlan';
export { PopTransitionPlan } from './TransitionPlan/PopTransitionPlan';
export { TransitionLock } from './TransitionLock';
export type { ReleaseLock } from './TransitionLock';
export { AsyncQueue } from './AsyncQueue';

export type { Page } from './Page/Page';
export { SurfacePage } from './Page/SurfacePage';
export type { SurfacePageOptions } from './Page/SurfacePage';
export { resourceKeyOf } from './Page/resourceKey';
export type { PageType } from './Page/resourceKey';
export { MemorySurface } from './surface/MemorySurface';

export {
  TransitionAnimations,
  NopTransitionAnimation,
  WaitTransitionAnimation,
  FadeTransitionAnimation,
  SlideTransitionAnimation,
} from './animation/TransitionAnimations';
export type { TransitionAnimation } from './animation/TransitionAnimations';
export { TransitionAnimationProvider } from './animation/TransitionAnimationProvider';
export type { TransitionAnimationSet } from './animation/TransitionAnimationProvider';
export { timerTicker, createManualTicker } from './animation/FrameTicker';
export type {
  FrameTicker,
  ManualTicker,
  ManualTickerOptions,
} from './animation/FrameTicker';

export {
  PageStackError,
  PreconditionViolationError,
  ResourceLoadError,
  DuplicatePreloadError,
  TransitionCancelledError,
  isTransitionCancelled,
} from './errors';

export type {
  AssetBackend,
  PageContext,
  PageFactory,
  PageHistoryEntry,
  PageStackInfo,
  PageStackState,
  PopOptions,
  PopToOptions,
  PushOptions,
  PushResult,
  Size,
  Vector2,
  VisualSurface,
  Listener,
} from './types';
