import { createManualTicker } from '../animation/FrameTicker';
import { TransitionAnimationProvider } from '../animation/TransitionAnimationProvider';
import { TransitionAnimations } from '../animation/TransitionAnimations';
import { MemorySurface } from '../surface/MemorySurface';
import { RecordingSurface } from './fixtures';

describe('TransitionAnimations', () => {
  test('fadeIn steps opacity up once per frame and ends opaque', async () => {
    const ticker = createManualTicker({ frameMs: 25, auto: true });
    const surface = new RecordingSurface();

    await TransitionAnimations.fadeIn(100, ticker).play(surface);

    expect(surface.opacities).toEqual([0.25, 0.5, 0.75, 1, 1]);
    expect(ticker.now()).toBe(100);
  });

  test('fadeOut ends fully transparent', async () => {
    const ticker = createManualTicker({ frameMs: 25, auto: true });
    const surface = new RecordingSurface();

    await TransitionAnimations.fadeOut(100, ticker).play(surface);

    expect(surface.opacities).toEqual([0.75, 0.5, 0.25, 0, 0]);
  });

  test('fade clamps its endpoints to [0, 1]', async () => {
    const ticker = createManualTicker({ frameMs: 50, auto: true });
    const surface = new RecordingSurface();

    await TransitionAnimations.fade(-1, 2, 100, ticker).play(surface);

    expect(surface.opacities).toEqual([0.5, 1, 1]);
  });

  test('slide moves in parent-size units and lands on the target', async () => {
    const ticker = createManualTicker({ frameMs: 50, auto: true });
    const root = new MemorySurface('root', { width: 400, height: 800 });
    const surface = new RecordingSurface(root);

    await TransitionAnimations.slideFromLeftToCenter(100, ticker).play(surface);

    expect(surface.offsets).toEqual([
      { x: -200, y: 0 },
      { x: 0, y: 0 },
      { x: 0, y: 0 },
    ]);
  });

  test('slideFromCenterToRight ends one parent width to the right', async () => {
    const ticker = createManualTicker({ frameMs: 100, auto: true });
    const root = new MemorySurface('root', { width: 400, height: 800 });
    const surface = new RecordingSurface(root);

    await TransitionAnimations.slideFromCenterToRight(100, ticker).play(
      surface
    );

    expect(surface.offset).toEqual({ x: 400, y: 0 });
  });

  test('wait holds until its duration has passed', async () => {
    const ticker = createManualTicker({ frameMs: 50 });
    let done = false;

    const playing = TransitionAnimations.wait(100, ticker)
      .play(new RecordingSurface())
      .then(() => {
        done = true;
      });

    await ticker.tick();
    expect(done).toBe(false);

    await ticker.tick();
    await playing;
    expect(done).toBe(true);
  });

  test('an aborted animation stops at the current frame', async () => {
    const ticker = createManualTicker({ frameMs: 50 });
    const surface = new RecordingSurface();
    const controller = new AbortController();

    const playing = TransitionAnimations.fadeIn(200, ticker).play(
      surface,
      controller.signal
    );
    await ticker.tick();
    controller.abort(new Error('stopped'));

    await expect(playing).rejects.toThrow('stopped');
    expect(surface.opacities).toEqual([0.25]);
    expect(ticker.pendingCount()).toBe(0);
  });

  test('nop completes without touching the surface', async () => {
    const surface = new RecordingSurface();

    await TransitionAnimations.nop.play();

    expect(surface.opacities).toEqual([]);
    expect(surface.offsets).toEqual([]);
  });
});

describe('TransitionAnimationProvider', () => {
  test('picks the animation by direction and role', () => {
    const pushEnter = TransitionAnimations.fadeIn(100);
    const popExit = TransitionAnimations.fadeOut(100);
    const provider = new TransitionAnimationProvider({ pushEnter, popExit });

    expect(provider.get(true, true)).toBe(pushEnter);
    expect(provider.get(false, false)).toBe(popExit);
    expect(provider.get(true, false)).toBe(TransitionAnimations.nop);
    expect(provider.get(false, true)).toBe(TransitionAnimations.nop);
  });
});
