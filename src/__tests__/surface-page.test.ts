import { TransitionAnimationProvider } from '../animation/TransitionAnimationProvider';
import type { TransitionAnimation } from '../animation/TransitionAnimations';
import { resourceKeyOf } from '../Page/resourceKey';
import { SurfacePage } from '../Page/SurfacePage';
import { PreconditionViolationError } from '../errors';
import { MemorySurface } from '../surface/MemorySurface';

function recording(name: string, played: string[]): TransitionAnimation {
  return {
    play: async () => {
      played.push(name);
    },
  };
}

describe('SurfacePage', () => {
  test('walks its surface through a push and a pop', async () => {
    const played: string[] = [];
    const root = new MemorySurface('root', { width: 100, height: 100 });
    const surface = new MemorySurface('page');
    const page = new SurfacePage(surface, {
      animations: new TransitionAnimationProvider({
        pushEnter: recording('pushEnter', played),
        popExit: recording('popExit', played),
      }),
      renderingOrder: 2,
    });

    page.afterLoad(root);
    expect(root.children).toEqual([surface]);
    expect(surface.opacity).toBe(0);

    page.beforeEnter();
    await page.enter(true, true);
    expect(played).toEqual(['pushEnter']);
    expect(surface.opacity).toBe(1);
    expect(surface.offset).toEqual({ x: 0, y: 0 });

    await page.enter(true, false);
    expect(played).toEqual(['pushEnter']);

    page.beforeExit();
    await page.exit(false, true);
    page.afterExit();
    expect(played).toEqual(['pushEnter', 'popExit']);
    expect(surface.opacity).toBe(0);
    expect(surface.active).toBe(false);
  });

  test('destroy detaches from the parent once', () => {
    const root = new MemorySurface('root');
    const surface = new MemorySurface('page');
    const page = new SurfacePage(surface, {
      animations: new TransitionAnimationProvider(),
      renderingOrder: 3,
    });
    page.afterLoad(root);

    page.destroy();
    page.destroy();

    expect(page.renderingOrder).toBe(3);
    expect(page.destroyed).toBe(true);
    expect(root.children).toEqual([]);
    expect(surface.parent).toBeNull();
  });
});

describe('resourceKeyOf', () => {
  test('reads the static resourceKey of a page class', () => {
    class ProfilePage extends SurfacePage {
      static resourceKey = 'pages/profile';
    }

    expect(resourceKeyOf(ProfilePage)).toBe('pages/profile');
  });

  test('rejects a class without a key or with a blank one', () => {
    class BlankPage extends SurfacePage {
      static resourceKey = '  ';
    }

    expect(() => resourceKeyOf(SurfacePage)).toThrow(
      PreconditionViolationError
    );
    expect(() => resourceKeyOf(BlankPage)).toThrow(
      'The resourceKey for type BlankPage is empty.'
    );
  });
});
