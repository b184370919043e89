import { PreconditionViolationError } from '../errors';

/**
 * A page class that names the asset it is built from:
 *
 * ```ts
 * class SettingsPage extends SurfacePage {
 *   static resourceKey = 'pages/settings';
 * }
 * ```
 */
export type PageType = {
  readonly name: string;
  readonly resourceKey?: string;
};

export function resourceKeyOf(type: PageType): string {
  if (type.resourceKey === undefined) {
    throw new PreconditionViolationError(
      `The type ${type.name} does not define a resourceKey.`
    );
  }
  if (type.resourceKey.trim() === '') {
    throw new PreconditionViolationError(
      `The resourceKey for type ${type.name} is empty.`
    );
  }
  return type.resourceKey;
}
