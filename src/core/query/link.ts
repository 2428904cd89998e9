import { DefinitionException } from '../exceptions/custom-exceptions';
import type { Model } from '../model/model';
import type { Property } from '../property/property';

/**
 * A parent/child key pairing correlating two models in one query.
 * `parentKey[i]` joins `childKey[i]`.
 */
export class Link {
  constructor(
    readonly name: string,
    readonly parentModel: Model,
    readonly childModel: Model,
    readonly parentKey: readonly Property[],
    readonly childKey: readonly Property[],
  ) {
    if (parentKey.length === 0 || parentKey.length !== childKey.length) {
      throw new DefinitionException(
        `Link ${name} needs parent and child keys of equal, non-zero length`,
        { parentKey: parentKey.length, childKey: childKey.length },
      );
    }
  }

  /** Links `child` to `parent` through `child.<foreignKeys>` = `parent.key`. */
  static manyToOne(name: string, child: Model, parent: Model, ...foreignKeys: string[]): Link {
    return new Link(
      name,
      parent,
      child,
      parent.key(),
      foreignKeys.map((field) => child.propertyNamed(field)),
    );
  }
}
