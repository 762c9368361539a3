import type { ContextResolver, Entity, EntityLiveness } from './types.ts';

export const UNKNOWN_CONTEXT = 'UnknownContext';

/**
 * Names a caller by its own name, or `Owner.Part` when it is a part of a
 * named owner. A missing caller or an empty name yields `UnknownContext`.
 */
export class EntityContextResolver implements ContextResolver {
  resolve(caller?: Entity | null): string {
    if (!caller) return UNKNOWN_CONTEXT;

    const owner = caller.owner;
    const name = owner && owner.name
      ? `${owner.name}.${caller.name}`
      : caller.name;

    return name ? name : UNKNOWN_CONTEXT;
  }
}

/**
 * Liveness for hosts without an object model: ask the entity when it can
 * answer, otherwise presence means alive.
 */
export const presenceLiveness: EntityLiveness = {
  isAlive(entity: Entity): boolean {
    return entity.isAlive ? entity.isAlive() : true;
  },
};
