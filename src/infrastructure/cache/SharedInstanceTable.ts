/**
 * @extensor/core - Shared Instance Table
 *
 * Registry-wide implementation → instance map. Every name (under any
 * service type) bound to the same implementation receives the same
 * instance.
 */

import { ImplementationType } from '../../domain/extension';

export class SharedInstanceTable {
  private readonly instances = new Map<ImplementationType, unknown>();

  /**
   * Get the instance published for `type`
   */
  get(type: ImplementationType): unknown {
    return this.instances.get(type);
  }

  /**
   * Check if an instance of `type` has been published
   */
  has(type: ImplementationType): boolean {
    return this.instances.has(type);
  }

  /**
   * Return the published instance of `type`, creating and publishing one
   * if there is none.
   *
   * Insert-if-absent: when `create` itself ends up publishing an instance
   * of `type`, that instance wins and the candidate is dropped.
   */
  getOrCreate(type: ImplementationType, create: () => unknown): unknown {
    if (this.instances.has(type)) {
      return this.instances.get(type);
    }

    const candidate = create();
    if (!this.instances.has(type)) {
      this.instances.set(type, candidate);
    }
    return this.instances.get(type);
  }

  /**
   * Number of published instances
   */
  get size(): number {
    return this.instances.size;
  }
}
