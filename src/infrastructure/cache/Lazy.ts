/**
 * @extensor/core - Lazy Value
 *
 * Single-slot cache computed at most once. The slot moves through
 * Empty → Computing → Ready; a failed computation moves it back to Empty
 * so the next caller computes again.
 */

import { ReentrantComputationError } from '../../domain/exceptions';

/**
 * Lifecycle states of a lazy slot
 */
export enum LazyState {
  Empty = 'empty',
  Computing = 'computing',
  Ready = 'ready',
}

type LazySlot<T> =
  | { readonly state: LazyState.Empty }
  | { readonly state: LazyState.Computing }
  | { readonly state: LazyState.Ready; readonly value: T };

/**
 * Lazy - at-most-once computed value
 *
 * @template T - Value type
 *
 * @example
 * ```typescript
 * const config = new Lazy<Config>('config');
 *
 * config.peek();                          // undefined, nothing computed
 * config.getOrCompute(() => readConfig()); // computes
 * config.getOrCompute(() => readConfig()); // cached, factory not called
 * ```
 */
export class Lazy<T> {
  private slot: LazySlot<T> = { state: LazyState.Empty };

  constructor(private readonly label: string = 'lazy value') {}

  /**
   * Current lifecycle state
   */
  get state(): LazyState {
    return this.slot.state;
  }

  /**
   * Whether the value has been computed
   */
  get isReady(): boolean {
    return this.slot.state === LazyState.Ready;
  }

  /**
   * Get the value without computing it
   */
  peek(): T | undefined {
    const current = this.slot;
    return current.state === LazyState.Ready ? current.value : undefined;
  }

  /**
   * Get the value, computing it with `factory` on first use.
   *
   * @throws ReentrantComputationError if called from inside its own factory
   */
  getOrCompute(factory: () => T): T {
    const current = this.slot;
    if (current.state === LazyState.Ready) {
      return current.value;
    }
    if (current.state === LazyState.Computing) {
      throw new ReentrantComputationError(this.label);
    }

    this.slot = { state: LazyState.Computing };
    try {
      const value = factory();
      this.slot = { state: LazyState.Ready, value };
      return value;
    } catch (error) {
      this.slot = { state: LazyState.Empty };
      throw error;
    }
  }
}
