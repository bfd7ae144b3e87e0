/**
 * @extensor/core - Cache Module
 *
 * At-most-once lazy values and the shared instance table
 */

export { Lazy, LazyState } from './Lazy';
export { SharedInstanceTable } from './SharedInstanceTable';
