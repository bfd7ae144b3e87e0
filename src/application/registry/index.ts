/**
 * @extensor/core - Registry Module
 *
 * Per-service-type directors and the registry that owns them
 */

export { ExtensionDirector } from './ExtensionDirector';
export {
  ExtensionRegistry,
  getDefaultRegistry,
  setDefaultRegistry,
  getExtensionDirector,
} from './ExtensionRegistry';

export type { ExtensionDirectorContext } from './ExtensionDirector';
export type { ExtensionRegistryOptions } from './ExtensionRegistry';
