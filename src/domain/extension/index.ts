/**
 * @extensor/core - Extension Module
 *
 * Service contracts, the `@Extensible` marker and the class map model
 */

export {
  Extensible,
  getExtensibleMetadata,
  EXTENSIBLE_METADATA_KEY,
} from './Extensible';

export { extendsServiceType } from './types';

export type { ExtensibleOptions } from './Extensible';

export type {
  ServiceType,
  ImplementationType,
  ExtensibleMetadata,
  ClassMap,
} from './types';
