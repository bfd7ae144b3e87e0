/**
 * @extensor/core - Descriptor Module
 *
 * Descriptor parsing, resource location and scanning
 */

export { parseDescriptor } from './DescriptorParser';
export {
  FileSystemResourceLocator,
  InMemoryResourceLocator,
  discoverPackageRoots,
} from './ResourceLocator';
export { DescriptorScanner, DEFAULT_DESCRIPTOR_DIRECTORY } from './DescriptorScanner';

export type { DescriptorEntry, MalformedLine, ParsedDescriptor } from './DescriptorParser';
export type { DescriptorResource, IResourceLocator } from './ResourceLocator';
export type { DescriptorScannerOptions } from './DescriptorScanner';
