/**
 * @fileoverview Unit tests for ExtensionRegistry
 *
 * Service type validation, one director per type, and the shared
 * instance table spanning service types.
 */

import {
  Extensible,
  ExtensionRegistry,
  InMemoryResourceLocator,
  InvalidServiceTypeError,
  TypeCatalog,
  getDefaultRegistry,
  getExtensionDirector,
  setDefaultRegistry,
} from '../../../src';
import { createCapturingLogger } from '../../helpers/logger';

@Extensible()
abstract class Storage {
  abstract kind(): string;
}

@Extensible()
abstract class Cache extends Storage {}

abstract class Unmarked {}

class MemoryStorage extends Cache {
  kind(): string {
    return 'memory';
  }
}

class DiskStorage extends Storage {
  kind(): string {
    return 'disk';
  }
}

describe('ExtensionRegistry', () => {
  let registry: ExtensionRegistry;

  beforeEach(() => {
    const catalog = new TypeCatalog().registerAll({
      'storage.Memory': MemoryStorage,
      'storage.Disk': DiskStorage,
    });
    const locator = new InMemoryResourceLocator()
      .add('extensions/Storage', 'memory=storage.Memory\ndisk=storage.Disk')
      .add('extensions/Cache', 'memory=storage.Memory\nlocal=storage.Memory');
    registry = new ExtensionRegistry({
      locator,
      catalog,
      logger: createCapturingLogger().logger,
    });
  });

  describe('getOrCreateDirector', () => {
    it('should return one director per service type', () => {
      const first = registry.getOrCreateDirector(Storage);
      const second = registry.getOrCreateDirector(Storage);

      expect(second).toBe(first);
      expect(first.serviceType).toBe(Storage);
      expect(first.qualifiedName).toBe('Storage');
      expect(registry.listServiceTypes()).toEqual([Storage]);
    });

    it('should keep separate directors for a contract and its sub-contract', () => {
      expect(registry.getOrCreateDirector(Cache)).not.toBe(registry.getOrCreateDirector(Storage));
    });

    it.each([[null], [undefined]])('should reject %p', (type) => {
      expect(() => registry.getOrCreateDirector(type)).toThrowErrorType(InvalidServiceTypeError);
    });

    it('should reject a class without its own @Extensible marker', () => {
      expect(() => registry.getOrCreateDirector(Unmarked)).toThrow(
        'extension type (Unmarked) is not extensible, because it is NOT decorated with @Extensible',
      );
    });

    it('should reject a concrete implementation', () => {
      expect(() => registry.getOrCreateDirector(MemoryStorage)).toThrowErrorType(
        InvalidServiceTypeError,
      );
      expect(() => registry.getOrCreateDirector(DiskStorage)).toThrow(
        'extension type (DiskStorage) is a concrete implementation, not a service contract',
      );
    });
  });

  describe('implementations registered late', () => {
    @Extensible()
    class Plugin {}

    it('should reject the type when its class map is computed', () => {
      const director = registry.getOrCreateDirector(Plugin);
      registry.catalog.register('plugins.Late', Plugin);

      expect(() => director.listSupported()).toThrow(
        'extension type (Plugin) is a concrete implementation, not a service contract',
      );
      expect(() => director.resolve('late')).toThrowErrorType(InvalidServiceTypeError);
    });
  });

  describe('shared instances', () => {
    it('should share one instance of a class across service types', () => {
      const fromStorage = registry.getOrCreateDirector(Storage).resolve('memory');
      const fromCache = registry.getOrCreateDirector(Cache).resolve('local');

      expect(fromCache).toBe(fromStorage);
      expect(registry.sharedInstances.size).toBe(1);
    });

    it('should not share instances between registries', () => {
      const other = new ExtensionRegistry({
        locator: new InMemoryResourceLocator().add('extensions/Storage', 'disk=storage.Disk'),
        catalog: registry.catalog,
        logger: createCapturingLogger().logger,
      });

      expect(other.getOrCreateDirector(Storage).resolve('disk')).not.toBe(
        registry.getOrCreateDirector(Storage).resolve('disk'),
      );
    });
  });

  describe('default registry', () => {
    it('should create the default registry lazily and reuse it', () => {
      expect(getDefaultRegistry()).toBe(getDefaultRegistry());
    });

    it('should resolve directors through a replaced default registry', () => {
      setDefaultRegistry(registry);

      expect(getExtensionDirector(Storage)).toBe(registry.getOrCreateDirector(Storage));
      expect(getExtensionDirector(Storage).resolve('disk').kind()).toBe('disk');
    });
  });
});
