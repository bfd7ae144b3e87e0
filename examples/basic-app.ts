/**
 * @extensor/core v1.0.0 - Basic Example
 *
 * Demonstrates the core concepts:
 * - An @Extensible service contract with a default implementation
 * - Implementations registered in a type catalog
 * - Discovery from examples/extensions/greeters.Greeter
 * - Singleton and shared instances, listing and defaults
 */

import 'reflect-metadata';
import {
  Extensible,
  ExtensionRegistry,
  FileSystemResourceLocator,
  Implementation,
  ServiceNotFoundError,
  TypeCatalog,
  createLogger,
} from '../src/index';

// ==================== Service Contract ====================

@Extensible({ name: 'greeters.Greeter', defaultName: 'english' })
abstract class Greeter {
  abstract greet(who: string): string;
}

// ==================== Implementations ====================

const catalog = new TypeCatalog();

@Implementation('greeters.EnglishGreeter', catalog)
class EnglishGreeter extends Greeter {
  greet(who: string): string {
    return `Hello, ${who}!`;
  }
}

@Implementation('greeters.FrenchGreeter', catalog)
class FrenchGreeter extends Greeter {
  greet(who: string): string {
    return `Bonjour, ${who} !`;
  }
}

// ==================== Main ====================

function main(): void {
  const registry = new ExtensionRegistry({
    locator: new FileSystemResourceLocator([__dirname]),
    catalog,
    logger: createLogger({ level: 'debug' }),
  });

  const greeters = registry.getOrCreateDirector(Greeter);

  console.log('Supported:', [...greeters.listSupported()].join(', '));
  console.log('Loaded before use:', [...greeters.listLoaded()].join(', ') || '(none)');

  console.log(greeters.resolve('french').greet('Ada'));
  console.log(greeters.resolveOrDefault('klingon')?.greet('Ada'));
  console.log('en and english share an instance:', greeters.resolve('en') === greeters.resolve('english'));

  try {
    greeters.resolve('klingon');
  } catch (error) {
    if (!(error instanceof ServiceNotFoundError)) throw error;
    console.log('Expected failure:', error.message);
  }

  console.log('Loaded after use:', [...greeters.listLoaded()].join(', '));
}

main();
