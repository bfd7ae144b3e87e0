/**
 * @fileoverview Resource Locators
 *
 * @packageDocumentation
 * @module @extensor/core/infrastructure/descriptors
 *
 * A resource locator answers "which resources exist at this relative
 * path?" across every resource root the program can see. Several roots
 * may contribute a descriptor for the same service type; the scanner
 * merges them.
 *
 * ```
 * <app>/extensions/Language                         ← root 1
 * <app>/node_modules/lang-pack/extensions/Language  ← root 2
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * One located resource
 */
export interface DescriptorResource {
  /** Human-readable location, used in logs */
  readonly location: string;

  /** Read the resource as UTF-8 text */
  read(): string;
}

/**
 * IResourceLocator - finds resources by relative path
 *
 * @remarks
 * Implementations may throw while enumerating; the scanner logs the
 * failure and carries on with other contributors.
 */
export interface IResourceLocator {
  findResources(resourcePath: string): DescriptorResource[];
}

// ==================== File System ====================

/**
 * Looks for `<root>/<resourcePath>` in each configured root directory.
 * A root that cannot be inspected still yields a resource, whose `read()`
 * rethrows the failure, so the other roots are unaffected.
 */
export class FileSystemResourceLocator implements IResourceLocator {
  readonly roots: readonly string[];

  constructor(roots: readonly string[]) {
    this.roots = roots.map((root) => path.resolve(root));
  }

  findResources(resourcePath: string): DescriptorResource[] {
    const resources: DescriptorResource[] = [];

    for (const root of this.roots) {
      const file = path.join(root, resourcePath);

      let found: boolean;
      try {
        found = isFile(file);
      } catch (error) {
        resources.push({
          location: file,
          read: () => {
            throw error;
          },
        });
        continue;
      }
      if (!found) continue;

      resources.push({
        location: file,
        read: () => fs.readFileSync(file, 'utf8'),
      });
    }

    return resources;
  }
}

function isFile(file: string): boolean {
  const stats = fs.statSync(file, { throwIfNoEntry: false });
  return stats !== undefined && stats.isFile();
}

/**
 * `baseDir` followed by every package directory under
 * `baseDir/node_modules`, scoped packages included.
 */
export function discoverPackageRoots(baseDir: string): string[] {
  const roots = [path.resolve(baseDir)];
  const modulesDir = path.join(roots[0], 'node_modules');
  if (!fs.existsSync(modulesDir)) return roots;

  for (const entry of fs.readdirSync(modulesDir, { withFileTypes: true })) {
    if (!entry.isDirectory() || entry.name.startsWith('.')) continue;

    const entryDir = path.join(modulesDir, entry.name);
    if (!entry.name.startsWith('@')) {
      roots.push(entryDir);
      continue;
    }

    for (const scoped of fs.readdirSync(entryDir, { withFileTypes: true })) {
      if (scoped.isDirectory()) {
        roots.push(path.join(entryDir, scoped.name));
      }
    }
  }

  return roots;
}

// ==================== In Memory ====================

/**
 * Descriptors held as strings, keyed by resource path. Useful for
 * bundled programs that ship without a file system layout.
 *
 * @example
 * ```typescript
 * const locator = new InMemoryResourceLocator()
 *   .add('extensions/Language', 'python=langs.PythonLanguage');
 * ```
 */
export class InMemoryResourceLocator implements IResourceLocator {
  private readonly resources = new Map<string, string[]>();

  /**
   * Add one contributor for `resourcePath`
   */
  add(resourcePath: string, content: string): this {
    const contents = this.resources.get(resourcePath) ?? [];
    contents.push(content);
    this.resources.set(resourcePath, contents);
    return this;
  }

  findResources(resourcePath: string): DescriptorResource[] {
    const contents = this.resources.get(resourcePath) ?? [];
    return contents.map((content, index) => ({
      location: `memory:${resourcePath}#${index}`,
      read: () => content,
    }));
  }
}
