/**
 * @extensor/core - Registry Configuration
 *
 * Environment-driven configuration of the default registry:
 *
 * | Variable                     | Default       |
 * |------------------------------|---------------|
 * | `EXTENSOR_ROOTS`             | cwd           |
 * | `EXTENSOR_DIRECTORY`         | `extensions/` |
 * | `EXTENSOR_SCAN_NODE_MODULES` | `false`       |
 * | `LOG_LEVEL`                  | `info`        |
 */

import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../../domain/exceptions';
import { DEFAULT_DESCRIPTOR_DIRECTORY } from '../../infrastructure/descriptors/DescriptorScanner';
import {
  FileSystemResourceLocator,
  discoverPackageRoots,
} from '../../infrastructure/descriptors/ResourceLocator';
import { createLogger } from '../../infrastructure/logging/logger';
import { TypeCatalog, defaultTypeCatalog } from '../../infrastructure/types/TypeCatalog';
import { ExtensionRegistry } from '../registry/ExtensionRegistry';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const RegistryEnvSchema = z.object({
  EXTENSOR_ROOTS: z.string().trim().min(1).optional(),
  EXTENSOR_DIRECTORY: z.string().trim().min(1).default(DEFAULT_DESCRIPTOR_DIRECTORY),
  EXTENSOR_SCAN_NODE_MODULES: BooleanFlagSchema.default('false'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface RegistryConfig {
  /** Resource roots, absolute */
  roots: string[];
  /** Descriptor directory prefix */
  directory: string;
  /** Add every installed package under each root's node_modules */
  scanNodeModules: boolean;
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Read the registry configuration from environment variables.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadRegistryConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RegistryConfig {
  const parsed = RegistryEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid registry configuration: ${issues}`);
  }

  const { EXTENSOR_ROOTS, EXTENSOR_DIRECTORY, EXTENSOR_SCAN_NODE_MODULES, LOG_LEVEL } =
    parsed.data;

  const roots = EXTENSOR_ROOTS
    ? EXTENSOR_ROOTS.split(path.delimiter)
        .map((root) => root.trim())
        .filter((root) => root.length > 0)
        .map((root) => path.resolve(cwd, root))
    : [path.resolve(cwd)];

  return {
    roots,
    directory: EXTENSOR_DIRECTORY.endsWith('/') ? EXTENSOR_DIRECTORY : `${EXTENSOR_DIRECTORY}/`,
    scanNodeModules: EXTENSOR_SCAN_NODE_MODULES,
    logLevel: LOG_LEVEL,
  };
}

/**
 * Build a file-system backed registry from configuration
 */
export function createRegistryFromConfig(
  config: RegistryConfig,
  catalog: TypeCatalog = defaultTypeCatalog,
): ExtensionRegistry {
  const roots = config.scanNodeModules
    ? config.roots.flatMap((root) => discoverPackageRoots(root))
    : config.roots;

  return new ExtensionRegistry({
    locator: new FileSystemResourceLocator(roots),
    catalog,
    directory: config.directory,
    logger: createLogger({ level: config.logLevel }),
  });
}
