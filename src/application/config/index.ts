export {
  loadRegistryConfig,
  createRegistryFromConfig,
  RegistryEnvSchema,
} from './RegistryConfig';

export type { RegistryConfig } from './RegistryConfig';
