/**
 * Barrel exports for the config-accessor module.
 */

export {
  createConfigAccessor,
  ConfigAccessorImpl,
  ConfigAccessorOptionsSchema,
} from './config-accessor-impl.js'
export type { ConfigAccessor, ConfigAccessorOptions, GetOptions } from './config-accessor.js'
