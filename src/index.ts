/**
 * vector-sdk-config — robot connection profiles stored in the Vector SDK
 * configuration file.
 *
 * Re-exports all public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export {
  ConfigurationError,
  ConfigurationLoadError,
  ConfigurationValidationError,
  ConfigurationIOError,
  type ValidationIssue,
} from './errors.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export {
  type SdkConfigPathOptions,
  SDK_CONFIG_DIR_NAME,
  SDK_CONFIG_FILE_NAME,
  SDK_CONFIG_PATH_ENV,
  defaultSdkConfigPath,
  resolveSdkConfigPath,
} from './config.js';

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export { ObservableObject, type PropertyChangedListener } from './models/observable.js';
export { normalizeIpAddress } from './models/ip-address.js';
export {
  RobotConfiguration,
  type RemoteRobotConfiguration,
  type RobotConfigurationInit,
  type RobotConfigurationJSON,
  type RobotConfigurationProperty,
  isSafeNameSegment,
} from './models/robot-configuration.js';

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

export { type FileSystem, NodeFileSystem } from './storage/file-system.js';
export { MemoryFileSystem } from './storage/memory-file-system.js';
export { RobotConfigStore, type RobotConfigStoreOptions } from './storage/robot-config-store.js';
export { certificateFileName } from './storage/section-codec.js';
