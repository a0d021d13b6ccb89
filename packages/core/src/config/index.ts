/**
 * Configuration module exports
 */

export {
  loadRunConfig,
  DEFAULT_PAGES_FILE,
  type RunConfig,
  type RunConfigOverrides,
} from './run.js';
