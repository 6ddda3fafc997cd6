export { FocusRing } from './state/FocusRing.js';
export { SelectRing } from './state/SelectRing.js';
export { MultiSelectRing } from './state/MultiSelectRing.js';
export { ZipperRing } from './state/ZipperRing.js';
export type { Predicate } from './core/ringIndex.js';
export {
  applyConfig,
  CONFIG_PATH,
  DEBUG_ENV_VAR,
  isTruthyFlag,
  loadConfig,
  type Config,
  type LoadConfigOptions,
} from './config.js';
export { isDebugEnabled, setDebug } from './utils/logger.js';
