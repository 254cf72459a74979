/**
 * @worklog/core
 *
 * Work session timer, JSON record store, record editing and
 * date-range export for worklog.
 */

export * from "./types/index.js";
export * from "./errors.js";
export * from "./timer/index.js";
export * from "./store/index.js";
export * from "./editor/index.js";
export * from "./export/index.js";
export * from "./utils/index.js";
export {
  loadConfig,
  getDefaultDataDir,
  getDefaultDataPath,
  DEFAULT_TICK_MS,
  type Config,
} from "./config.js";
export * from "./logger.js";
