/**
 * notekeep: tenant-scoped Markdown notes and images on disk.
 *
 * Library entry. Typical wiring:
 *
 *   const config = loadConfig();
 *   ensureDataDirs(config);
 *   installConsoleFileLogging(createAppLogger(config.data_dir, config.log.level));
 *   const stores = createStores(config);
 *   const tools = createTools(stores, tenantId);
 */

export * from "./store/index.js";
export { loadConfig, ensureDataDirs, resolveDataDir, type Config } from "./config.js";
export {
  createAppLogger,
  installConsoleFileLogging,
  formatLine,
  type AppLogger,
  type LogEntry,
  type LogLevel,
  type ConsoleLoggingOptions,
} from "./logger.js";
export { createStores, type Stores } from "./stores.js";
export { listNoteResources, readResource, type ResourceLink, type ResourceContents } from "./resources.js";
export { createTools } from "./tools/index.js";
export { createNoteTools } from "./tools/notes.js";
export { createAssetTools } from "./tools/assets.js";
export { createResourceTools } from "./tools/resources.js";
export { toolError, toolSuccess, errorMessage } from "./tools/result.js";
export { runCommand, parseArgs, USAGE, type CommandContext } from "./commands.js";
