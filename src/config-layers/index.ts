/**
 * Config layer module
 */

export type { GlobalConfig, ServiceOverride } from "./reader";
export { readGlobal, readOverride, readProjectName } from "./reader";
export {
  globalConfigPath,
  serviceDirectory,
  overridePath,
  stackFilePath,
  projectFilePath,
} from "./paths";
