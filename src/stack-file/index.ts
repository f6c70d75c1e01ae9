/**
 * Generated stack file module
 */

export type { PreservedSettings } from "./writer";
export {
  NO_PRESERVED_SETTINGS,
  buildStackFileHeader,
  isSecureValue,
  readPreservedSettings,
  renderStackFile,
  writeStackFile,
} from "./writer";
