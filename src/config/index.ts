export type { BranchworkConfig } from "./loadConfig";
export {
  defaultConfig,
  defaultConfigFileName,
  loadConfig,
  parseConfig,
} from "./loadConfig";
