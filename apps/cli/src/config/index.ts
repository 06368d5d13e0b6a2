import { getConfigFromCli } from "./arg-parser.js";
import type { ImportkitConfig } from "./types.js";

let config: ImportkitConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
