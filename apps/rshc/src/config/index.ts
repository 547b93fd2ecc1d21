import { getConfigFromCli } from "./arg-parser.js";
import type { RshcConfig } from "./types.js";

let config: RshcConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
