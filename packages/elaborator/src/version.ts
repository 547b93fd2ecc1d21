import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

/** `major.minor` of this package; source files must declare it in their header. */
export const compatibleVersion = (full: string = version): string =>
  full.split(".").slice(0, 2).join(".");

export const versionHeader = `reach ${compatibleVersion()}`;

export { version };
