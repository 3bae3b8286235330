/**
 * scanprep version, read from package.json. Used in `--version` output
 * and the downloader's default User-Agent.
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export const VERSION: string = pkg.version;
