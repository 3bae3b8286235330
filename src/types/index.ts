export { type Result, ok, err } from "./result.js";
export { ValidationError, errorMessage } from "./errors.js";
export {
  type CoverageOutputFormat,
  type EnvConfig,
  type LogLevel,
  type ConfigError,
  loadEnvConfig,
} from "./config.js";
