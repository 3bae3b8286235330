export { type Logger, type LoggerOptions, createLogger, orderedJsonFormat } from "./logger.js";
