export { MAX_INTERVAL_MS, type Probe, type RetryOptions, retry } from "./retry.js";
