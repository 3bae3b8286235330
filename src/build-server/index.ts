export {
  type BuildDetails,
  type BuildServer,
  type BuildServerDeps,
  type BuildServiceClient,
  type CoverageDescriptor,
  createBuildServer,
} from "./build-server.js";
export { type AzureDevOpsClientOptions, createAzureDevOpsClient } from "./azure-devops.js";
export {
  BuildSummaryLogger,
  type BuildSummaryDeps,
  SUMMARY_SECTION_HEADER,
  SUMMARY_SECTION_NAME,
  formatMessage,
} from "./build-summary-logger.js";
export { parseBuildId } from "./build-uri.js";
export {
  type CoverageUrlOptions,
  DEFAULT_COVERAGE_INTERVAL_MS,
  DEFAULT_COVERAGE_TIMEOUT_MS,
  buildCoverageUrl,
  escapeDataString,
  getCoverageReportUrls,
} from "./coverage-url-provider.js";
