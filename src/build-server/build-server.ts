/**
 * Build-server capability.
 *
 * The rest of scanprep talks to the build server through `BuildServer`
 * only. `BuildServiceClient` is the seam where a concrete REST client
 * plugs in (see azure-devops.ts); tests substitute a stub.
 */

import { BuildSummaryLogger, type BuildSummaryDeps } from "./build-summary-logger.js";
import { getCoverageReportUrls, type CoverageUrlOptions } from "./coverage-url-provider.js";

/**
 * The build as the build server reports it.
 */
export interface BuildDetails {
  readonly buildNumber: string;
  readonly teamProject: string;
  /** Build URI in `vstfs:///Build/Build/<id>` form. */
  readonly buildUri: string;
  /** Collection root, e.g. `https://tfs.example.test/tfs/DefaultCollection`. */
  readonly collectionUri: string;
}

/**
 * One coverage configuration recorded for a build.
 */
export interface CoverageDescriptor {
  readonly id: string;
  readonly buildFlavor: string;
  readonly buildPlatform: string;
}

export interface BuildServiceClient {
  getBuildDetails(buildUri: string): Promise<BuildDetails>;
  /** Returns an empty list while the server has not finished processing coverage. */
  queryBuildCoverage(build: BuildDetails): Promise<readonly CoverageDescriptor[]>;
}

export interface BuildServer {
  getCoverageReportUrls(buildUri: string): Promise<readonly string[]>;
  publishSummary(buildUri: string, message: string): Promise<void>;
}

export interface BuildServerDeps {
  readonly client: BuildServiceClient;
  readonly coverage: CoverageUrlOptions;
  readonly summary: BuildSummaryDeps;
}

export function createBuildServer(deps: BuildServerDeps): BuildServer {
  return {
    getCoverageReportUrls(buildUri: string): Promise<readonly string[]> {
      return getCoverageReportUrls(deps.client, buildUri, deps.coverage);
    },

    async publishSummary(buildUri: string, message: string): Promise<void> {
      const summary = new BuildSummaryLogger(buildUri, deps.summary);
      summary.writeMessage(message);
      await summary.dispose();
    },
  };
}
