/**
 * Coverage report URL provider.
 *
 * Looks up the code-coverage configurations recorded for a build and
 * turns each into the URL the build server serves the `.coverage` file
 * from. Coverage data shows up some time after the test step finishes,
 * so the lookup polls with `retry` before giving up.
 */

import type { Logger } from "winston";
import { retry, type RetryOptions } from "../retry/retry.js";
import { ValidationError } from "../types/errors.js";
import type { BuildDetails, BuildServiceClient, CoverageDescriptor } from "./build-server.js";

export const DEFAULT_COVERAGE_TIMEOUT_MS = 20000;
export const DEFAULT_COVERAGE_INTERVAL_MS = 2000;

export interface CoverageUrlOptions extends Pick<RetryOptions, "sleepFn" | "nowFn" | "signal"> {
  readonly logger: Logger;
  readonly timeoutMs?: number | undefined;
  readonly intervalMs?: number | undefined;
}

/**
 * `encodeURIComponent` plus the RFC 3986 reserved characters it leaves
 * alone (`! ' ( ) *`).
 */
export function escapeDataString(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

function normalizeCollectionUri(collectionUri: string): string {
  return new URL(collectionUri).href.replace(/\/+$/, "");
}

export function buildCoverageUrl(build: BuildDetails, coverage: CoverageDescriptor): string {
  const serverPath =
    `/BuildCoverage/${build.buildNumber}.${coverage.buildFlavor}.${coverage.buildPlatform}.${coverage.id}.coverage`;

  return (
    `${normalizeCollectionUri(build.collectionUri)}/${escapeDataString(build.teamProject)}` +
    `/_api/_build/ItemContent?buildUri=${escapeDataString(build.buildUri)}` +
    `&path=${escapeDataString(serverPath)}`
  );
}

/**
 * Return the download URLs of every coverage report of the build, or an
 * empty list if none appeared within the timeout.
 */
export async function getCoverageReportUrls(
  client: BuildServiceClient,
  buildUri: string,
  options: CoverageUrlOptions,
): Promise<readonly string[]> {
  if (buildUri.trim().length === 0) {
    throw new ValidationError("buildUri must not be empty");
  }

  const logger = options.logger.child({ module: "CoverageReportUrlProvider" });

  logger.debug("Fetching build information...", { buildUri });
  const build = await client.getBuildDetails(buildUri);

  logger.debug("Fetching code coverage report information...", {
    teamProject: build.teamProject,
    buildNumber: build.buildNumber,
  });

  let coverages: readonly CoverageDescriptor[] = [];
  const found = await retry(
    options.timeoutMs ?? DEFAULT_COVERAGE_TIMEOUT_MS,
    options.intervalMs ?? DEFAULT_COVERAGE_INTERVAL_MS,
    async () => {
      coverages = await client.queryBuildCoverage(build);
      return coverages.length > 0;
    },
    {
      logger,
      ...(options.sleepFn !== undefined ? { sleepFn: options.sleepFn } : {}),
      ...(options.nowFn !== undefined ? { nowFn: options.nowFn } : {}),
      ...(options.signal !== undefined ? { signal: options.signal } : {}),
    },
  );

  if (!found) {
    logger.warn("No code coverage reports were found for the build", { buildUri });
    return [];
  }

  const urls = coverages.map((coverage) => {
    logger.debug(
      `Coverage Id: ${coverage.id}, Platform: ${coverage.buildPlatform}, Flavor: ${coverage.buildFlavor}`,
    );
    return buildCoverageUrl(build, coverage);
  });

  logger.debug("...done.", { count: urls.length });
  return urls;
}
