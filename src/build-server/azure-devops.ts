/**
 * Azure DevOps / TFS adapter for `BuildServiceClient`.
 *
 * Talks to the build and test REST APIs of a project collection with a
 * personal access token (or the pipeline's System.AccessToken). Responses
 * are validated with zod before anything downstream sees them.
 */

import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import { basicAuthHeader, createHttpClient, DEFAULT_USER_AGENT } from "../http/downloader.js";
import type { BuildDetails, BuildServiceClient, CoverageDescriptor } from "./build-server.js";
import { parseBuildId } from "./build-uri.js";

const BUILD_API_VERSION = "6.0";
const COVERAGE_API_VERSION = "6.0-preview.1";
/** Module-level coverage data. */
const COVERAGE_FLAGS_MODULES = 1;

export interface AzureDevOpsClientOptions {
  readonly collectionUri: string;
  readonly teamProject: string;
  readonly accessToken: string;
  readonly userAgent?: string;
  readonly timeoutMs?: number;
  readonly adapter?: AxiosAdapter;
}

const buildSchema = z.object({
  id: z.number().int(),
  buildNumber: z.string(),
  uri: z.string(),
  project: z.object({ name: z.string() }),
});

const coverageSchema = z.object({
  value: z
    .array(
      z.object({
        configuration: z.object({
          id: z.union([z.number(), z.string()]).transform(String),
          flavor: z.string(),
          platform: z.string(),
        }),
      }),
    )
    .default([]),
});

async function getJson<T>(
  client: AxiosInstance,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const response = await client.get<unknown>(url);
  const parsed = schema.safeParse(response.data);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Unexpected response from ${url}: ${detail}`);
  }
  return parsed.data;
}

export function createAzureDevOpsClient(options: AzureDevOpsClientOptions): BuildServiceClient {
  const collectionUri = options.collectionUri.replace(/\/+$/, "");
  const projectRoot = `${collectionUri}/${encodeURIComponent(options.teamProject)}`;

  const client = createHttpClient(
    {
      "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
      Authorization: basicAuthHeader("", options.accessToken),
      Accept: "application/json",
    },
    options,
  );

  return {
    async getBuildDetails(buildUri: string): Promise<BuildDetails> {
      const buildId = parseBuildId(buildUri);
      const build = await getJson(
        client,
        `${projectRoot}/_apis/build/builds/${buildId}?api-version=${BUILD_API_VERSION}`,
        buildSchema,
      );
      return {
        buildNumber: build.buildNumber,
        teamProject: build.project.name,
        buildUri: build.uri,
        collectionUri,
      };
    },

    async queryBuildCoverage(build: BuildDetails): Promise<readonly CoverageDescriptor[]> {
      const buildId = parseBuildId(build.buildUri);
      const coverage = await getJson(
        client,
        `${projectRoot}/_apis/test/codecoverage?buildId=${buildId}` +
          `&flags=${COVERAGE_FLAGS_MODULES}&api-version=${COVERAGE_API_VERSION}`,
        coverageSchema,
      );
      return coverage.value.map(({ configuration }) => ({
        id: configuration.id,
        buildFlavor: configuration.flavor,
        buildPlatform: configuration.platform,
      }));
    },
  };
}
