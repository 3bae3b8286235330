/**
 * MCP server for scanprep.
 *
 * Exposes rule-set generation and coverage report lookup to AI agents
 * via the Model Context Protocol (stdio transport). Tool handlers are
 * plain functions so they can be tested without a transport.
 */

import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Logger } from "winston";
import type { BuildServer } from "../build-server/build-server.js";
import { formatCoverageJson } from "../formatter/coverage-urls.js";
import { emitRuleSet } from "../ruleset/ruleset-writer.js";
import { ValidationError, errorMessage } from "../types/errors.js";
import { VERSION } from "../version.js";

/**
 * Injectable dependencies for the MCP server.
 */
export interface McpServerDeps {
  readonly logger: Logger;
  /** Absent when the build context is not configured; coverage lookups then fail. */
  readonly buildServer?: BuildServer | undefined;
  /** Build queried when a tool call does not name one. */
  readonly defaultBuildUri?: string | undefined;
}

/**
 * The shape returned by the tool handlers.
 */
export interface ToolResult {
  readonly content: { type: "text"; text: string }[];
  readonly isError?: boolean;
}

/** Any string is a rule id, the empty one included; only duplicates are rejected. */
export const generateRulesetInput = {
  ids: z.array(z.string()).describe("Rule ids in the order they should appear, e.g. CA1000"),
};

function textResult(text: string, isError = false): ToolResult {
  return isError ? { content: [{ type: "text", text }], isError } : { content: [{ type: "text", text }] };
}

export function handleGenerateRuleset(args: { readonly ids: readonly string[] }): ToolResult {
  try {
    return textResult(emitRuleSet(args.ids));
  } catch (cause: unknown) {
    if (cause instanceof ValidationError) {
      return textResult(cause.message, true);
    }
    throw cause;
  }
}

export async function handleCoverageReportUrls(
  args: { readonly buildUri?: string | undefined },
  deps: McpServerDeps,
): Promise<ToolResult> {
  if (deps.buildServer === undefined) {
    return textResult(
      "Build server is not configured. Set SYSTEM_TEAMFOUNDATIONCOLLECTIONURI, SYSTEM_TEAMPROJECT and SYSTEM_ACCESSTOKEN.",
      true,
    );
  }
  const buildUri = args.buildUri ?? deps.defaultBuildUri;
  if (buildUri === undefined) {
    return textResult("No build URI given and BUILD_BUILDURI is not set.", true);
  }

  try {
    const urls = await deps.buildServer.getCoverageReportUrls(buildUri);
    return textResult(formatCoverageJson(urls));
  } catch (cause: unknown) {
    deps.logger.error("Coverage report lookup failed", { buildUri, error: errorMessage(cause) });
    return textResult(`Coverage report lookup failed: ${errorMessage(cause)}`, true);
  }
}

/**
 * Create a configured McpServer instance with the scanprep tools
 * registered. The caller connects it to a transport.
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: "scanprep",
    version: VERSION,
  });

  server.registerTool(
    "generate_ruleset",
    {
      title: "Generate Analyzer Rule Set",
      description:
        "Render the rule-set XML that enables the given analyzer rule ids as warnings. " +
        "Fails if an id is listed more than once.",
      inputSchema: generateRulesetInput,
    },
    async (args) => {
      const result = handleGenerateRuleset({ ids: args.ids });
      return { content: result.content, ...(result.isError === true ? { isError: true } : {}) };
    },
  );

  server.registerTool(
    "coverage_report_urls",
    {
      title: "Coverage Report URLs",
      description:
        "List the download URLs of the code-coverage reports recorded for a build. " +
        "Waits for coverage data to appear before giving up.",
      inputSchema: {
        buildUri: z
          .string()
          .optional()
          .describe("Build URI (vstfs:///Build/Build/<id>) or id. Defaults to the current build."),
      },
    },
    async (args) => {
      const result = await handleCoverageReportUrls({ buildUri: args.buildUri }, deps);
      return { content: result.content, ...(result.isError === true ? { isError: true } : {}) };
    },
  );

  return server;
}
