/**
 * CLI runner: the top-level entry point that wires everything together.
 *
 * Responsibilities:
 *   1. Parse arguments and the environment configuration
 *   2. Build the logger and the adapters a command needs
 *   3. Run the command and write its output to stdout or a file
 *
 * Every dependency with I/O is injected so tests stay in process.
 */

import * as node_os from "node:os";
import type { Logger } from "winston";
import {
  createAzureDevOpsClient,
  type AzureDevOpsClientOptions,
} from "../build-server/azure-devops.js";
import {
  createBuildServer,
  type BuildServer,
  type BuildServiceClient,
} from "../build-server/build-server.js";
import { BuildSummaryLogger } from "../build-server/build-summary-logger.js";
import { selectCoverageFormatter } from "../formatter/coverage-urls.js";
import {
  createDownloader,
  type Downloader,
  type DownloaderOptions,
} from "../http/downloader.js";
import { createLogger } from "../logging/logger.js";
import type { McpServerDeps } from "../mcp/server.js";
import { parseRuleIds } from "../ruleset/rule-ids.js";
import { emitRuleSet } from "../ruleset/ruleset-writer.js";
import type { RetryOptions } from "../retry/retry.js";
import { loadEnvConfig, type EnvConfig, type LogLevel } from "../types/config.js";
import { ValidationError, errorMessage } from "../types/errors.js";
import { parseArgs, type Command } from "./parse-args.js";

/**
 * Injectable dependencies for testability.
 * Production code provides real I/O; tests provide stubs.
 */
export interface CliDeps {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly readFn: (path: string) => Promise<string>;
  readonly writeFn: (path: string, content: string) => Promise<void>;
  readonly createLogger?: (level: LogLevel) => Logger;
  readonly createBuildClient?: (options: AzureDevOpsClientOptions) => BuildServiceClient;
  readonly createDownloader?: (options: DownloaderOptions) => Downloader;
  readonly startMcpServer?: (deps: McpServerDeps) => Promise<void>;
  /** Attaches a build summary file; defaults to the pipeline logging command. */
  readonly uploadSummary?: (path: string) => void;
  /** Overrides the pause between coverage lookups (tests use a fake clock). */
  readonly retryTiming?: Pick<RetryOptions, "sleepFn" | "nowFn">;
}

interface CommandContext {
  readonly deps: CliDeps;
  readonly config: EnvConfig;
  readonly logger: Logger;
}

const REQUIRED_BUILD_CONTEXT = [
  ["SYSTEM_TEAMFOUNDATIONCOLLECTIONURI", "collectionUri"],
  ["SYSTEM_TEAMPROJECT", "teamProject"],
  ["SYSTEM_ACCESSTOKEN", "accessToken"],
] as const;

/**
 * Create the build server from the environment, or list the variables
 * that are missing.
 */
function resolveBuildServer(
  context: CommandContext,
  overrides: { timeoutMs?: number | undefined; intervalMs?: number | undefined } = {},
): { server: BuildServer } | { missing: string[] } {
  const { config, deps, logger } = context;
  const missing = REQUIRED_BUILD_CONTEXT.filter(([, key]) => config[key] === undefined).map(
    ([name]) => name,
  );
  if (
    missing.length > 0 ||
    config.collectionUri === undefined ||
    config.teamProject === undefined ||
    config.accessToken === undefined
  ) {
    return { missing };
  }

  const createClient = deps.createBuildClient ?? createAzureDevOpsClient;
  const client = createClient({
    collectionUri: config.collectionUri,
    teamProject: config.teamProject,
    accessToken: config.accessToken,
  });

  return {
    server: createBuildServer({
      client,
      coverage: {
        logger,
        timeoutMs: overrides.timeoutMs ?? config.coverageTimeoutMs,
        intervalMs: overrides.intervalMs ?? config.coverageIntervalMs,
        ...deps.retryTiming,
      },
      summary: {
        directory: config.summaryDirectory ?? node_os.tmpdir(),
        writeFn: deps.writeFn,
        uploadSummary: deps.uploadSummary,
      },
    }),
  };
}

async function runRuleset(
  command: Extract<Command, { kind: "ruleset" }>,
  { deps, logger }: CommandContext,
): Promise<number> {
  const ids = [...command.ids];
  if (command.idsFile !== undefined) {
    let text: string;
    try {
      text = await deps.readFn(command.idsFile);
    } catch (cause: unknown) {
      deps.stderr(`Failed to read rule ids from ${command.idsFile}: ${errorMessage(cause)}`);
      return 1;
    }
    ids.push(...parseRuleIds(text));
  }

  let content: string;
  try {
    content = emitRuleSet(ids);
  } catch (cause: unknown) {
    if (cause instanceof ValidationError) {
      deps.stderr(cause.message);
      return 1;
    }
    throw cause;
  }
  logger.debug("Rule set generated", { rules: ids.length });

  if (command.outputPath === undefined) {
    deps.stdout(content.replace(/\n$/, ""));
    return 0;
  }

  try {
    await deps.writeFn(command.outputPath, content);
  } catch (cause: unknown) {
    deps.stderr(`Failed to write rule set: ${errorMessage(cause)}`);
    return 1;
  }
  deps.stdout(`Rule set written to ${command.outputPath}`);
  return 0;
}

async function runCoverageUrls(
  command: Extract<Command, { kind: "coverage-urls" }>,
  context: CommandContext,
): Promise<number> {
  const { deps, config } = context;
  const buildUri = command.buildUri ?? config.buildUri;
  if (buildUri === undefined) {
    deps.stderr("Missing build URI: pass --build-uri or set BUILD_BUILDURI");
    return 1;
  }

  const resolved = resolveBuildServer(context, command);
  if ("missing" in resolved) {
    deps.stderr(`Missing build context: ${resolved.missing.join(", ")}`);
    return 1;
  }

  let urls: readonly string[];
  try {
    urls = await resolved.server.getCoverageReportUrls(buildUri);
  } catch (cause: unknown) {
    deps.stderr(`Failed to get coverage report URLs: ${errorMessage(cause)}`);
    return 1;
  }

  const output = selectCoverageFormatter(command.format)(urls);
  if (output.length > 0) {
    deps.stdout(output);
  }
  return 0;
}

async function runDownload(
  command: Extract<Command, { kind: "download" }>,
  { deps, logger }: CommandContext,
): Promise<number> {
  const create = deps.createDownloader ?? createDownloader;

  try {
    const downloader = create({
      logger,
      userName: command.userName,
      password: command.password,
    });

    if (command.outputPath !== undefined) {
      const saved = await downloader.tryDownloadFileIfExists(command.url, command.outputPath);
      if (!saved) {
        deps.stderr(`Not found: ${command.url}`);
        return 1;
      }
      deps.stdout(`Downloaded ${command.url} to ${command.outputPath}`);
      return 0;
    }

    const result = await downloader.tryDownloadIfExists(command.url);
    if (!result.found) {
      deps.stderr(`Not found: ${command.url}`);
      return 1;
    }
    deps.stdout(result.data);
    return 0;
  } catch (cause: unknown) {
    deps.stderr(`Download failed: ${errorMessage(cause)}`);
    return 1;
  }
}

async function runSummary(
  command: Extract<Command, { kind: "summary" }>,
  { deps, config }: CommandContext,
): Promise<number> {
  const buildUri = command.buildUri ?? config.buildUri;
  if (buildUri === undefined) {
    deps.stderr("Missing build URI: pass --build-uri or set BUILD_BUILDURI");
    return 1;
  }

  try {
    const summary = new BuildSummaryLogger(buildUri, {
      directory: config.summaryDirectory ?? node_os.tmpdir(),
      writeFn: deps.writeFn,
      uploadSummary: deps.uploadSummary,
    });
    for (const message of command.messages) {
      summary.writeMessage(message);
    }
    await summary.dispose();
  } catch (cause: unknown) {
    deps.stderr(`Failed to publish build summary: ${errorMessage(cause)}`);
    return 1;
  }
  return 0;
}

/**
 * Run the CLI with the given argument array and dependencies.
 * Returns a process exit code (0 = success, 1 = error).
 */
export async function run(
  argv: readonly string[],
  deps: CliDeps,
): Promise<number> {
  const parseResult = parseArgs(argv);

  if (!parseResult.ok && (parseResult.error.kind === "help" || parseResult.error.kind === "version")) {
    deps.stdout(parseResult.error.message);
    return 0;
  }
  if (!parseResult.ok && parseResult.error.kind === "error") {
    deps.stderr(parseResult.error.message);
    return 1;
  }

  const configResult = loadEnvConfig(deps.env);
  if (!configResult.ok) {
    deps.stderr(configResult.error.message);
    return 1;
  }
  const config = configResult.value;

  const verbose = parseResult.ok && parseResult.value.verbose;
  const level: LogLevel = verbose ? "debug" : config.logLevel;
  const logger = (deps.createLogger ?? ((l: LogLevel) => createLogger({ level: l })))(level);
  const context: CommandContext = { deps, config, logger };

  if (!parseResult.ok) {
    // MCP mode.
    if (deps.startMcpServer === undefined) {
      deps.stderr("MCP server is not available");
      return 1;
    }
    const resolved = resolveBuildServer(context);
    await deps.startMcpServer({
      logger,
      buildServer: "server" in resolved ? resolved.server : undefined,
      defaultBuildUri: config.buildUri,
    });
    return 0;
  }

  const command = parseResult.value.command;
  switch (command.kind) {
    case "ruleset":
      return runRuleset(command, context);
    case "coverage-urls":
      return runCoverageUrls(command, context);
    case "download":
      return runDownload(command, context);
    case "summary":
      return runSummary(command, context);
  }
}
