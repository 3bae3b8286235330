/**
 * CLI argument parser.
 *
 * Translates a process.argv-style string array into a command or a
 * structured error, without an argument-parsing library.
 */

import type { CoverageOutputFormat } from "../types/config.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import { VERSION } from "../version.js";

export type Command =
  | {
      readonly kind: "ruleset";
      readonly ids: readonly string[];
      readonly idsFile?: string | undefined;
      readonly outputPath?: string | undefined;
    }
  | {
      readonly kind: "coverage-urls";
      readonly buildUri?: string | undefined;
      readonly timeoutMs?: number | undefined;
      readonly intervalMs?: number | undefined;
      readonly format: CoverageOutputFormat;
    }
  | {
      readonly kind: "download";
      readonly url: string;
      readonly outputPath?: string | undefined;
      readonly userName?: string | undefined;
      readonly password?: string | undefined;
    }
  | {
      readonly kind: "summary";
      readonly messages: readonly string[];
      readonly buildUri?: string | undefined;
    };

export type CommandName = Command["kind"];

export interface ParsedArgs {
  readonly command: Command;
  readonly verbose: boolean;
}

/**
 * Non-command results from parsing: help request, version request,
 * MCP mode, or error.
 */
export interface ParseError {
  readonly kind: "error" | "help" | "version" | "mcp";
  readonly message: string;
}

export type ParseResult = Result<ParsedArgs, ParseError>;

const COMMANDS: ReadonlySet<string> = new Set<CommandName>([
  "ruleset",
  "coverage-urls",
  "download",
  "summary",
]);

const VALID_FORMATS: ReadonlySet<string> = new Set(["text", "json"]);

/**
 * Flags that take a value, per command. Global flags are handled first.
 */
const VALUE_FLAGS: ReadonlyMap<CommandName, ReadonlySet<string>> = new Map([
  ["ruleset", new Set(["--output", "--ids-file"])],
  ["coverage-urls", new Set(["--build-uri", "--timeout", "--interval", "--format"])],
  ["download", new Set(["--output", "--user", "--password"])],
  ["summary", new Set(["--build-uri"])],
]);

/**
 * Maps short flag aliases to their long equivalents.
 */
const SHORT_TO_LONG: ReadonlyMap<string, string> = new Map([
  ["-o", "--output"],
  ["-f", "--format"],
  ["-h", "--help"],
  ["-V", "--version"],
  ["-v", "--verbose"],
]);

function usageError(message: string): ParseResult {
  return err<ParseError>({ kind: "error", message });
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.has(value);
}

function parsePositiveInt(value: string): number | undefined {
  const parsed = Number(value);
  return /^\d+$/.test(value) && parsed > 0 ? parsed : undefined;
}

/**
 * Parse a CLI argument array.
 *
 * Expected usage:
 *   scanprep [global options] <command> [options] [arguments]
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  const expandedArgv = argv.map((arg) => SHORT_TO_LONG.get(arg) ?? arg);

  // --help and --version short-circuit wherever they appear.
  if (expandedArgv.includes("--help")) {
    return err<ParseError>({ kind: "help", message: helpText() });
  }
  if (expandedArgv.includes("--version")) {
    return err<ParseError>({ kind: "version", message: `scanprep ${VERSION}` });
  }
  if (expandedArgv.includes("--mcp")) {
    return err<ParseError>({ kind: "mcp", message: "Starting MCP server" });
  }

  let verbose = false;
  let commandName: CommandName | undefined;
  const values = new Map<string, string>();
  const positionals: string[] = [];

  let i = 0;
  while (i < expandedArgv.length) {
    const arg = expandedArgv[i] ?? "";
    const originalArg = argv[i] ?? arg;

    if (arg === "--verbose") {
      verbose = true;
      i += 1;
      continue;
    }

    if (commandName === undefined) {
      if (arg.startsWith("-")) {
        return usageError(`Unknown flag "${originalArg}"`);
      }
      if (!isCommandName(arg)) {
        return usageError(
          `Unknown command "${arg}". Valid commands: ${[...COMMANDS].join(", ")}`,
        );
      }
      commandName = arg;
      i += 1;
      continue;
    }

    if (arg.startsWith("-")) {
      const allowed = VALUE_FLAGS.get(commandName);
      if (allowed === undefined || !allowed.has(arg)) {
        return usageError(`Unknown flag "${originalArg}" for command "${commandName}"`);
      }
      const value = expandedArgv[i + 1];
      if (value === undefined) {
        return usageError(`${originalArg} requires a value`);
      }
      values.set(arg, value);
      i += 2;
      continue;
    }

    positionals.push(arg);
    i += 1;
  }

  if (commandName === undefined) {
    return usageError("Missing command. Usage: scanprep <command> [options]");
  }

  const command = buildCommand(commandName, values, positionals);
  if (!command.ok) {
    return command;
  }
  return ok({ command: command.value, verbose });
}

function buildCommand(
  name: CommandName,
  values: ReadonlyMap<string, string>,
  positionals: readonly string[],
): Result<Command, ParseError> {
  switch (name) {
    case "ruleset":
      return ok<Command>({
        kind: "ruleset",
        ids: positionals,
        idsFile: values.get("--ids-file"),
        outputPath: values.get("--output"),
      });

    case "coverage-urls": {
      if (positionals.length > 0) {
        return err<ParseError>({
          kind: "error",
          message: `Unexpected argument "${positionals[0] ?? ""}" for command "coverage-urls"`,
        });
      }
      const format = values.get("--format") ?? "text";
      if (!VALID_FORMATS.has(format)) {
        return err<ParseError>({
          kind: "error",
          message: `Unknown format "${format}". Valid formats: ${[...VALID_FORMATS].join(", ")}`,
        });
      }
      let timeoutMs: number | undefined;
      let intervalMs: number | undefined;
      for (const flag of ["--timeout", "--interval"] as const) {
        const raw = values.get(flag);
        if (raw === undefined) {
          continue;
        }
        const parsed = parsePositiveInt(raw);
        if (parsed === undefined) {
          return err<ParseError>({
            kind: "error",
            message: `${flag} requires a positive integer, got "${raw}"`,
          });
        }
        if (flag === "--timeout") {
          timeoutMs = parsed;
        } else {
          intervalMs = parsed;
        }
      }
      return ok<Command>({
        kind: "coverage-urls",
        buildUri: values.get("--build-uri"),
        timeoutMs,
        intervalMs,
        format: format === "json" ? "json" : "text",
      });
    }

    case "download": {
      const [url, ...rest] = positionals;
      if (url === undefined) {
        return err<ParseError>({ kind: "error", message: "Missing URL. Usage: scanprep download <url>" });
      }
      if (rest.length > 0) {
        return err<ParseError>({
          kind: "error",
          message: `Unexpected argument "${rest[0] ?? ""}" for command "download"`,
        });
      }
      return ok<Command>({
        kind: "download",
        url,
        outputPath: values.get("--output"),
        userName: values.get("--user"),
        password: values.get("--password"),
      });
    }

    case "summary":
      if (positionals.length === 0) {
        return err<ParseError>({
          kind: "error",
          message: "Missing message. Usage: scanprep summary <message>...",
        });
      }
      return ok<Command>({
        kind: "summary",
        messages: positionals,
        buildUri: values.get("--build-uri"),
      });
  }
}

function helpText(): string {
  return [
    "Usage: scanprep [options] <command> [command options]",
    "",
    "Prepare a CI build for static analysis.",
    "",
    "Commands:",
    "  ruleset [<id>...]       Write the analyzer rule set for the given rule ids",
    "      -o, --output <path>     Write to a file instead of stdout",
    "          --ids-file <path>   Read rule ids from a file, one per line",
    "  coverage-urls           List the download URLs of the build's coverage reports",
    "          --build-uri <uri>   Build to query (default: BUILD_BUILDURI)",
    "          --timeout <ms>      How long to wait for coverage data (default: 20000)",
    "          --interval <ms>     Pause between attempts (default: 2000)",
    "      -f, --format <format>   Output format (text, json)",
    "  download <url>          Download a file or print its content",
    "      -o, --output <path>     Save to a file instead of stdout",
    "          --user <name>       Basic authentication user name",
    "          --password <pw>     Basic authentication password",
    "  summary <message>...    Add messages to the build summary",
    "          --build-uri <uri>   Build to annotate (default: BUILD_BUILDURI)",
    "",
    "Options:",
    "  -v, --verbose           Log debug output to stderr",
    "      --mcp               Start as MCP server (stdio transport)",
    "  -h, --help              Show this help message",
    "  -V, --version           Show version number",
  ].join("\n");
}
