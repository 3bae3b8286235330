#!/usr/bin/env node

/**
 * scanprep CLI entry point.
 *
 * This file is the bin target. It wires together real dependencies
 * (process I/O, environment, filesystem) and delegates to the runner.
 */

import * as node_fs from "node:fs/promises";
import node_process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "../mcp/server.js";
import { run } from "./run.js";
import type { CliDeps } from "./run.js";
import { writeFileEnsuringDir } from "./write-fn.js";

const deps: CliDeps = {
  stdout: (text: string) => node_process.stdout.write(text + "\n"),
  stderr: (text: string) => node_process.stderr.write(text + "\n"),
  env: node_process.env,
  readFn: (path: string) => node_fs.readFile(path, "utf-8"),
  writeFn: writeFileEnsuringDir,
  startMcpServer: async (mcpDeps) => {
    const server = createMcpServer(mcpDeps);
    const closed = new Promise<void>((resolve) => {
      server.server.onclose = resolve;
    });
    await server.connect(new StdioServerTransport());
    await closed;
  },
};

// Strip the first two entries (node binary, script path).
const argv = node_process.argv.slice(2);

run(argv, deps).then(
  (code) => {
    node_process.exitCode = code;
  },
  (cause: unknown) => {
    node_process.stderr.write(`${cause instanceof Error ? (cause.stack ?? cause.message) : String(cause)}\n`);
    node_process.exitCode = 1;
  },
);
