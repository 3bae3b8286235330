/**
 * Build summary logger.
 *
 * Collects messages for the scanprep section of the build summary and
 * publishes them on `flush()`/`dispose()`: the section is written as a
 * markdown file and attached to the build with the `task.uploadsummary`
 * logging command from azure-pipelines-task-lib.
 */

import * as node_path from "node:path";
import * as tl from "azure-pipelines-task-lib/task.js";
import { ValidationError } from "../types/errors.js";
import { parseBuildId } from "./build-uri.js";

/** Unique id for the section; also names the uploaded file. */
export const SUMMARY_SECTION_NAME = "SonarTeamBuildSummary";

export const SUMMARY_SECTION_HEADER = "SonarQube Analysis Summary";

export interface BuildSummaryDeps {
  /** Directory the markdown file is written to. */
  readonly directory: string;
  readonly writeFn: (path: string, content: string) => Promise<void>;
  /** Attaches a markdown file to the build. Defaults to `tl.uploadSummary`. */
  readonly uploadSummary?: ((path: string) => void) | undefined;
}

/**
 * Replace `{0}`, `{1}`, ... with the matching argument. Placeholders
 * without an argument are left untouched.
 */
export function formatMessage(message: string, args: readonly unknown[]): string {
  if (args.length === 0) {
    return message;
  }
  return message.replace(/\{(\d+)\}/g, (placeholder, index: string) => {
    const position = Number(index);
    return position < args.length ? String(args[position]) : placeholder;
  });
}

export class BuildSummaryLogger {
  private readonly buildId: number;
  private readonly upload: (path: string) => void;
  private readonly pending: string[] = [];
  private published = 0;
  private disposed = false;

  constructor(
    buildUri: string,
    private readonly deps: BuildSummaryDeps,
  ) {
    if (buildUri.trim().length === 0) {
      throw new ValidationError("buildUri must not be empty");
    }
    this.buildId = parseBuildId(buildUri);
    this.upload = deps.uploadSummary ?? tl.uploadSummary;
  }

  /** Adds a message to the summary section. */
  writeMessage(message: string, ...args: unknown[]): void {
    if (message.trim().length === 0) {
      throw new ValidationError("message must not be empty");
    }
    if (this.disposed) {
      throw new Error("BuildSummaryLogger has already been disposed");
    }
    this.pending.push(formatMessage(message, args));
  }

  /** Path of the first markdown file the section is written to. */
  get summaryPath(): string {
    return this.pathFor(1);
  }

  /** Later flushes get their own file: `-2`, `-3`, ... */
  private pathFor(part: number): string {
    const suffix = part === 1 ? "" : `-${part}`;
    return node_path.join(
      this.deps.directory,
      `${SUMMARY_SECTION_NAME}-${this.buildId}${suffix}.md`,
    );
  }

  /** Markdown for the messages not yet published. */
  renderMarkdown(): string {
    return [
      `## ${SUMMARY_SECTION_HEADER}`,
      "",
      ...this.pending.map((message) => `- ${message}`),
      "",
    ].join("\n");
  }

  /**
   * Writes and uploads the pending messages. The logger stays usable;
   * a flush with nothing pending publishes nothing.
   */
  async flush(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }
    const count = this.pending.length;
    const path = this.pathFor(this.published + 1);
    await this.deps.writeFn(path, this.renderMarkdown());
    this.pending.splice(0, count);
    this.published += 1;
    this.upload(path);
  }

  /** Flushes and closes the logger. Only the first call has any effect. */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    await this.flush();
  }
}
