import { describe, it, expect, vi, afterEach } from "vitest";
import * as node_os from "node:os";
import { ValidationError } from "../types/errors.js";
import { BuildSummaryLogger, formatMessage, type BuildSummaryDeps } from "./build-summary-logger.js";

function makeDeps() {
  const uploads: string[] = [];
  const writeFn = vi.fn(async (_path: string, _content: string) => {});
  const deps: BuildSummaryDeps = {
    directory: "/agent/_temp",
    writeFn,
    uploadSummary: (path: string) => {
      uploads.push(path);
    },
  };
  return { deps, writeFn, uploads };
}

describe("formatMessage", () => {
  it("substitutes positional placeholders", () => {
    expect(formatMessage("{0} issues in {1}", [3, "Fabrikam"])).toBe("3 issues in Fabrikam");
  });

  it("leaves placeholders without an argument", () => {
    expect(formatMessage("{0} and {2}", ["a"])).toBe("a and {2}");
  });

  it("returns the message unchanged without arguments", () => {
    expect(formatMessage("literal {0}", [])).toBe("literal {0}");
  });
});

describe("BuildSummaryLogger", () => {
  it("rejects an empty build URI", () => {
    const { deps } = makeDeps();
    expect(() => new BuildSummaryLogger(" ", deps)).toThrow(ValidationError);
  });

  it("rejects an empty message", () => {
    const { deps } = makeDeps();
    const summary = new BuildSummaryLogger("vstfs:///Build/Build/42", deps);
    expect(() => summary.writeMessage("")).toThrow("message must not be empty");
  });

  it("writes the section as markdown and uploads it on dispose", async () => {
    const { deps, writeFn, uploads } = makeDeps();
    const summary = new BuildSummaryLogger("vstfs:///Build/Build/42", deps);

    summary.writeMessage("Analysis results: {0}", "https://sonar.example.test/dashboard?id=app");
    summary.writeMessage("Quality gate passed");
    await summary.dispose();

    expect(writeFn).toHaveBeenCalledTimes(1);
    expect(writeFn).toHaveBeenCalledWith(
      "/agent/_temp/SonarTeamBuildSummary-42.md",
      "## SonarQube Analysis Summary\n\n" +
        "- Analysis results: https://sonar.example.test/dashboard?id=app\n" +
        "- Quality gate passed\n",
    );
    expect(uploads).toEqual(["/agent/_temp/SonarTeamBuildSummary-42.md"]);
  });

  it("publishes nothing without messages", async () => {
    const { deps, writeFn, uploads } = makeDeps();
    const summary = new BuildSummaryLogger("42", deps);

    await summary.dispose();

    expect(writeFn).not.toHaveBeenCalled();
    expect(uploads).toEqual([]);
  });

  it("publishes only once when disposed twice", async () => {
    const { deps, writeFn } = makeDeps();
    const summary = new BuildSummaryLogger("42", deps);
    summary.writeMessage("done");

    await summary.dispose();
    await summary.dispose();

    expect(writeFn).toHaveBeenCalledTimes(1);
  });

  it("refuses messages after dispose", async () => {
    const { deps } = makeDeps();
    const summary = new BuildSummaryLogger("42", deps);
    await summary.dispose();

    expect(() => summary.writeMessage("late")).toThrow(
      "BuildSummaryLogger has already been disposed",
    );
  });

  it("publishes pending messages on flush and stays usable", async () => {
    const { deps, writeFn, uploads } = makeDeps();
    const summary = new BuildSummaryLogger("42", deps);

    summary.writeMessage("Rule set written");
    await summary.flush();
    summary.writeMessage("Coverage found");
    await summary.flush();

    expect(writeFn.mock.calls).toEqual([
      ["/agent/_temp/SonarTeamBuildSummary-42.md", "## SonarQube Analysis Summary\n\n- Rule set written\n"],
      ["/agent/_temp/SonarTeamBuildSummary-42-2.md", "## SonarQube Analysis Summary\n\n- Coverage found\n"],
    ]);
    expect(uploads).toEqual([
      "/agent/_temp/SonarTeamBuildSummary-42.md",
      "/agent/_temp/SonarTeamBuildSummary-42-2.md",
    ]);
  });

  it("publishes nothing on flush without pending messages", async () => {
    const { deps, writeFn, uploads } = makeDeps();
    const summary = new BuildSummaryLogger("42", deps);
    summary.writeMessage("once");

    await summary.flush();
    await summary.flush();
    await summary.dispose();

    expect(writeFn).toHaveBeenCalledTimes(1);
    expect(uploads).toEqual(["/agent/_temp/SonarTeamBuildSummary-42.md"]);
  });

  it("keeps messages pending when the write fails", async () => {
    const { deps, uploads } = makeDeps();
    const writeFn = vi
      .fn(async (_path: string, _content: string) => {})
      .mockRejectedValueOnce(new Error("ENOSPC: no space left on device"));
    const summary = new BuildSummaryLogger("42", { ...deps, writeFn });
    summary.writeMessage("retained");

    await expect(summary.flush()).rejects.toThrow("ENOSPC: no space left on device");
    await summary.flush();

    expect(writeFn).toHaveBeenLastCalledWith(
      "/agent/_temp/SonarTeamBuildSummary-42.md",
      "## SonarQube Analysis Summary\n\n- retained\n",
    );
    expect(uploads).toEqual(["/agent/_temp/SonarTeamBuildSummary-42.md"]);
  });
});

describe("BuildSummaryLogger upload command", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function captureCommands() {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    return () =>
      write.mock.calls
        .map(([chunk]) => String(chunk))
        .filter((line) => line.startsWith("##vso[task.uploadsummary]"));
  }

  it("emits the task.uploadsummary logging command by default", async () => {
    const commands = captureCommands();
    const summary = new BuildSummaryLogger("vstfs:///Build/Build/7", {
      directory: "/agent/_temp",
      writeFn: async () => {},
    });
    summary.writeMessage("hello");

    await summary.dispose();

    expect(commands()).toEqual([
      `##vso[task.uploadsummary]/agent/_temp/SonarTeamBuildSummary-7.md${node_os.EOL}`,
    ]);
  });

  it("escapes percent signs and line breaks in the path", async () => {
    const commands = captureCommands();
    const summary = new BuildSummaryLogger("7", {
      directory: "/tmp/a%0Ab]c\nd",
      writeFn: async () => {},
    });
    summary.writeMessage("hello");

    await summary.dispose();

    expect(commands()).toEqual([
      `##vso[task.uploadsummary]/tmp/a%AZP250Ab]c%0Ad/SonarTeamBuildSummary-7.md${node_os.EOL}`,
    ]);
  });
});
