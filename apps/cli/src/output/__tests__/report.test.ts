import { describe, it, expect, vi, afterEach } from "vitest";
import { Repository } from "@gitfleet/core";
import { Report } from "../report.js";

const repos = ["/work/a", "/work/b", "/work/c"].map((path) => new Repository(path));

describe("Report", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints overall messages before repository blocks", () => {
    const report = new Report(repos);
    report.addRepoMessage("/work/b", "M  file.ts");
    report.addMessage("summary");

    expect(report.toLines()).toEqual(["summary", "/work/b", "M  file.ts"]);
  });

  it("keeps repository order and skips repositories without messages", () => {
    const report = new Report(repos);
    report.addRepoMessage("/work/c", "?? new.txt");
    report.addRepoMessage("/work/a", " M old.txt");

    expect(report.toLines()).toEqual(["/work/a", " M old.txt", "/work/c", "?? new.txt"]);
  });

  it("pads repository blocks when asked to", () => {
    const report = new Report(repos).padRepoOutput();
    report.addRepoMessage("/work/a", " M one.txt");
    report.addRepoMessage("/work/b", " M two.txt");

    expect(report.toLines()).toEqual(["/work/a", " M one.txt", "", "/work/b", " M two.txt", ""]);
  });

  it("prints a repository marked with an empty line as just its path", () => {
    const report = new Report(repos);
    report.addRepoMessage("/work/b", "");

    expect(report.toLines()).toEqual(["/work/b"]);
    expect(report.toJSON().repo_messages).toEqual({ "/work/b": [] });
  });

  it("ignores messages for repositories it was not created with", () => {
    const report = new Report(repos);
    report.addRepoMessage("/elsewhere", "M  x");

    expect(report.toLines()).toEqual([]);
  });

  it("serialises to the JSON report shape", () => {
    const report = new Report(repos);
    report.addMessage("done");
    report.addRepoMessage("/work/a", "stash@{0}: WIP on main: 1a2b3c4 tweak");

    expect(report.toJSON()).toEqual({
      error: false,
      messages: ["done"],
      repo_messages: { "/work/a": ["stash@{0}: WIP on main: 1a2b3c4 tweak"] },
    });
  });

  it("writes each text line to stdout", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const report = new Report();
    report.addMessage("one");
    report.addMessage("two");

    report.print(false);

    expect(log.mock.calls).toEqual([["one"], ["two"]]);
  });

  it("writes one JSON document to stdout", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const report = new Report();
    report.addMessage("one");

    report.print(true);

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
      error: false,
      messages: ["one"],
      repo_messages: {},
    });
  });
});
