import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, realpath, rm, symlink, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { AlreadyIgnoredError, IgnoreListError } from "../errors.js";
import { IgnoreList } from "./ignore-list.js";

describe("IgnoreList", () => {
  let root: string;
  let ignoreFile: string;

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), "gitfleet-ignore-")));
    ignoreFile = join(root, "state", "ignored.txt");
    await mkdir(join(root, "repos", "a"), { recursive: true });
    await mkdir(join(root, "repos", "b"), { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("loads nothing when the file does not exist", async () => {
    expect(await new IgnoreList(ignoreFile).load()).toEqual([]);
  });

  it("appends the path and creates the file on first use", async () => {
    const list = new IgnoreList(ignoreFile);

    const stored = await list.add(join(root, "repos", "a"));

    expect(stored).toBe(join(root, "repos", "a"));
    expect(await readFile(ignoreFile, "utf-8")).toBe(`${join(root, "repos", "a")}\n`);
    expect(await list.load()).toEqual([join(root, "repos", "a")]);
  });

  it("stores the canonical form of a symlinked path", async () => {
    await symlink(join(root, "repos"), join(root, "alias"), "dir");

    const stored = await new IgnoreList(ignoreFile).add(join(root, "alias", "b"));

    expect(stored).toBe(join(root, "repos", "b"));
  });

  it("rejects a path that is already ignored", async () => {
    const list = new IgnoreList(ignoreFile);
    await list.add(join(root, "repos", "a"));

    await expect(list.add(join(root, "repos", "a"))).rejects.toBeInstanceOf(
      AlreadyIgnoredError,
    );
    expect(await list.load()).toEqual([join(root, "repos", "a")]);
  });

  it("keeps entries in insertion order", async () => {
    const list = new IgnoreList(ignoreFile);
    await list.add(join(root, "repos", "b"));
    await list.add(join(root, "repos", "a"));

    expect(await list.load()).toEqual([join(root, "repos", "b"), join(root, "repos", "a")]);
  });

  it("starts a new line when the file lacks a final newline", async () => {
    await mkdir(join(root, "state"), { recursive: true });
    await writeFile(ignoreFile, "/srv/old");

    await new IgnoreList(ignoreFile).add(join(root, "repos", "a"));

    expect(await readFile(ignoreFile, "utf-8")).toBe(`/srv/old\n${join(root, "repos", "a")}\n`);
  });

  it("skips blank lines and duplicates when loading", async () => {
    await mkdir(join(root, "state"), { recursive: true });
    await writeFile(ignoreFile, "/srv/one\n\n  /srv/two  \n/srv/one\n");

    expect(await new IgnoreList(ignoreFile).load()).toEqual(["/srv/one", "/srv/two"]);
  });

  it("raises IgnoreListError when the file cannot be written", async () => {
    const blocker = join(root, "blocker");
    await writeFile(blocker, "");

    await expect(
      new IgnoreList(join(blocker, "ignored.txt")).add(join(root, "repos", "a")),
    ).rejects.toBeInstanceOf(IgnoreListError);
  });
});
