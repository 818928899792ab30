import { describe, it, expect, vi, beforeEach } from "vitest";

const live = vi.hoisted(() => ({ text: "", stop: vi.fn() }));

vi.mock("../reporters.js", () => ({
  info: vi.fn(),
  isJsonMode: vi.fn(() => false),
  spinner: vi.fn((text: string) => {
    live.text = text;
    return live;
  }),
  truncateStart: vi.fn((text: string) => text),
}));

import { createScanProgress } from "../scan-progress.js";
import * as reporters from "../reporters.js";

describe("createScanProgress", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    live.text = "";
  });

  it("announces the scan root", () => {
    createScanProgress(false).onStart?.("/home/test");

    expect(reporters.info).toHaveBeenCalledWith(
      "Scanning for git repos under /home/test; this may take a while...",
    );
    expect(reporters.spinner).not.toHaveBeenCalled();
  });

  it("keeps a live line with the count and current path in verbose mode", () => {
    const progress = createScanProgress(true);

    progress.onStart?.("/home/test");
    progress.onProgress?.(2, "/home/test/b");

    expect(reporters.spinner).toHaveBeenCalledWith("0 repos found");
    expect(live.text).toBe("2 repos found: /home/test/b");

    progress.onFinish?.(2);
    expect(live.stop).toHaveBeenCalledTimes(1);
  });

  it("stays quiet on the live line in JSON mode", () => {
    vi.mocked(reporters.isJsonMode).mockReturnValueOnce(true);
    const progress = createScanProgress(true);

    progress.onStart?.("/home/test");
    progress.onProgress?.(1, "/home/test/a");

    expect(reporters.spinner).not.toHaveBeenCalled();
  });
});
