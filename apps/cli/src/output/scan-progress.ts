import type { Ora } from "ora";
import type { DiscoveryProgress } from "@gitfleet/core";
import { info, isJsonMode, spinner, truncateStart } from "./reporters.js";

// Room for the spinner glyph and the space after it
const SPINNER_WIDTH = 2;

/**
 * Progress hooks for a repository scan. Always announces the scan; in
 * verbose mode also keeps one live line with the count and current path.
 */
export function createScanProgress(verbose: boolean): DiscoveryProgress {
  let live: Ora | null = null;

  return {
    onStart(scanRoot) {
      info(`Scanning for git repos under ${scanRoot}; this may take a while...`);
      if (verbose && !isJsonMode()) {
        live = spinner("0 repos found");
      }
    },
    onProgress(found, currentPath) {
      if (!live) return;
      const width = (process.stderr.columns ?? 80) - SPINNER_WIDTH;
      live.text = truncateStart(`${found} repos found: ${currentPath}`, width);
    },
    onFinish() {
      live?.stop();
      live = null;
    },
  };
}
