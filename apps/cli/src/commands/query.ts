import {
  defaultParallelism,
  runParallel,
  type Repository,
  type RepositoryQuery,
} from "@gitfleet/core";
import { debug } from "../output/reporters.js";
import type { CommandContext } from "./run.js";

/**
 * Run a query against every repository in parallel. Repositories whose
 * query failed are left out of the result and mentioned in verbose mode.
 */
export async function queryRepositories<T>(
  context: CommandContext,
  repos: readonly Repository[],
  query: RepositoryQuery<T>,
): Promise<Array<[path: string, data: T]>> {
  const results = await runParallel(repos, defaultParallelism(), query);

  const found: Array<[path: string, data: T]> = [];
  for (const [path, result] of results) {
    if (result.success) {
      found.push([path, result.data]);
    } else {
      debug(`${path}: ${result.error}`, context.config.verbose);
    }
  }
  return found;
}
