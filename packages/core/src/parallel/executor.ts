// packages/core/src/parallel/executor.ts
import { availableParallelism } from "os";
import type { Repository } from "../models/repository.js";

/**
 * Default number of concurrent repository operations: one per available
 * processing unit.
 */
export function defaultParallelism(): number {
  return availableParallelism();
}

/**
 * Counting semaphore. `acquire` resolves once a permit is free; every
 * acquired permit must be given back with `release`.
 */
export class Semaphore {
  private available: number;
  private readonly waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.available = permits;
  }

  get availablePermits(): number {
    return this.available;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
    } else {
      this.available++;
    }
  }
}

/** A repository path paired with the result of the operation run on it */
export type RepositoryResult<T> = [path: string, result: T];

/**
 * Run `operation` on every repository with at most `maxWorkers` in flight.
 *
 * Resolves once every repository has produced a result, with exactly one
 * pair per repository in completion order (re-sort by path if needed).
 * Operations are expected to encode their own failures in `T`; one that
 * throws anyway does not stop the others, and the first such error is
 * rethrown after all of them have finished.
 */
export async function runParallel<T>(
  repos: readonly Repository[],
  maxWorkers: number,
  operation: (repo: Repository) => T | Promise<T>,
): Promise<RepositoryResult<T>[]> {
  if (repos.length === 0) return [];

  const permits = new Semaphore(Math.max(1, Math.floor(maxWorkers) || 1));
  const results: RepositoryResult<T>[] = [];
  const failures: unknown[] = [];
  const inFlight: Promise<void>[] = [];

  for (const repo of repos) {
    // Blocks dispatch while the pool is saturated
    await permits.acquire();

    const worker = (async () => {
      try {
        const result = await operation(repo);
        results.push([repo.path, result]);
      } catch (error) {
        failures.push(error);
      } finally {
        permits.release();
      }
    })();
    inFlight.push(worker);
  }

  await Promise.all(inFlight);

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
