/**
 * Fallback chains and fan-out helpers
 *
 * A capability with several ways of getting the same answer declares them as
 * an ordered list of named strategies. Each is tried once, in order, until one
 * produces a value. A strategy that returns null ("nothing here") or throws
 * hands over to the next one.
 */

import type { ChildLogger } from "./logger.js";
import { toError } from "./errors.js";

export interface Strategy<T> {
  name: string;
  run: () => Promise<T | null>;
}

export interface StrategyAttempt {
  strategy: string;
  outcome: "empty" | "error";
  error?: string;
}

export interface StrategyOutcome<T> {
  value: T | null;
  /** Name of the strategy that produced the value */
  strategy: string | null;
  attempts: StrategyAttempt[];
}

/**
 * Run strategies in declaration order until one yields a value
 */
export async function runStrategies<T>(
  chain: string,
  strategies: Strategy<T>[],
  log: ChildLogger
): Promise<StrategyOutcome<T>> {
  const attempts: StrategyAttempt[] = [];

  for (const strategy of strategies) {
    try {
      const value = await strategy.run();
      if (value !== null) {
        log.info(`${chain}: resolved by ${strategy.name}`, { attempts: attempts.length + 1 });
        return { value, strategy: strategy.name, attempts };
      }
      log.debug(`${chain}: ${strategy.name} found nothing`);
      attempts.push({ strategy: strategy.name, outcome: "empty" });
    } catch (error) {
      const err = toError(error);
      log.warn(`${chain}: ${strategy.name} failed, falling back`, { error: err.message });
      attempts.push({ strategy: strategy.name, outcome: "error", error: err.message });
    }
  }

  log.warn(`${chain}: all strategies exhausted`, {
    strategies: strategies.map((s) => s.name),
  });
  return { value: null, strategy: null, attempts };
}

/**
 * Result-or-error of one task behind a settle barrier
 */
export type Settled<T> = { ok: true; value: T } | { ok: false; error: Error };

export function toSettled<T>(result: PromiseSettledResult<T>): Settled<T> {
  if (result.status === "fulfilled") {
    return { ok: true, value: result.value };
  }
  return { ok: false, error: toError(result.reason) };
}

/**
 * Unwrap a settled task, logging the failure and substituting a fallback
 */
export function valueOr<T>(settled: Settled<T>, fallback: T, task: string, log: ChildLogger): T {
  if (settled.ok) {
    return settled.value;
  }
  log.warn(`Task ${task} failed; continuing without it`, { error: settled.error.message });
  return fallback;
}

/**
 * Run a worker over items in fixed-size parallel batches, collecting per-item results
 */
export async function inBatches<I, O>(
  items: I[],
  concurrency: number,
  worker: (item: I, index: number) => Promise<O>
): Promise<Settled<O>[]> {
  const results: Settled<O>[] = [];
  const size = Math.max(1, concurrency);

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const settled = await Promise.allSettled(batch.map((item, j) => worker(item, i + j)));
    results.push(...settled.map((r) => toSettled(r)));
  }

  return results;
}
