import { PollTimeoutError } from './error';
import { ConfigPoll } from './type';
import { sleep } from './util';

export type PollOptions<T> = {
  label: string;
  budget: ConfigPoll;
  check: (attempt: number) => Promise<T>;
  isDone: (value: T) => boolean;
  describe: (value: T) => string;
  onMiss?: (value: T, attempt: number, elapsedMs: number) => void;
  // Sleep before every check instead of between checks
  delayFirst?: boolean;
};

export type PollResult<T> = {
  value: T;
  attempts: number;
  elapsedMs: number;
};

/**
 * Checks until `isDone` holds or the attempt budget runs out. Exhaustion throws
 * {@link PollTimeoutError}; total sleeping never exceeds `attempts * interval`.
 */
export const pollUntil = async <T>(options: PollOptions<T>): Promise<PollResult<T>> => {
  const { label, budget, check, isDone, describe, onMiss, delayFirst = false } = options;
  const started = Date.now();

  let last: { value: T } | undefined;
  for (let attempt = 1; attempt <= budget.attempts; attempt++) {
    if (delayFirst) {
      await sleep(budget.interval);
    }

    const value = await check(attempt);
    last = { value };

    const elapsedMs = Date.now() - started;
    if (isDone(value)) {
      return { value, attempts: attempt, elapsedMs };
    }

    onMiss?.(value, attempt, elapsedMs);

    if (!delayFirst && attempt < budget.attempts) {
      await sleep(budget.interval);
    }
  }

  const lastObserved = last === undefined ? 'nothing' : describe(last.value);
  throw new PollTimeoutError(label, budget.attempts, Date.now() - started, lastObserved);
};
