/**
 * Task Graph - fan-out/fan-in execution of independent named tasks
 *
 * Every task is started against the same read-only input, every task is
 * awaited to a terminal outcome, and only an all-success outcome set is merged.
 */

import type { AggregateFailure, NamedTask, Result, TaskFailure, TaskOutcome } from '../types';
import { IncompleteResultError, errorMessage } from '../errors';
import { getLogger } from '../utils/logger';

/**
 * Tasks keyed by the role their payload plays in the merged result
 */
export type TaskSet<I> = Record<string, NamedTask<I, unknown>>;

export type PayloadsOf<S> = {
  [K in keyof S]: S[K] extends NamedTask<never, infer T> ? T : never;
};

export type MergeFn<S, R> = (payloads: PayloadsOf<S>) => R;

/**
 * Run a task and turn anything it throws into a failure outcome
 */
async function settle<I, T>(task: NamedTask<I, T>, input: I): Promise<TaskOutcome<T>> {
  const logger = getLogger();
  const startTime = Date.now();

  logger.taskEvent('started', task.name);

  let outcome: TaskOutcome<T>;
  try {
    outcome = await task.run(input);
  } catch (error) {
    outcome = { success: false, error: `${task.name} error: ${errorMessage(error)}` };
  }

  const durationMs = Date.now() - startTime;
  if (outcome.success) {
    logger.taskEvent('completed', task.name, { durationMs });
  } else {
    logger.taskEvent('failed', task.name, { durationMs, error: outcome.error });
  }

  return Object.freeze(outcome);
}

function isPayloadSet<S>(payloads: unknown, roles: readonly string[]): payloads is PayloadsOf<S> {
  if (typeof payloads !== 'object' || payloads === null) {
    return false;
  }
  return roles.every((role) => role in payloads);
}

/**
 * Execute every task concurrently and merge their payloads by role.
 *
 * Resolves with the merged value when all tasks succeed, or with every
 * failure message (in task declaration order) when any of them fails.
 * Throws {@link IncompleteResultError} if a task reports success without a payload.
 */
export async function runTaskGraph<I, S extends TaskSet<I>, R>(
  input: I,
  tasks: S,
  merge: MergeFn<S, R>
): Promise<Result<R, AggregateFailure>> {
  const roles = Object.keys(tasks);
  if (roles.length === 0) {
    throw new Error('Task graph requires at least one task');
  }

  // settle() still rejects if the log sink throws
  const settled = await Promise.allSettled(roles.map((role) => settle(tasks[role], input)));

  const failures: TaskFailure[] = [];
  const payloads: Record<string, unknown> = {};

  roles.forEach((role, index) => {
    const name = tasks[role].name;
    const result = settled[index];
    if (result.status === 'rejected') {
      failures.push({ task: name, message: `${name} error: ${errorMessage(result.reason)}` });
      return;
    }

    const outcome = result.value;
    if (outcome.success) {
      if (outcome.payload !== undefined) {
        payloads[role] = outcome.payload;
      }
    } else {
      failures.push({ task: name, message: outcome.error });
    }
  });

  getLogger().debug('Task graph settled', {
    tasks: roles.length,
    failed: failures.length,
  });

  if (failures.length > 0) {
    return { ok: false, error: { failures } };
  }

  const missing = roles.filter((role) => !(role in payloads));
  if (missing.length > 0 || !isPayloadSet<S>(payloads, roles)) {
    throw new IncompleteResultError(missing);
  }

  return { ok: true, value: merge(payloads) };
}
