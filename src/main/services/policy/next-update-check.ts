import type { PolicyTuning } from '@shared/contracts';
import type { EvaluationContext } from '@main/services/evaluation/EvaluationContext';
import { requireValue } from '@main/services/policy/Policy';
import { createPrng, fuzzedInterval } from '@main/services/policy/prng';
import type { State } from '@main/services/state/State';

type CheckScheduleTuning = Pick<
  PolicyTuning,
  'checkInitialIntervalMs' | 'checkPeriodicIntervalMs' | 'checkPeriodicFuzzMs' | 'checkMaxBackoffIntervalMs'
>;

export function nextUpdateCheckTime(ec: EvaluationContext, state: State, tuning: CheckScheduleTuning): Date {
  const startedAt = requireValue(ec, state.updater.updaterStartedTime);
  const lastCheckedAt = requireValue(ec, state.updater.lastCheckedTime);
  const prng = createPrng(requireValue(ec, state.random.seed));

  // primeira verificacao desde que o updater subiu
  if (!lastCheckedAt || lastCheckedAt.getTime() < startedAt.getTime()) {
    return new Date(startedAt.getTime() + fuzzedInterval(prng, tuning.checkInitialIntervalMs, tuning.checkPeriodicFuzzMs));
  }

  const { intervalMs, fuzzMs } = periodicCheckInterval(
    requireValue(ec, state.updater.serverDictatedPollIntervalMs),
    requireValue(ec, state.updater.consecutiveFailedUpdateChecks),
    tuning
  );

  return new Date(lastCheckedAt.getTime() + fuzzedInterval(prng, intervalMs, fuzzMs));
}

export function periodicCheckInterval(
  serverDictatedPollIntervalMs: number,
  consecutiveFailedChecks: number,
  tuning: CheckScheduleTuning
): { intervalMs: number; fuzzMs: number } {
  let intervalMs = Math.max(0, serverDictatedPollIntervalMs);

  if (intervalMs === 0) {
    intervalMs = tuning.checkPeriodicIntervalMs;
    let remaining = Math.max(0, Math.trunc(consecutiveFailedChecks));
    while (intervalMs < tuning.checkMaxBackoffIntervalMs && remaining > 0) {
      intervalMs *= 2;
      remaining -= 1;
    }
  }

  intervalMs = Math.min(intervalMs, tuning.checkMaxBackoffIntervalMs);
  if (intervalMs <= tuning.checkPeriodicIntervalMs) {
    return { intervalMs: tuning.checkPeriodicIntervalMs, fuzzMs: tuning.checkPeriodicFuzzMs };
  }

  // fora do intervalo regular o fuzz acompanha o proprio intervalo (+/- metade)
  return { intervalMs, fuzzMs: intervalMs };
}
