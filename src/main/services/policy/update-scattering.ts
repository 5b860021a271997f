import type { UpdateState } from '@shared/contracts';
import type { EvaluationContext } from '@main/services/evaluation/EvaluationContext';
import { requireValue } from '@main/services/policy/Policy';
import { createPrng } from '@main/services/policy/prng';
import type { State } from '@main/services/state/State';

export type ScatteringDecision =
  | { kind: 'clear'; waitPeriodMs: number; checkThreshold: number }
  | { kind: 'scattering'; waitPeriodMs: number; checkThreshold: number }
  | { kind: 'wait'; waitPeriodMs: number; checkThreshold: number };

/**
 * Espalhamento do inicio do update pela frota. Periodo de espera e limiar de
 * verificacoes sao sorteados uma vez por payload (quando ainda zerados ou fora
 * dos limites atuais) e mantidos ate serem satisfeitos.
 *
 * `wait` so e devolvido quando nada novo precisa ser persistido e o que falta
 * e apenas o prazo `firstSeen + waitPeriodMs`, ja registrado no contexto.
 */
export function resolveScattering(ec: EvaluationContext, state: State, updateState: UpdateState): ScatteringDecision {
  const waitCapMs = effectiveWaitCapMs(ec, state, updateState);
  const thresholdMin = Math.max(0, updateState.scatterCheckThresholdMin);
  const thresholdMax = updateState.scatterCheckThresholdMax;

  const keepWait = updateState.scatterWaitPeriodMs > 0 && updateState.scatterWaitPeriodMs <= waitCapMs;
  const keepThreshold =
    updateState.scatterCheckThreshold > 0 &&
    updateState.scatterCheckThreshold >= thresholdMin &&
    updateState.scatterCheckThreshold <= thresholdMax;

  let waitPeriodMs = keepWait ? updateState.scatterWaitPeriodMs : 0;
  let checkThreshold = keepThreshold ? updateState.scatterCheckThreshold : 0;

  if (!keepWait || !keepThreshold) {
    const prng = createPrng(requireValue(ec, state.random.seed));
    if (!keepWait && waitCapMs > 0) {
      waitPeriodMs = prng.randInt(1, waitCapMs);
    }
    const lowestThreshold = Math.max(thresholdMin, 1);
    if (!keepThreshold && thresholdMax >= lowestThreshold) {
      checkThreshold = prng.randInt(lowestThreshold, thresholdMax);
    }
  }

  // now >= firstSeen + wait, com a comparacao estrita do contexto
  const waitSatisfied =
    waitPeriodMs === 0 || ec.isWallclockTimeGreaterThan(new Date(updateState.firstSeen.getTime() + waitPeriodMs - 1));
  const checksSatisfied = checkThreshold === 0 || updateState.numChecks >= checkThreshold;

  if (waitSatisfied && checksSatisfied) {
    return { kind: 'clear', waitPeriodMs, checkThreshold };
  }

  const changed =
    waitPeriodMs !== updateState.scatterWaitPeriodMs || checkThreshold !== updateState.scatterCheckThreshold;
  if (!changed && !waitSatisfied && checksSatisfied) {
    return { kind: 'wait', waitPeriodMs, checkThreshold };
  }

  return { kind: 'scattering', waitPeriodMs, checkThreshold };
}

function effectiveWaitCapMs(ec: EvaluationContext, state: State, updateState: UpdateState): number {
  let capMs = Math.max(0, updateState.scatterWaitPeriodMaxMs);
  if (requireValue(ec, state.devicePolicy.isPolicyLoaded)) {
    const scatterFactorMs = requireValue(ec, state.devicePolicy.scatterFactorMs);
    if (scatterFactorMs > 0) {
      capMs = Math.min(capMs, scatterFactorMs);
    }
  }
  return capMs;
}
