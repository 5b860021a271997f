import type { PolicyEvaluation, PolicyTuning, UpdateCheckParams, UpdateDownloadParams, UpdateState } from '@shared/contracts';
import { DEFAULT_POLICY_TUNING } from '@main/services/config/ConfigStore';
import type { EvaluationContext } from '@main/services/evaluation/EvaluationContext';
import { askMeAgainLater, succeeded, type Policy } from '@main/services/policy/Policy';
import type { State } from '@main/services/state/State';

/**
 * Politica permissiva usada quando a politica principal falha. Nunca devolve
 * "failed": variaveis ilegiveis assumem o valor mais conservador que ainda
 * deixa o dispositivo se atualizar.
 */
export class FallbackPolicy implements Policy {
  readonly name = 'FallbackPolicy';

  constructor(private readonly tuning: Pick<PolicyTuning, 'fallbackCheckIntervalMs'> = DEFAULT_POLICY_TUNING) {}

  updateCheckAllowed(ec: EvaluationContext, state: State): PolicyEvaluation<UpdateCheckParams> {
    const forced = ec.getValue(state.updater.forcedUpdateRequested) ?? 'none';
    const params: UpdateCheckParams = {
      updatesEnabled: true,
      targetVersionPrefix: '',
      targetChannel: '',
      isInteractive: forced === 'interactive'
    };
    if (forced !== 'none') {
      return succeeded(params);
    }

    const lastCheckedAt = ec.getValue(state.updater.lastCheckedTime) ?? null;
    if (
      lastCheckedAt === null ||
      ec.isWallclockTimeGreaterThan(new Date(lastCheckedAt.getTime() + this.tuning.fallbackCheckIntervalMs))
    ) {
      return succeeded(params);
    }

    return askMeAgainLater();
  }

  updateCanStart(_ec: EvaluationContext, _state: State, updateState: UpdateState): PolicyEvaluation<UpdateDownloadParams> {
    const hasUrl = updateState.downloadUrls.length > 0;
    return succeeded({
      updateCanStart: hasUrl,
      cannotStartReason: hasUrl ? 'none' : 'cannot-download',
      downloadUrlIdx: hasUrl ? 0 : -1,
      downloadUrlNumErrors: hasUrl && updateState.lastDownloadUrlIdx === 0 ? updateState.lastDownloadUrlNumErrors : 0,
      p2pAllowed: false,
      doIncrementFailures: false,
      backoffExpiry: updateState.backoffExpiry,
      scatterWaitPeriodMs: updateState.scatterWaitPeriodMs,
      scatterCheckThreshold: updateState.scatterCheckThreshold
    });
  }

  updateDownloadAllowed(_ec: EvaluationContext, _state: State): PolicyEvaluation<boolean> {
    return succeeded(true);
  }
}
