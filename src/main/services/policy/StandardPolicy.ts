import type {
  ConnectionType,
  PolicyEvaluation,
  PolicyTuning,
  UpdateCheckParams,
  UpdateDownloadParams,
  UpdateState
} from '@shared/contracts';
import { DEFAULT_POLICY_TUNING } from '@main/services/config/ConfigStore';
import type { EvaluationContext } from '@main/services/evaluation/EvaluationContext';
import { backoffIntervalMs, findInvalidDownloadError, selectDownloadUrl } from '@main/services/policy/download-backoff';
import { nextUpdateCheckTime } from '@main/services/policy/next-update-check';
import {
  askMeAgainLater,
  evaluateGuarded,
  failed,
  policyRequestName,
  requireValue,
  succeeded,
  type Policy
} from '@main/services/policy/Policy';
import { createPrng } from '@main/services/policy/prng';
import { resolveScattering } from '@main/services/policy/update-scattering';
import type { State } from '@main/services/state/State';

export class StandardPolicy implements Policy {
  readonly name = 'StandardPolicy';

  constructor(private readonly tuning: PolicyTuning = DEFAULT_POLICY_TUNING) {}

  updateCheckAllowed(ec: EvaluationContext, state: State): PolicyEvaluation<UpdateCheckParams> {
    return evaluateGuarded(policyRequestName(this, 'UpdateCheckAllowed'), () => {
      const params: UpdateCheckParams = {
        updatesEnabled: true,
        targetVersionPrefix: '',
        targetChannel: '',
        isInteractive: false
      };

      if (!requireValue(ec, state.config.updatesEnabled) || requireValue(ec, state.system.isBootDeviceRemovable)) {
        return succeeded({ ...params, updatesEnabled: false });
      }

      if (requireValue(ec, state.devicePolicy.isPolicyLoaded)) {
        // desabilitado pela politica: espera a politica mudar
        if (requireValue(ec, state.devicePolicy.updateDisabled)) {
          return askMeAgainLater();
        }

        params.targetVersionPrefix = requireValue(ec, state.devicePolicy.targetVersionPrefix);
        if (!requireValue(ec, state.devicePolicy.releaseChannelDelegated)) {
          params.targetChannel = requireValue(ec, state.devicePolicy.releaseChannel);
        }
      }

      const forced = requireValue(ec, state.updater.forcedUpdateRequested);
      if (forced !== 'none') {
        return succeeded({ ...params, isInteractive: forced === 'interactive' });
      }

      if (requireValue(ec, state.config.isOobeEnabled) && !requireValue(ec, state.system.isOobeComplete)) {
        return askMeAgainLater();
      }

      const nextCheck = nextUpdateCheckTime(ec, state, this.tuning);
      if (!ec.isWallclockTimeGreaterThan(nextCheck)) {
        return askMeAgainLater();
      }

      return succeeded(params);
    });
  }

  updateCanStart(ec: EvaluationContext, state: State, updateState: UpdateState): PolicyEvaluation<UpdateDownloadParams> {
    const requestName = policyRequestName(this, 'UpdateCanStart');
    const violation = describeUpdateStateViolation(updateState);
    if (violation) {
      return failed(`${requestName}: ${violation}`);
    }

    return evaluateGuarded(requestName, () => {
      const now = ec.getEvaluationStartWallclock();
      const params: UpdateDownloadParams = {
        updateCanStart: false,
        cannotStartReason: 'none',
        downloadUrlIdx: updateState.lastDownloadUrlIdx,
        downloadUrlNumErrors: updateState.lastDownloadUrlNumErrors,
        p2pAllowed: false,
        doIncrementFailures: false,
        backoffExpiry: updateState.backoffExpiry,
        scatterWaitPeriodMs: updateState.scatterWaitPeriodMs,
        scatterCheckThreshold: updateState.scatterCheckThreshold
      };

      if (
        !updateState.isBackoffDisabled &&
        !updateState.isInteractive &&
        updateState.backoffExpiry !== null &&
        now.getTime() < updateState.backoffExpiry.getTime()
      ) {
        return succeeded({ ...params, cannotStartReason: 'backoff' });
      }

      if (!updateState.isInteractive) {
        const scattering = resolveScattering(ec, state, updateState);
        params.scatterWaitPeriodMs = scattering.waitPeriodMs;
        params.scatterCheckThreshold = scattering.checkThreshold;

        if (scattering.kind === 'wait') {
          return askMeAgainLater();
        }
        if (scattering.kind === 'scattering') {
          return succeeded({ ...params, cannotStartReason: 'scattering' });
        }
      }

      const policyLoaded = requireValue(ec, state.devicePolicy.isPolicyLoaded);
      const httpAllowed = policyLoaded ? requireValue(ec, state.devicePolicy.httpDownloadsEnabled) : true;
      const selection = selectDownloadUrl(updateState, httpAllowed);
      const p2pAllowed = this.isP2pAllowed(ec, state, policyLoaded);

      if (selection.urlIdx >= 0) {
        return succeeded({
          ...params,
          updateCanStart: true,
          downloadUrlIdx: selection.urlIdx,
          downloadUrlNumErrors: selection.numErrors,
          p2pAllowed
        });
      }

      if (p2pAllowed) {
        return succeeded({
          ...params,
          updateCanStart: true,
          downloadUrlIdx: -1,
          downloadUrlNumErrors: 0,
          p2pAllowed: true
        });
      }

      const backoffExpiry = updateState.isBackoffDisabled
        ? updateState.backoffExpiry
        : new Date(
            now.getTime() +
              backoffIntervalMs(updateState.numFailures + 1, this.tuning, createPrng(requireValue(ec, state.random.seed)))
          );

      return succeeded({
        ...params,
        cannotStartReason: 'cannot-download',
        downloadUrlIdx: -1,
        downloadUrlNumErrors: 0,
        doIncrementFailures: true,
        backoffExpiry
      });
    });
  }

  updateDownloadAllowed(ec: EvaluationContext, state: State): PolicyEvaluation<boolean> {
    return evaluateGuarded(policyRequestName(this, 'UpdateDownloadAllowed'), () => {
      let connectionType: ConnectionType = requireValue(ec, state.network.connectionType);
      if (requireValue(ec, state.network.connectionTethering) === 'confirmed') {
        connectionType = 'cellular';
      }

      switch (connectionType) {
        case 'bluetooth':
          return succeeded(false);
        case 'cellular': {
          if (requireValue(ec, state.devicePolicy.isPolicyLoaded)) {
            const allowedTypes = requireValue(ec, state.devicePolicy.allowedConnectionTypesForUpdate);
            if (allowedTypes !== null) {
              return succeeded(allowedTypes.includes('cellular'));
            }
          }
          return succeeded(requireValue(ec, state.updater.cellularEnabled));
        }
        default:
          return succeeded(true);
      }
    });
  }

  private isP2pAllowed(ec: EvaluationContext, state: State, policyLoaded: boolean): boolean {
    if (policyLoaded) {
      const fromPolicy = requireValue(ec, state.devicePolicy.p2pEnabled);
      if (fromPolicy !== null) {
        return fromPolicy;
      }
    }
    return requireValue(ec, state.updater.p2pEnabled);
  }
}

export function describeUpdateStateViolation(updateState: UpdateState): string | null {
  const urlCount = updateState.downloadUrls.length;
  if (
    !Number.isInteger(updateState.lastDownloadUrlIdx) ||
    updateState.lastDownloadUrlIdx < -1 ||
    updateState.lastDownloadUrlIdx >= urlCount
  ) {
    return `lastDownloadUrlIdx=${updateState.lastDownloadUrlIdx} fora do intervalo [-1, ${urlCount - 1}].`;
  }
  if (!Number.isInteger(updateState.downloadErrorsMax) || updateState.downloadErrorsMax < 0) {
    return `downloadErrorsMax=${updateState.downloadErrorsMax} deve ser um inteiro >= 0.`;
  }
  if (!Number.isInteger(updateState.numChecks) || updateState.numChecks < 0) {
    return `numChecks=${updateState.numChecks} deve ser um inteiro >= 0.`;
  }
  if (updateState.lastDownloadUrlNumErrors < 0) {
    return `lastDownloadUrlNumErrors=${updateState.lastDownloadUrlNumErrors} deve ser >= 0.`;
  }

  const invalidError = findInvalidDownloadError(updateState);
  if (invalidError) {
    return `downloadErrors contem urlIdx=${invalidError.urlIdx} fora do intervalo [0, ${urlCount - 1}].`;
  }

  return null;
}
