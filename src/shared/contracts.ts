export type EvalStatus = 'failed' | 'succeeded' | 'ask-me-again-later';

export type SettledPolicyEvaluation<T> = { status: 'succeeded'; result: T } | { status: 'failed'; error: string };

export type PolicyEvaluation<T> = SettledPolicyEvaluation<T> | { status: 'ask-me-again-later' };

export type PolicyRequest = 'UpdateCheckAllowed' | 'UpdateCanStart' | 'UpdateDownloadAllowed';

export interface UpdateCheckParams {
  updatesEnabled: boolean;
  // '' quando a politica nao impoe prefixo/canal
  targetVersionPrefix: string;
  targetChannel: string;
  isInteractive: boolean;
}

export type DownloadErrorKind =
  | 'payload-hash-mismatch'
  | 'payload-size-mismatch'
  | 'signature-invalid'
  | 'transfer-error'
  | 'timeout'
  | 'http-error'
  | 'user-cancelled'
  | 'service-error';

export interface DownloadErrorRecord {
  urlIdx: number;
  kind: DownloadErrorKind;
  time: Date;
}

export interface UpdateState {
  isInteractive: boolean;
  isDeltaPayload: boolean;
  firstSeen: Date;
  numChecks: number;
  numFailures: number;
  failuresLastUpdated: Date | null;

  downloadUrls: string[];
  downloadErrorsMax: number;
  lastDownloadUrlIdx: number;
  lastDownloadUrlNumErrors: number;
  downloadErrors: DownloadErrorRecord[];

  backoffExpiry: Date | null;
  isBackoffDisabled: boolean;

  scatterWaitPeriodMs: number;
  scatterCheckThreshold: number;
  scatterWaitPeriodMaxMs: number;
  scatterCheckThresholdMin: number;
  scatterCheckThresholdMax: number;
}

export type UpdateCannotStartReason = 'none' | 'check-due' | 'scattering' | 'backoff' | 'cannot-download';

export interface UpdateDownloadParams {
  updateCanStart: boolean;
  cannotStartReason: UpdateCannotStartReason;
  downloadUrlIdx: number;
  downloadUrlNumErrors: number;
  p2pAllowed: boolean;
  doIncrementFailures: boolean;
  backoffExpiry: Date | null;
  scatterWaitPeriodMs: number;
  scatterCheckThreshold: number;
}

export type ConnectionType = 'ethernet' | 'wifi' | 'wimax' | 'bluetooth' | 'cellular' | 'unknown';
export type ConnectionTethering = 'not-detected' | 'suspected' | 'confirmed' | 'unknown';
export type ForcedUpdateRequest = 'none' | 'interactive' | 'periodic';

export interface DevicePolicy {
  updateDisabled: boolean;
  targetVersionPrefix: string;
  releaseChannel: string;
  releaseChannelDelegated: boolean;
  scatterFactorMs: number;
  allowedConnectionTypesForUpdate: ConnectionType[] | null;
  httpDownloadsEnabled: boolean;
  p2pEnabled: boolean | null;
  updatedAt: string;
}

export type DevicePolicyPatch = Partial<Omit<DevicePolicy, 'updatedAt'>>;

export interface PolicyTuning {
  checkInitialIntervalMs: number;
  checkPeriodicIntervalMs: number;
  checkPeriodicFuzzMs: number;
  checkMaxBackoffIntervalMs: number;
  attemptBackoffBaseMs: number;
  attemptBackoffMaxIntervalMs: number;
  attemptBackoffFuzzMs: number;
  fallbackCheckIntervalMs: number;
}

export interface UpdatePolicyConfig {
  updatesEnabled: boolean;
  oobeEnabled: boolean;
  evaluationExpirationMs: number;
  tuning: PolicyTuning;
}

export interface UpdatePolicyConfigPatch {
  updatesEnabled?: boolean;
  oobeEnabled?: boolean;
  evaluationExpirationMs?: number;
  tuning?: Partial<PolicyTuning>;
}

// Dados fornecidos pelo servico de update para o payload atual.
export interface UpdateOffer {
  payloadId: string;
  isDeltaPayload: boolean;
  downloadUrls: string[];
  downloadErrorsMax: number;
  isBackoffDisabled: boolean;
  scatterWaitPeriodMaxMs: number;
  scatterCheckThresholdMin: number;
  scatterCheckThresholdMax: number;
}
