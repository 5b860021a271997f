import type { ConnectionTethering, ConnectionType, ForcedUpdateRequest } from '@shared/contracts';
import type { Variable } from '@main/services/evaluation/Variable';

export interface ConfigProvider {
  readonly updatesEnabled: Variable<boolean>;
  readonly isOobeEnabled: Variable<boolean>;
}

export interface SystemProvider {
  readonly isOobeComplete: Variable<boolean>;
  readonly isBootDeviceRemovable: Variable<boolean>;
}

export interface DevicePolicyProvider {
  readonly isPolicyLoaded: Variable<boolean>;
  readonly updateDisabled: Variable<boolean>;
  readonly targetVersionPrefix: Variable<string>;
  readonly releaseChannel: Variable<string>;
  readonly releaseChannelDelegated: Variable<boolean>;
  readonly scatterFactorMs: Variable<number>;
  readonly allowedConnectionTypesForUpdate: Variable<ConnectionType[] | null>;
  readonly httpDownloadsEnabled: Variable<boolean>;
  readonly p2pEnabled: Variable<boolean | null>;
}

export interface NetworkProvider {
  readonly connectionType: Variable<ConnectionType>;
  readonly connectionTethering: Variable<ConnectionTethering>;
}

export interface RandomProvider {
  readonly seed: Variable<number>;
}

export interface UpdaterProvider {
  readonly updaterStartedTime: Variable<Date>;
  readonly lastCheckedTime: Variable<Date | null>;
  readonly consecutiveFailedUpdateChecks: Variable<number>;
  readonly serverDictatedPollIntervalMs: Variable<number>;
  readonly forcedUpdateRequested: Variable<ForcedUpdateRequest>;
  readonly cellularEnabled: Variable<boolean>;
  readonly p2pEnabled: Variable<boolean>;
}

export interface State {
  readonly config: ConfigProvider;
  readonly system: SystemProvider;
  readonly devicePolicy: DevicePolicyProvider;
  readonly network: NetworkProvider;
  readonly random: RandomProvider;
  readonly updater: UpdaterProvider;
}
