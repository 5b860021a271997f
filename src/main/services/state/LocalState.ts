import { randomInt } from 'node:crypto';
import type {
  ConnectionTethering,
  ConnectionType,
  DevicePolicy,
  ForcedUpdateRequest,
  UpdatePolicyConfig
} from '@shared/contracts';
import { ComputedVariable, ConstVariable, SettableVariable } from '@main/services/evaluation/Variable';
import type {
  ConfigProvider,
  DevicePolicyProvider,
  NetworkProvider,
  RandomProvider,
  State,
  SystemProvider,
  UpdaterProvider
} from '@main/services/state/State';
import type { DevicePolicyStore } from '@main/services/update/DevicePolicyStore';

export class StaticConfigProvider implements ConfigProvider {
  readonly updatesEnabled: ConstVariable<boolean>;
  readonly isOobeEnabled: ConstVariable<boolean>;

  constructor(config: Pick<UpdatePolicyConfig, 'updatesEnabled' | 'oobeEnabled'>) {
    this.updatesEnabled = new ConstVariable('config.updates_enabled', config.updatesEnabled);
    this.isOobeEnabled = new ConstVariable('config.is_oobe_enabled', config.oobeEnabled);
  }
}

export class LocalSystemProvider implements SystemProvider {
  readonly isOobeComplete = new SettableVariable<boolean>('system.is_oobe_complete', false);
  readonly isBootDeviceRemovable: ConstVariable<boolean>;

  constructor(options: { bootDeviceRemovable?: boolean } = {}) {
    this.isBootDeviceRemovable = new ConstVariable('system.is_boot_device_removable', options.bootDeviceRemovable ?? false);
  }

  markOobeComplete(): void {
    this.isOobeComplete.set(true);
  }
}

export class LocalDevicePolicyProvider implements DevicePolicyProvider {
  readonly isPolicyLoaded = new SettableVariable<boolean>('device_policy.is_policy_loaded', false);
  readonly updateDisabled = new SettableVariable<boolean>('device_policy.update_disabled');
  readonly targetVersionPrefix = new SettableVariable<string>('device_policy.target_version_prefix');
  readonly releaseChannel = new SettableVariable<string>('device_policy.release_channel');
  readonly releaseChannelDelegated = new SettableVariable<boolean>('device_policy.release_channel_delegated');
  readonly scatterFactorMs = new SettableVariable<number>('device_policy.scatter_factor_ms');
  readonly allowedConnectionTypesForUpdate = new SettableVariable<ConnectionType[] | null>(
    'device_policy.allowed_connection_types_for_update'
  );
  readonly httpDownloadsEnabled = new SettableVariable<boolean>('device_policy.http_downloads_enabled');
  readonly p2pEnabled = new SettableVariable<boolean | null>('device_policy.p2p_enabled');

  apply(policy: DevicePolicy | null): void {
    if (!policy) {
      this.updateDisabled.unset();
      this.targetVersionPrefix.unset();
      this.releaseChannel.unset();
      this.releaseChannelDelegated.unset();
      this.scatterFactorMs.unset();
      this.allowedConnectionTypesForUpdate.unset();
      this.httpDownloadsEnabled.unset();
      this.p2pEnabled.unset();
      this.isPolicyLoaded.set(false);
      return;
    }

    this.updateDisabled.set(policy.updateDisabled);
    this.targetVersionPrefix.set(policy.targetVersionPrefix);
    this.releaseChannel.set(policy.releaseChannel);
    this.releaseChannelDelegated.set(policy.releaseChannelDelegated);
    this.scatterFactorMs.set(policy.scatterFactorMs);
    this.allowedConnectionTypesForUpdate.set(policy.allowedConnectionTypesForUpdate);
    this.httpDownloadsEnabled.set(policy.httpDownloadsEnabled);
    this.p2pEnabled.set(policy.p2pEnabled);
    // por ultimo: quem observa "carregada" deve encontrar os campos preenchidos
    this.isPolicyLoaded.set(true);
  }
}

export class LocalNetworkProvider implements NetworkProvider {
  readonly connectionType = new SettableVariable<ConnectionType>('network.connection_type');
  readonly connectionTethering = new SettableVariable<ConnectionTethering>('network.connection_tethering');

  setConnection(type: ConnectionType, tethering: ConnectionTethering = 'not-detected'): void {
    this.connectionType.set(type);
    this.connectionTethering.set(tethering);
  }

  setDisconnected(): void {
    this.connectionType.unset();
    this.connectionTethering.unset();
  }
}

export class CryptoRandomProvider implements RandomProvider {
  readonly seed = new ComputedVariable<number>('random.seed', 'const', () => randomInt(0, 2 ** 31));
}

export class LocalUpdaterProvider implements UpdaterProvider {
  readonly updaterStartedTime: ConstVariable<Date>;
  readonly lastCheckedTime = new SettableVariable<Date | null>('updater.last_checked_time', null);
  readonly consecutiveFailedUpdateChecks = new SettableVariable<number>('updater.consecutive_failed_update_checks', 0);
  readonly serverDictatedPollIntervalMs = new SettableVariable<number>('updater.server_dictated_poll_interval_ms', 0);
  readonly forcedUpdateRequested = new SettableVariable<ForcedUpdateRequest>('updater.forced_update_requested', 'none');
  readonly cellularEnabled = new SettableVariable<boolean>('updater.cellular_enabled', false);
  readonly p2pEnabled = new SettableVariable<boolean>('updater.p2p_enabled', false);

  constructor(startedAt: Date) {
    this.updaterStartedTime = new ConstVariable('updater.updater_started_time', new Date(startedAt.getTime()));
  }

  recordCheck(at: Date, succeeded: boolean, serverDictatedPollIntervalMs = 0): void {
    const failures = this.consecutiveFailedUpdateChecks.read();
    const previousFailures = failures.ok ? failures.value : 0;

    this.lastCheckedTime.set(new Date(at.getTime()));
    this.consecutiveFailedUpdateChecks.set(succeeded ? 0 : previousFailures + 1);
    this.serverDictatedPollIntervalMs.set(Math.max(0, Math.trunc(serverDictatedPollIntervalMs)));
    this.forcedUpdateRequested.set('none');
  }

  requestForcedUpdate(interactive: boolean): void {
    this.forcedUpdateRequested.set(interactive ? 'interactive' : 'periodic');
  }

  setCellularEnabled(enabled: boolean): void {
    this.cellularEnabled.set(enabled);
  }

  setP2pEnabled(enabled: boolean): void {
    this.p2pEnabled.set(enabled);
  }
}

export interface LocalState extends State {
  readonly config: StaticConfigProvider;
  readonly system: LocalSystemProvider;
  readonly devicePolicy: LocalDevicePolicyProvider;
  readonly network: LocalNetworkProvider;
  readonly random: RandomProvider;
  readonly updater: LocalUpdaterProvider;
  dispose(): void;
}

export interface LocalStateOptions {
  config: Pick<UpdatePolicyConfig, 'updatesEnabled' | 'oobeEnabled'>;
  startedAt: Date;
  devicePolicyStore?: DevicePolicyStore;
  random?: RandomProvider;
  bootDeviceRemovable?: boolean;
}

export function createLocalState(options: LocalStateOptions): LocalState {
  const devicePolicy = new LocalDevicePolicyProvider();
  let unsubscribe: (() => void) | null = null;
  if (options.devicePolicyStore) {
    devicePolicy.apply(options.devicePolicyStore.get());
    unsubscribe = options.devicePolicyStore.subscribe((policy) => devicePolicy.apply(policy));
  }

  return {
    config: new StaticConfigProvider(options.config),
    system: new LocalSystemProvider({ bootDeviceRemovable: options.bootDeviceRemovable }),
    devicePolicy,
    network: new LocalNetworkProvider(),
    random: options.random ?? new CryptoRandomProvider(),
    updater: new LocalUpdaterProvider(options.startedAt),
    dispose: () => {
      unsubscribe?.();
      unsubscribe = null;
    }
  };
}
