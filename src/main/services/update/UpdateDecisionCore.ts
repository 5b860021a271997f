import { ConfigStore } from '@main/services/config/ConfigStore';
import { SystemClock, TimerScheduler, type Clock, type Scheduler } from '@main/services/evaluation/Clock';
import { Logger, type LoggerLike } from '@main/services/logging/Logger';
import { FallbackPolicy } from '@main/services/policy/FallbackPolicy';
import { StandardPolicy } from '@main/services/policy/StandardPolicy';
import { createLocalState, type LocalState } from '@main/services/state/LocalState';
import type { RandomProvider } from '@main/services/state/State';
import { DevicePolicyStore } from '@main/services/update/DevicePolicyStore';
import { UpdateAttemptStore } from '@main/services/update/UpdateAttemptStore';
import { UpdateManager } from '@main/services/update/UpdateManager';

export interface UpdateDecisionCoreOptions {
  clock?: Clock;
  scheduler?: Scheduler;
  logger?: LoggerLike;
  random?: RandomProvider;
  bootDeviceRemovable?: boolean;
  useFallbackPolicy?: boolean;
}

export interface UpdateDecisionCore {
  readonly config: ConfigStore;
  readonly logger: LoggerLike;
  readonly devicePolicy: DevicePolicyStore;
  readonly attempts: UpdateAttemptStore;
  readonly state: LocalState;
  readonly manager: UpdateManager;
  dispose(): void;
}

export function createUpdateDecisionCore(baseDir: string, options: UpdateDecisionCoreOptions = {}): UpdateDecisionCore {
  const clock = options.clock ?? new SystemClock();
  const scheduler = options.scheduler ?? new TimerScheduler();
  const logger = options.logger ?? new Logger(baseDir);
  const config = new ConfigStore(baseDir);
  const devicePolicy = new DevicePolicyStore(baseDir);
  const attempts = new UpdateAttemptStore(baseDir);
  const settings = config.get();

  const state = createLocalState({
    config: settings,
    startedAt: clock.getWallclockTime(),
    devicePolicyStore: devicePolicy,
    random: options.random,
    bootDeviceRemovable: options.bootDeviceRemovable
  });

  const manager = new UpdateManager(new StandardPolicy(settings.tuning), state, clock, scheduler, logger, {
    expirationMs: settings.evaluationExpirationMs,
    fallbackPolicy: options.useFallbackPolicy === false ? null : new FallbackPolicy(settings.tuning)
  });

  logger.info('update.core.started', {
    updatesEnabled: settings.updatesEnabled,
    oobeEnabled: settings.oobeEnabled,
    devicePolicyLoaded: devicePolicy.get() !== null
  });

  return {
    config,
    logger,
    devicePolicy,
    attempts,
    state,
    manager,
    dispose: () => {
      manager.dispose();
      state.dispose();
      logger.info('update.core.stopped');
    }
  };
}
