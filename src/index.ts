export * from './shared/contracts';
export { ConfigStore, DEFAULT_POLICY_TUNING } from './main/services/config/ConfigStore';
export { SystemClock, TimerScheduler } from './main/services/evaluation/Clock';
export type { CancelScheduledTask, Clock, Scheduler } from './main/services/evaluation/Clock';
export { EvaluationContext } from './main/services/evaluation/EvaluationContext';
export { ComputedVariable, ConstVariable, SettableVariable, Variable } from './main/services/evaluation/Variable';
export { Logger } from './main/services/logging/Logger';
export type { LogEntry, LoggerLike, LogLevel } from './main/services/logging/Logger';
export { FallbackPolicy } from './main/services/policy/FallbackPolicy';
export { policyRequestName } from './main/services/policy/Policy';
export type { Policy, PolicyRequestArgs, PolicyRequestResults } from './main/services/policy/Policy';
export { StandardPolicy } from './main/services/policy/StandardPolicy';
export { createLocalState } from './main/services/state/LocalState';
export type { LocalState, LocalStateOptions } from './main/services/state/LocalState';
export type { State } from './main/services/state/State';
export { DevicePolicyStore } from './main/services/update/DevicePolicyStore';
export { UpdateAttemptStore } from './main/services/update/UpdateAttemptStore';
export type { UpdateAttemptRecord } from './main/services/update/UpdateAttemptStore';
export { createUpdateDecisionCore } from './main/services/update/UpdateDecisionCore';
export type { UpdateDecisionCore, UpdateDecisionCoreOptions } from './main/services/update/UpdateDecisionCore';
export { PolicyRequestCancelledError, UpdateManager } from './main/services/update/UpdateManager';
export type { UpdateManagerOptions } from './main/services/update/UpdateManager';
