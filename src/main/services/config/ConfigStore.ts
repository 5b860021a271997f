import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { PolicyTuning, UpdatePolicyConfig, UpdatePolicyConfigPatch } from '@shared/contracts';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const durationMs = z.number().int().nonnegative();

const tuningSchema = z.object({
  checkInitialIntervalMs: durationMs,
  checkPeriodicIntervalMs: durationMs.positive(),
  checkPeriodicFuzzMs: durationMs,
  checkMaxBackoffIntervalMs: durationMs.positive(),
  attemptBackoffBaseMs: durationMs.positive(),
  attemptBackoffMaxIntervalMs: durationMs.positive(),
  attemptBackoffFuzzMs: durationMs,
  fallbackCheckIntervalMs: durationMs.positive()
});

const configSchema = z.object({
  updatesEnabled: z.boolean(),
  oobeEnabled: z.boolean(),
  evaluationExpirationMs: durationMs.positive(),
  tuning: tuningSchema
});

export const DEFAULT_POLICY_TUNING: PolicyTuning = {
  checkInitialIntervalMs: 7 * MINUTE_MS,
  checkPeriodicIntervalMs: 45 * MINUTE_MS,
  checkPeriodicFuzzMs: 10 * MINUTE_MS,
  checkMaxBackoffIntervalMs: 4 * HOUR_MS,
  attemptBackoffBaseMs: DAY_MS,
  attemptBackoffMaxIntervalMs: 16 * DAY_MS,
  attemptBackoffFuzzMs: 12 * HOUR_MS,
  fallbackCheckIntervalMs: 15 * MINUTE_MS
};

const DEFAULT_CONFIG: UpdatePolicyConfig = {
  updatesEnabled: true,
  oobeEnabled: true,
  evaluationExpirationMs: DAY_MS,
  tuning: DEFAULT_POLICY_TUNING
};

export class ConfigStore {
  private readonly filePath: string;
  private cache: UpdatePolicyConfig;

  constructor(baseDir: string) {
    const configDir = path.join(baseDir, 'config');
    fs.mkdirSync(configDir, { recursive: true });
    this.filePath = path.join(configDir, 'update-policy.config.json');
    this.cache = this.load();
  }

  get(): UpdatePolicyConfig {
    return cloneConfig(this.cache);
  }

  update(patch: UpdatePolicyConfigPatch): UpdatePolicyConfig {
    const candidate: UpdatePolicyConfig = {
      updatesEnabled: patch.updatesEnabled ?? this.cache.updatesEnabled,
      oobeEnabled: patch.oobeEnabled ?? this.cache.oobeEnabled,
      evaluationExpirationMs: patch.evaluationExpirationMs ?? this.cache.evaluationExpirationMs,
      tuning: mergeTuning(this.cache.tuning, patch.tuning ?? {})
    };

    const parsed = configSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new Error(`Configuracao de politica invalida: ${formatIssues(parsed.error)}`);
    }

    this.cache = parsed.data;
    this.persist(this.cache);
    return this.get();
  }

  private load(): UpdatePolicyConfig {
    if (!fs.existsSync(this.filePath)) {
      this.persist(DEFAULT_CONFIG);
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = configSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
    } catch {
      // fallback
    }

    this.persist(DEFAULT_CONFIG);
    return cloneConfig(DEFAULT_CONFIG);
  }

  private persist(config: UpdatePolicyConfig): void {
    fs.writeFileSync(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}

function cloneConfig(config: UpdatePolicyConfig): UpdatePolicyConfig {
  return {
    ...config,
    tuning: { ...config.tuning }
  };
}

function mergeTuning(base: PolicyTuning, patch: Partial<PolicyTuning>): PolicyTuning {
  return {
    checkInitialIntervalMs: patch.checkInitialIntervalMs ?? base.checkInitialIntervalMs,
    checkPeriodicIntervalMs: patch.checkPeriodicIntervalMs ?? base.checkPeriodicIntervalMs,
    checkPeriodicFuzzMs: patch.checkPeriodicFuzzMs ?? base.checkPeriodicFuzzMs,
    checkMaxBackoffIntervalMs: patch.checkMaxBackoffIntervalMs ?? base.checkMaxBackoffIntervalMs,
    attemptBackoffBaseMs: patch.attemptBackoffBaseMs ?? base.attemptBackoffBaseMs,
    attemptBackoffMaxIntervalMs: patch.attemptBackoffMaxIntervalMs ?? base.attemptBackoffMaxIntervalMs,
    attemptBackoffFuzzMs: patch.attemptBackoffFuzzMs ?? base.attemptBackoffFuzzMs,
    fallbackCheckIntervalMs: patch.fallbackCheckIntervalMs ?? base.fallbackCheckIntervalMs
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
