import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { DevicePolicy, DevicePolicyPatch } from '@shared/contracts';

interface PersistedDevicePolicyFile {
  policy: DevicePolicy | null;
}

type DevicePolicyListener = (policy: DevicePolicy | null) => void;

const connectionTypeSchema = z.enum(['ethernet', 'wifi', 'wimax', 'bluetooth', 'cellular', 'unknown']);

const devicePolicySchema = z.object({
  updateDisabled: z.boolean(),
  targetVersionPrefix: z.string(),
  releaseChannel: z.string(),
  releaseChannelDelegated: z.boolean(),
  scatterFactorMs: z.number().int().nonnegative(),
  allowedConnectionTypesForUpdate: z.array(connectionTypeSchema).nullable(),
  httpDownloadsEnabled: z.boolean(),
  p2pEnabled: z.boolean().nullable(),
  updatedAt: z.string().datetime()
});

const DEFAULT_DEVICE_POLICY_BASE = {
  updateDisabled: false,
  targetVersionPrefix: '',
  releaseChannel: '',
  releaseChannelDelegated: true,
  scatterFactorMs: 0,
  allowedConnectionTypesForUpdate: null,
  httpDownloadsEnabled: true,
  p2pEnabled: null
} as const;

/**
 * Documento de politica do dispositivo gerenciado. `null` significa
 * dispositivo sem politica carregada.
 */
export class DevicePolicyStore {
  private readonly filePath: string;
  private readonly listeners = new Set<DevicePolicyListener>();
  private cache: DevicePolicy | null;

  constructor(baseDir: string) {
    const updateDir = path.join(baseDir, 'updates');
    fs.mkdirSync(updateDir, { recursive: true });
    this.filePath = path.join(updateDir, 'device-policy.json');
    this.cache = this.load();
  }

  get(): DevicePolicy | null {
    return this.cache ? clonePolicy(this.cache) : null;
  }

  set(patch: DevicePolicyPatch): DevicePolicy {
    const base = this.cache ?? createDefaultPolicy();
    const next: DevicePolicy = {
      updateDisabled: patch.updateDisabled ?? base.updateDisabled,
      targetVersionPrefix: patch.targetVersionPrefix?.trim() ?? base.targetVersionPrefix,
      releaseChannel: patch.releaseChannel?.trim() ?? base.releaseChannel,
      releaseChannelDelegated: patch.releaseChannelDelegated ?? base.releaseChannelDelegated,
      scatterFactorMs: patch.scatterFactorMs ?? base.scatterFactorMs,
      allowedConnectionTypesForUpdate:
        patch.allowedConnectionTypesForUpdate === undefined
          ? base.allowedConnectionTypesForUpdate
          : patch.allowedConnectionTypesForUpdate,
      httpDownloadsEnabled: patch.httpDownloadsEnabled ?? base.httpDownloadsEnabled,
      p2pEnabled: patch.p2pEnabled === undefined ? base.p2pEnabled : patch.p2pEnabled,
      updatedAt: new Date().toISOString()
    };

    const parsed = devicePolicySchema.safeParse(next);
    if (!parsed.success) {
      throw new Error(
        `Politica de dispositivo invalida: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
      );
    }

    this.commit(parsed.data);
    return clonePolicy(parsed.data);
  }

  clear(): void {
    this.commit(null);
  }

  subscribe(listener: DevicePolicyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(policy: DevicePolicy | null): void {
    this.cache = policy;
    this.persist(policy);
    for (const listener of this.listeners) {
      listener(this.get());
    }
  }

  private load(): DevicePolicy | null {
    if (!fs.existsSync(this.filePath)) {
      this.persist(null);
      return null;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const parsed = z.object({ policy: devicePolicySchema.nullable() }).safeParse(raw);
      if (parsed.success) {
        return parsed.data.policy;
      }
    } catch {
      // arquivo corrompido: trata como dispositivo sem politica
    }

    this.persist(null);
    return null;
  }

  private persist(policy: DevicePolicy | null): void {
    const file: PersistedDevicePolicyFile = { policy };
    fs.writeFileSync(this.filePath, JSON.stringify(file, null, 2), 'utf-8');
  }
}

function createDefaultPolicy(): DevicePolicy {
  return {
    ...DEFAULT_DEVICE_POLICY_BASE,
    updatedAt: new Date().toISOString()
  };
}

function clonePolicy(policy: DevicePolicy): DevicePolicy {
  return {
    ...policy,
    allowedConnectionTypesForUpdate: policy.allowedConnectionTypesForUpdate
      ? policy.allowedConnectionTypesForUpdate.slice()
      : null
  };
}
