import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type {
  DownloadErrorKind,
  DownloadErrorRecord,
  UpdateDownloadParams,
  UpdateOffer,
  UpdateState
} from '@shared/contracts';

export interface UpdateAttemptRecord {
  payloadId: string | null;
  firstSeen: Date | null;
  numChecks: number;
  numFailures: number;
  failuresLastUpdated: Date | null;
  lastDownloadUrlIdx: number;
  lastDownloadUrlNumErrors: number;
  downloadErrors: DownloadErrorRecord[];
  backoffExpiry: Date | null;
  scatterWaitPeriodMs: number;
  scatterCheckThreshold: number;
}

const isoDate = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

const counter = z.number().int().nonnegative();

const downloadErrorKindSchema = z.enum([
  'payload-hash-mismatch',
  'payload-size-mismatch',
  'signature-invalid',
  'transfer-error',
  'timeout',
  'http-error',
  'user-cancelled',
  'service-error'
]);

const persistedAttemptSchema = z.object({
  attempt: z.object({
    payloadId: z.string().min(1).nullable(),
    firstSeen: isoDate.nullable(),
    numChecks: counter,
    numFailures: counter,
    failuresLastUpdated: isoDate.nullable(),
    lastDownloadUrlIdx: z.number().int().min(-1),
    lastDownloadUrlNumErrors: counter,
    downloadErrors: z.array(
      z.object({
        urlIdx: z.number().int().nonnegative(),
        kind: downloadErrorKindSchema,
        time: isoDate
      })
    ),
    backoffExpiry: isoDate.nullable(),
    scatterWaitPeriodMs: counter,
    scatterCheckThreshold: counter
  })
});

/**
 * Historico persistido da tentativa de update do payload atual: e daqui que o
 * driver monta o UpdateState de cada chamada e para onde devolve os campos de
 * retorno de UpdateDownloadParams.
 */
export class UpdateAttemptStore {
  private readonly filePath: string;
  private cache: UpdateAttemptRecord;

  constructor(baseDir: string) {
    const updateDir = path.join(baseDir, 'updates');
    fs.mkdirSync(updateDir, { recursive: true });
    this.filePath = path.join(updateDir, 'attempt.json');
    this.cache = this.load();
  }

  get(): UpdateAttemptRecord {
    return cloneRecord(this.cache);
  }

  recordUpdateOffered(payloadId: string, now: Date): UpdateAttemptRecord {
    if (this.cache.payloadId === payloadId && this.cache.firstSeen) {
      return this.commit({ ...this.cache, numChecks: this.cache.numChecks + 1 });
    }

    return this.commit({
      ...defaultRecord(),
      payloadId,
      firstSeen: new Date(now.getTime()),
      numChecks: 1
    });
  }

  recordDownloadError(urlIdx: number, kind: DownloadErrorKind, time: Date): UpdateAttemptRecord {
    if (!this.cache.payloadId) {
      throw new Error('Nenhum payload registrado para associar o erro de download.');
    }

    const entry: DownloadErrorRecord = { urlIdx, kind, time: new Date(time.getTime()) };
    const downloadErrors = this.cache.downloadErrors.slice();
    // mantem a ordem cronologica mesmo com registros atrasados
    let insertAt = downloadErrors.length;
    while (insertAt > 0 && downloadErrors[insertAt - 1].time.getTime() > entry.time.getTime()) {
      insertAt -= 1;
    }
    downloadErrors.splice(insertAt, 0, entry);

    const onCurrentUrl = urlIdx === this.cache.lastDownloadUrlIdx;
    return this.commit({
      ...this.cache,
      downloadErrors,
      lastDownloadUrlNumErrors: onCurrentUrl ? this.cache.lastDownloadUrlNumErrors + 1 : this.cache.lastDownloadUrlNumErrors
    });
  }

  applyDownloadParams(params: UpdateDownloadParams, now: Date): UpdateAttemptRecord {
    const next: UpdateAttemptRecord = {
      ...this.cache,
      lastDownloadUrlIdx: params.downloadUrlIdx,
      lastDownloadUrlNumErrors: params.downloadUrlNumErrors,
      backoffExpiry: params.backoffExpiry ? new Date(params.backoffExpiry.getTime()) : null,
      scatterWaitPeriodMs: params.scatterWaitPeriodMs,
      scatterCheckThreshold: params.scatterCheckThreshold
    };

    if (params.doIncrementFailures) {
      next.numFailures = this.cache.numFailures + 1;
      next.failuresLastUpdated = new Date(now.getTime());
      // nova rodada de URLs depois do backoff
      next.downloadErrors = [];
    }

    return this.commit(next);
  }

  buildUpdateState(offer: UpdateOffer, isInteractive: boolean): UpdateState {
    const record = this.cache;
    if (record.payloadId !== offer.payloadId || !record.firstSeen) {
      throw new Error(`Payload ${offer.payloadId} ainda nao foi registrado; chame recordUpdateOffered antes.`);
    }

    const urlCount = offer.downloadUrls.length;
    // lista de URLs pode ter encolhido desde a ultima chamada
    const lastIdxValid = record.lastDownloadUrlIdx < urlCount;

    return {
      isInteractive,
      isDeltaPayload: offer.isDeltaPayload,
      firstSeen: new Date(record.firstSeen.getTime()),
      numChecks: record.numChecks,
      numFailures: record.numFailures,
      failuresLastUpdated: record.failuresLastUpdated ? new Date(record.failuresLastUpdated.getTime()) : null,
      downloadUrls: offer.downloadUrls.slice(),
      downloadErrorsMax: offer.downloadErrorsMax,
      lastDownloadUrlIdx: lastIdxValid ? record.lastDownloadUrlIdx : -1,
      lastDownloadUrlNumErrors: lastIdxValid ? record.lastDownloadUrlNumErrors : 0,
      downloadErrors: record.downloadErrors
        .filter((error) => error.urlIdx < urlCount)
        .map((error) => ({ ...error, time: new Date(error.time.getTime()) })),
      backoffExpiry: record.backoffExpiry ? new Date(record.backoffExpiry.getTime()) : null,
      isBackoffDisabled: offer.isBackoffDisabled,
      scatterWaitPeriodMs: record.scatterWaitPeriodMs,
      scatterCheckThreshold: record.scatterCheckThreshold,
      scatterWaitPeriodMaxMs: offer.scatterWaitPeriodMaxMs,
      scatterCheckThresholdMin: offer.scatterCheckThresholdMin,
      scatterCheckThresholdMax: offer.scatterCheckThresholdMax
    };
  }

  reset(): UpdateAttemptRecord {
    return this.commit(defaultRecord());
  }

  private commit(next: UpdateAttemptRecord): UpdateAttemptRecord {
    this.cache = cloneRecord(next);
    this.persist(this.cache);
    return this.get();
  }

  private load(): UpdateAttemptRecord {
    if (!fs.existsSync(this.filePath)) {
      const initial = defaultRecord();
      this.persist(initial);
      return initial;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const parsed = persistedAttemptSchema.safeParse(raw);
      if (parsed.success) {
        return parsed.data.attempt;
      }
    } catch {
      // fallback
    }

    const fallback = defaultRecord();
    this.persist(fallback);
    return fallback;
  }

  private persist(record: UpdateAttemptRecord): void {
    fs.writeFileSync(this.filePath, JSON.stringify({ attempt: record }, null, 2), 'utf-8');
  }
}

function defaultRecord(): UpdateAttemptRecord {
  return {
    payloadId: null,
    firstSeen: null,
    numChecks: 0,
    numFailures: 0,
    failuresLastUpdated: null,
    lastDownloadUrlIdx: -1,
    lastDownloadUrlNumErrors: 0,
    downloadErrors: [],
    backoffExpiry: null,
    scatterWaitPeriodMs: 0,
    scatterCheckThreshold: 0
  };
}

function cloneRecord(record: UpdateAttemptRecord): UpdateAttemptRecord {
  return {
    ...record,
    firstSeen: cloneDate(record.firstSeen),
    failuresLastUpdated: cloneDate(record.failuresLastUpdated),
    backoffExpiry: cloneDate(record.backoffExpiry),
    downloadErrors: record.downloadErrors.map((error) => ({ ...error, time: new Date(error.time.getTime()) }))
  };
}

function cloneDate(value: Date | null): Date | null {
  return value ? new Date(value.getTime()) : null;
}
