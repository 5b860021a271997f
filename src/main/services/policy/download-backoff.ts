import type { DownloadErrorKind, DownloadErrorRecord, PolicyTuning, UpdateState } from '@shared/contracts';
import type { Prng } from '@main/services/policy/prng';

export interface DownloadUrlSelection {
  urlIdx: number;
  numErrors: number;
  errorCounts: number[];
}

/**
 * Peso de cada erro na contagem da URL. Falhas de integridade do payload
 * esgotam a URL de uma vez; cancelamentos e erros do servico nao contam.
 */
export function downloadErrorWeight(kind: DownloadErrorKind, downloadErrorsMax: number): number {
  switch (kind) {
    case 'payload-hash-mismatch':
    case 'payload-size-mismatch':
    case 'signature-invalid':
      return Math.max(1, downloadErrorsMax);
    case 'transfer-error':
    case 'timeout':
    case 'http-error':
      return 1;
    case 'user-cancelled':
    case 'service-error':
      return 0;
  }
}

export function countDownloadErrors(updateState: UpdateState): number[] {
  const counts = updateState.downloadUrls.map(() => 0);
  const cutoff = updateState.firstSeen.getTime();

  for (const error of updateState.downloadErrors) {
    if (error.time.getTime() < cutoff) {
      continue;
    }
    counts[error.urlIdx] += downloadErrorWeight(error.kind, updateState.downloadErrorsMax);
  }

  return counts;
}

/**
 * Percorre as URLs a partir da seguinte a ultima usada (ou da primeira), dando
 * a volta, e escolhe a primeira que ainda tem orcamento de erros e esquema
 * permitido. A ultima usada so e alcancada depois da volta completa.
 */
export function selectDownloadUrl(updateState: UpdateState, httpAllowed: boolean): DownloadUrlSelection {
  const errorCounts = countDownloadErrors(updateState);
  const total = updateState.downloadUrls.length;
  const start = total > 0 ? (updateState.lastDownloadUrlIdx + 1) % total : 0;

  for (let offset = 0; offset < total; offset += 1) {
    const idx = (start + offset) % total;
    if (errorCounts[idx] >= updateState.downloadErrorsMax) {
      continue;
    }
    if (!httpAllowed && isPlainHttpUrl(updateState.downloadUrls[idx])) {
      continue;
    }

    return {
      urlIdx: idx,
      numErrors: idx === updateState.lastDownloadUrlIdx ? updateState.lastDownloadUrlNumErrors : 0,
      errorCounts
    };
  }

  return { urlIdx: -1, numErrors: 0, errorCounts };
}

export function backoffIntervalMs(
  numFailures: number,
  tuning: Pick<PolicyTuning, 'attemptBackoffBaseMs' | 'attemptBackoffMaxIntervalMs' | 'attemptBackoffFuzzMs'>,
  prng: Prng
): number {
  const failures = Math.max(1, Math.trunc(numFailures));
  // 2^(n-1) satura bem antes de estourar; o teto e aplicado logo em seguida
  const exponent = Math.min(failures - 1, 30);
  const baseMs = Math.min(tuning.attemptBackoffBaseMs * 2 ** exponent, tuning.attemptBackoffMaxIntervalMs);
  const halfFuzz = Math.trunc(tuning.attemptBackoffFuzzMs / 2);
  const fuzzMs = halfFuzz > 0 ? prng.randInt(-halfFuzz, halfFuzz) : 0;

  return Math.min(Math.max(0, baseMs + fuzzMs), tuning.attemptBackoffMaxIntervalMs);
}

export function findInvalidDownloadError(updateState: UpdateState): DownloadErrorRecord | null {
  return (
    updateState.downloadErrors.find(
      (error) => !Number.isInteger(error.urlIdx) || error.urlIdx < 0 || error.urlIdx >= updateState.downloadUrls.length
    ) ?? null
  );
}

function isPlainHttpUrl(url: string): boolean {
  return url.trim().toLowerCase().startsWith('http://');
}
