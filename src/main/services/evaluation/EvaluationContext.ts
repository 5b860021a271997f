import type { BaseVariable, EvaluationToken, Variable, VariableListener } from '@main/services/evaluation/Variable';
import type { CancelScheduledTask, Clock, Scheduler } from '@main/services/evaluation/Clock';

export interface EvaluationContextOptions {
  expirationMs?: number | null;
}

export interface EvaluationContextDump {
  evaluationStartWallclock: string;
  values: Record<string, unknown>;
  errors: Record<string, string>;
}

/**
 * Contexto de uma avaliacao de politica.
 *
 * Cada leitura de variavel e feita uma unica vez por avaliacao (snapshot) e
 * fica registrada; quando a politica responde "ask-me-again-later", o contexto
 * arma um unico despertar: mudanca de qualquer variavel assincrona lida,
 * o prazo mais cedo registrado via isWallclockTimeGreaterThan /
 * isMonotonicTimeGreaterThan, ou o menor intervalo de polling das variaveis
 * de polling lidas.
 */
export class EvaluationContext {
  private token: EvaluationToken = {};
  private readonly readVariables = new Map<string, BaseVariable>();
  private evaluationStartWallclock: Date;
  private evaluationStartMonotonic: number;
  private wallclockDeadline: number | null = null;
  private monotonicDeadline: number | null = null;
  private expirationDeadline: number | null = null;

  private armedCallback: (() => void) | null = null;
  private armedObservers: BaseVariable[] = [];
  private cancelTimer: CancelScheduledTask | null = null;
  // a reavaliacao nunca roda dentro do set() de quem alterou a variavel
  private readonly onArmedValueChanged: VariableListener = () => this.deferArmedCallback();

  constructor(
    private readonly clock: Clock,
    private readonly scheduler: Scheduler,
    private readonly options: EvaluationContextOptions = {}
  ) {
    this.evaluationStartWallclock = clock.getWallclockTime();
    this.evaluationStartMonotonic = clock.getMonotonicTime();
    this.resetExpiration();
  }

  getValue<T>(variable: Variable<T>): T | undefined {
    this.readVariables.set(variable.name, variable);
    const read = variable.readOnce(this.token);
    return read.ok ? read.value : undefined;
  }

  getEvaluationStartWallclock(): Date {
    return new Date(this.evaluationStartWallclock.getTime());
  }

  getEvaluationStartMonotonic(): number {
    return this.evaluationStartMonotonic;
  }

  isWallclockTimeGreaterThan(timestamp: Date): boolean {
    const target = timestamp.getTime();
    if (this.evaluationStartWallclock.getTime() > target) {
      return true;
    }

    this.wallclockDeadline = this.wallclockDeadline === null ? target : Math.min(this.wallclockDeadline, target);
    return false;
  }

  isMonotonicTimeGreaterThan(timestamp: number): boolean {
    if (this.evaluationStartMonotonic > timestamp) {
      return true;
    }

    this.monotonicDeadline = this.monotonicDeadline === null ? timestamp : Math.min(this.monotonicDeadline, timestamp);
    return false;
  }

  resetEvaluation(): void {
    this.token = {};
    this.readVariables.clear();
    this.wallclockDeadline = null;
    this.monotonicDeadline = null;
    this.evaluationStartWallclock = this.clock.getWallclockTime();
    this.evaluationStartMonotonic = this.clock.getMonotonicTime();
  }

  resetExpiration(): void {
    const expirationMs = this.options.expirationMs;
    this.expirationDeadline =
      typeof expirationMs === 'number' && Number.isFinite(expirationMs) ? this.clock.getMonotonicTime() + expirationMs : null;
  }

  isExpired(): boolean {
    return this.expirationDeadline !== null && this.clock.getMonotonicTime() >= this.expirationDeadline;
  }

  hasPendingCallback(): boolean {
    return this.armedCallback !== null;
  }

  runOnValueChangeOrTimeout(callback: () => void): boolean {
    if (this.armedCallback || this.isExpired()) {
      return false;
    }

    const asyncVariables: BaseVariable[] = [];
    let pollIntervalMs: number | null = null;
    for (const variable of this.readVariables.values()) {
      if (variable.mode === 'async') {
        asyncVariables.push(variable);
      } else if (variable.mode === 'poll') {
        pollIntervalMs = pollIntervalMs === null ? variable.pollIntervalMs : Math.min(pollIntervalMs, variable.pollIntervalMs);
      }
    }

    const wakeTimeoutMs = this.remainingTimeoutMs(pollIntervalMs);
    if (asyncVariables.length === 0 && wakeTimeoutMs === null) {
      return false;
    }

    // a expiracao limita a espera, mas sozinha nao e motivo para esperar
    const timeoutMs =
      this.expirationDeadline === null
        ? wakeTimeoutMs
        : Math.max(0, Math.min(wakeTimeoutMs ?? Number.POSITIVE_INFINITY, this.expirationDeadline - this.clock.getMonotonicTime()));

    this.armedCallback = callback;
    this.armedObservers = asyncVariables;
    for (const variable of asyncVariables) {
      variable.addObserver(this.onArmedValueChanged);
    }
    if (timeoutMs !== null) {
      this.cancelTimer = this.scheduler.schedule(timeoutMs, () => this.fireArmedCallback());
    }

    return true;
  }

  dispose(): void {
    this.disarm();
    this.token = {};
    this.readVariables.clear();
  }

  dump(): EvaluationContextDump {
    const values: Record<string, unknown> = {};
    const errors: Record<string, string> = {};
    for (const [name, variable] of this.readVariables) {
      const read = variable.snapshot(this.token);
      if (!read) {
        continue;
      }
      if (read.ok) {
        values[name] = read.value instanceof Date ? read.value.toISOString() : read.value;
      } else {
        errors[name] = read.error;
      }
    }

    return {
      evaluationStartWallclock: this.evaluationStartWallclock.toISOString(),
      values,
      errors
    };
  }

  private remainingTimeoutMs(pollIntervalMs: number | null): number | null {
    const candidates: number[] = [];
    // +1: as comparacoes de prazo sao estritas
    if (this.wallclockDeadline !== null) {
      candidates.push(this.wallclockDeadline - this.clock.getWallclockTime().getTime() + 1);
    }
    if (this.monotonicDeadline !== null) {
      candidates.push(this.monotonicDeadline - this.clock.getMonotonicTime() + 1);
    }
    if (pollIntervalMs !== null) {
      candidates.push(pollIntervalMs);
    }

    return candidates.length === 0 ? null : Math.max(0, Math.min(...candidates));
  }

  private deferArmedCallback(): void {
    const callback = this.armedCallback;
    this.disarm();
    if (callback) {
      this.cancelTimer = this.scheduler.schedule(0, () => {
        this.cancelTimer = null;
        callback();
      });
    }
  }

  private fireArmedCallback(): void {
    const callback = this.armedCallback;
    this.disarm();
    callback?.();
  }

  private disarm(): void {
    for (const variable of this.armedObservers) {
      variable.removeObserver(this.onArmedValueChanged);
    }
    this.armedObservers = [];
    this.cancelTimer?.();
    this.cancelTimer = null;
    this.armedCallback = null;
  }
}
