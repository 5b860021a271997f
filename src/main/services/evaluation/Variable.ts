export type VariableMode = 'const' | 'poll' | 'async';

export type VariableRead<T> = { ok: true; value: T } | { ok: false; error: string };

export type VariableListener = (variable: BaseVariable) => void;

// identidade de uma avaliacao; leituras feitas sob o mesmo token sao reaproveitadas
export type EvaluationToken = object;

const DEFAULT_POLL_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Base sem tipo de valor: o contexto de avaliacao guarda variaveis heterogeneas
 * e so precisa de nome, modo e registro de observadores.
 */
export abstract class BaseVariable {
  private readonly listeners = new Set<VariableListener>();

  protected constructor(
    readonly name: string,
    readonly mode: VariableMode,
    readonly pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS
  ) {}

  addObserver(listener: VariableListener): void {
    this.listeners.add(listener);
  }

  removeObserver(listener: VariableListener): void {
    this.listeners.delete(listener);
  }

  observerCount(): number {
    return this.listeners.size;
  }

  abstract snapshot(token: EvaluationToken): VariableRead<unknown> | undefined;

  protected notifyValueChanged(): void {
    // copia: um observador pode se remover durante a notificacao
    for (const listener of [...this.listeners]) {
      listener(this);
    }
  }
}

export abstract class Variable<T> extends BaseVariable {
  private readonly snapshots = new WeakMap<EvaluationToken, VariableRead<T>>();

  abstract read(): VariableRead<T>;

  readOnce(token: EvaluationToken): VariableRead<T> {
    const cached = this.snapshots.get(token);
    if (cached) {
      return cached;
    }

    const read = this.read();
    this.snapshots.set(token, read);
    return read;
  }

  snapshot(token: EvaluationToken): VariableRead<T> | undefined {
    return this.snapshots.get(token);
  }
}

export class ConstVariable<T> extends Variable<T> {
  constructor(
    name: string,
    private readonly value: T
  ) {
    super(name, 'const');
  }

  read(): VariableRead<T> {
    return { ok: true, value: this.value };
  }
}

/**
 * Variavel assincrona: o dono empurra valores novos e os observadores sao
 * avisados apenas quando o valor realmente muda.
 */
export class SettableVariable<T> extends Variable<T> {
  private current: VariableRead<T>;

  constructor(name: string, initial?: T) {
    super(name, 'async');
    this.current = initial === undefined ? unsetRead(name) : { ok: true, value: initial };
  }

  read(): VariableRead<T> {
    return this.current;
  }

  set(value: T): void {
    if (this.current.ok && sameValue(this.current.value, value)) {
      return;
    }

    this.current = { ok: true, value };
    this.notifyValueChanged();
  }

  unset(): void {
    if (!this.current.ok) {
      return;
    }

    this.current = unsetRead(this.name);
    this.notifyValueChanged();
  }
}

export class ComputedVariable<T> extends Variable<T> {
  constructor(
    name: string,
    mode: 'const' | 'poll',
    private readonly compute: () => T,
    pollIntervalMs?: number
  ) {
    super(name, mode, pollIntervalMs);
  }

  read(): VariableRead<T> {
    try {
      return { ok: true, value: this.compute() };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}

function unsetRead<T>(name: string): VariableRead<T> {
  return { ok: false, error: `${name} ainda nao possui valor.` };
}

export function sameValue(left: unknown, right: unknown): boolean {
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() === right.getTime();
  }

  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((item, index) => sameValue(item, right[index]));
  }

  return Object.is(left, right);
}
