import type { PolicyEvaluation, PolicyRequest, SettledPolicyEvaluation } from '@shared/contracts';
import type { Clock, Scheduler } from '@main/services/evaluation/Clock';
import { EvaluationContext } from '@main/services/evaluation/EvaluationContext';
import type { LoggerLike } from '@main/services/logging/Logger';
import {
  POLICY_REQUESTS,
  policyRequestName,
  type Policy,
  type PolicyRequestArgs,
  type PolicyRequestResults
} from '@main/services/policy/Policy';
import type { State } from '@main/services/state/State';

export interface UpdateManagerOptions {
  expirationMs?: number | null;
  fallbackPolicy?: Policy | null;
}

export class PolicyRequestCancelledError extends Error {
  constructor(readonly requestName: string) {
    super(`Avaliacao ${requestName} cancelada.`);
    this.name = 'PolicyRequestCancelledError';
  }
}

interface PendingEvaluation {
  ec: EvaluationContext;
  requestName: string;
  cancel: (error: PolicyRequestCancelledError) => void;
}

/**
 * Dono do ciclo de avaliacao: cria o contexto, chama a politica e, quando a
 * resposta e "ask-me-again-later", reavalia os mesmos argumentos no proximo
 * despertar do contexto. Chamadas sobre o mesmo UpdateState devem ser
 * serializadas por quem chama.
 */
export class UpdateManager {
  private readonly pending = new Set<PendingEvaluation>();

  constructor(
    private readonly policy: Policy,
    private readonly state: State,
    private readonly clock: Clock,
    private readonly scheduler: Scheduler,
    private readonly logger: LoggerLike,
    private readonly options: UpdateManagerOptions = {}
  ) {}

  policyRequest<K extends PolicyRequest>(
    request: K,
    ...args: PolicyRequestArgs[K]
  ): PolicyEvaluation<PolicyRequestResults[K]> {
    const ec = this.createContext();
    try {
      return this.evaluate(ec, request, args);
    } finally {
      ec.dispose();
    }
  }

  asyncPolicyRequest<K extends PolicyRequest>(
    request: K,
    ...args: PolicyRequestArgs[K]
  ): Promise<SettledPolicyEvaluation<PolicyRequestResults[K]>> {
    const requestName = policyRequestName(this.policy, request);
    const ec = this.createContext();

    return new Promise((resolve, reject) => {
      const entry: PendingEvaluation = {
        ec,
        requestName,
        cancel: (error) => {
          this.pending.delete(entry);
          ec.dispose();
          reject(error);
        }
      };
      this.pending.add(entry);

      const settle = (outcome: SettledPolicyEvaluation<PolicyRequestResults[K]>): void => {
        this.pending.delete(entry);
        ec.dispose();
        resolve(outcome);
      };

      const run = (): void => {
        let outcome: PolicyEvaluation<PolicyRequestResults[K]>;
        try {
          outcome = this.evaluate(ec, request, args);
        } catch (error) {
          this.pending.delete(entry);
          ec.dispose();
          reject(error);
          return;
        }

        if (outcome.status !== 'ask-me-again-later') {
          settle(outcome);
          return;
        }

        if (ec.runOnValueChangeOrTimeout(run)) {
          this.logger.debug('policy.request.deferred', {
            request: requestName,
            context: ec.dump()
          });
          return;
        }

        const reason = ec.isExpired()
          ? `${requestName}: avaliacao expirou sem resposta definitiva.`
          : `${requestName}: adiada sem nenhuma condicao de despertar registrada.`;
        this.logger.error('policy.request.stalled', {
          request: requestName,
          reason,
          context: ec.dump()
        });
        settle({ status: 'failed', error: reason });
      };

      run();
    });
  }

  pendingRequestCount(): number {
    return this.pending.size;
  }

  dispose(): void {
    for (const entry of [...this.pending]) {
      this.logger.info('policy.request.cancelled', { request: entry.requestName });
      entry.cancel(new PolicyRequestCancelledError(entry.requestName));
    }
  }

  private createContext(): EvaluationContext {
    return new EvaluationContext(this.clock, this.scheduler, { expirationMs: this.options.expirationMs ?? null });
  }

  private evaluate<K extends PolicyRequest>(
    ec: EvaluationContext,
    request: K,
    args: PolicyRequestArgs[K]
  ): PolicyEvaluation<PolicyRequestResults[K]> {
    ec.resetEvaluation();
    const method = POLICY_REQUESTS[request];
    const requestName = policyRequestName(this.policy, request);
    const outcome = method(this.policy, ec, this.state, ...args);

    if (outcome.status !== 'failed') {
      this.logger.debug('policy.request.evaluated', {
        request: requestName,
        status: outcome.status
      });
      return outcome;
    }

    this.logger.warn('policy.request.failed', {
      request: requestName,
      error: outcome.error,
      context: ec.dump()
    });

    const fallback = this.options.fallbackPolicy;
    if (!fallback) {
      return outcome;
    }

    // a politica reserva le tudo num contexto limpo
    ec.resetEvaluation();
    const fallbackOutcome = method(fallback, ec, this.state, ...args);
    this.logger.info('policy.request.fallback', {
      request: policyRequestName(fallback, request),
      status: fallbackOutcome.status
    });
    return fallbackOutcome;
  }
}
