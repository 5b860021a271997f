import type {
  PolicyEvaluation,
  PolicyRequest,
  UpdateCheckParams,
  UpdateDownloadParams,
  UpdateState
} from '@shared/contracts';
import type { EvaluationContext } from '@main/services/evaluation/EvaluationContext';
import type { Variable } from '@main/services/evaluation/Variable';
import type { State } from '@main/services/state/State';

/**
 * Conjunto de decisoes do ciclo de update. Implementacoes nao guardam estado
 * entre chamadas: tudo o que precisam vem do contexto, do State e dos
 * argumentos.
 */
export interface Policy {
  readonly name: string;

  updateCheckAllowed(ec: EvaluationContext, state: State): PolicyEvaluation<UpdateCheckParams>;

  updateCanStart(ec: EvaluationContext, state: State, updateState: UpdateState): PolicyEvaluation<UpdateDownloadParams>;

  updateDownloadAllowed(ec: EvaluationContext, state: State): PolicyEvaluation<boolean>;
}

export interface PolicyRequestArgs {
  UpdateCheckAllowed: [];
  UpdateCanStart: [updateState: UpdateState];
  UpdateDownloadAllowed: [];
}

export interface PolicyRequestResults {
  UpdateCheckAllowed: UpdateCheckParams;
  UpdateCanStart: UpdateDownloadParams;
  UpdateDownloadAllowed: boolean;
}

export type PolicyRequestMethod<K extends PolicyRequest> = (
  policy: Policy,
  ec: EvaluationContext,
  state: State,
  ...args: PolicyRequestArgs[K]
) => PolicyEvaluation<PolicyRequestResults[K]>;

export const POLICY_REQUESTS: { readonly [K in PolicyRequest]: PolicyRequestMethod<K> } = {
  UpdateCheckAllowed: (policy, ec, state) => policy.updateCheckAllowed(ec, state),
  UpdateCanStart: (policy, ec, state, updateState) => policy.updateCanStart(ec, state, updateState),
  UpdateDownloadAllowed: (policy, ec, state) => policy.updateDownloadAllowed(ec, state)
};

export function policyRequestName(policy: Pick<Policy, 'name'>, request: PolicyRequest): string {
  return `${policy.name}::${request}`;
}

export function succeeded<T>(result: T): PolicyEvaluation<T> {
  return { status: 'succeeded', result };
}

export function failed<T>(error: string): PolicyEvaluation<T> {
  return { status: 'failed', error };
}

export function askMeAgainLater<T>(): PolicyEvaluation<T> {
  return { status: 'ask-me-again-later' };
}

export class VariableUnavailableError extends Error {
  constructor(readonly variableName: string) {
    super(`Variavel ${variableName} indisponivel.`);
    this.name = 'VariableUnavailableError';
  }
}

/**
 * Leitura obrigatoria: a ausencia do valor interrompe a decisao inteira, que
 * vira um unico "failed" nomeando a variavel.
 */
export function requireValue<T>(ec: EvaluationContext, variable: Variable<T>): T {
  const value = ec.getValue(variable);
  if (value === undefined) {
    throw new VariableUnavailableError(variable.name);
  }
  return value;
}

export function evaluateGuarded<T>(requestName: string, evaluate: () => PolicyEvaluation<T>): PolicyEvaluation<T> {
  try {
    return evaluate();
  } catch (error) {
    if (error instanceof VariableUnavailableError) {
      return failed(`${requestName}: ${error.message}`);
    }
    throw error;
  }
}
