import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_POLICY_TUNING } from '@main/services/config/ConfigStore';
import { EvaluationContext } from '@main/services/evaluation/EvaluationContext';
import { periodicCheckInterval } from '@main/services/policy/next-update-check';
import { StandardPolicy } from '@main/services/policy/StandardPolicy';
import type { LocalStateOptions } from '@main/services/state/LocalState';
import {
  FakeClock,
  FakeScheduler,
  HOUR_MS,
  MINUTE_MS,
  NOW,
  buildDevicePolicy,
  createTestState,
  minutesFrom
} from './helpers/fakes';

function setup(overrides: Partial<Omit<LocalStateOptions, 'startedAt' | 'random'>> = {}) {
  const clock = new FakeClock();
  const scheduler = new FakeScheduler(clock);
  const state = createTestState(clock, overrides);
  const ec = new EvaluationContext(clock, scheduler);
  return { clock, scheduler, state, ec, policy: new StandardPolicy() };
}

const ALLOWED = {
  status: 'succeeded',
  result: { updatesEnabled: true, targetVersionPrefix: '', targetChannel: '', isInteractive: false }
};

describe('StandardPolicy.updateCheckAllowed', () => {
  it('responde updatesEnabled=false quando updates estao desligados na configuracao', () => {
    const { state, ec, policy } = setup({ config: { updatesEnabled: false, oobeEnabled: false } });

    expect(policy.updateCheckAllowed(ec, state)).toEqual({
      status: 'succeeded',
      result: { updatesEnabled: false, targetVersionPrefix: '', targetChannel: '', isInteractive: false }
    });
  });

  it('responde updatesEnabled=false quando o sistema roda de midia removivel', () => {
    const { state, ec, policy } = setup({ bootDeviceRemovable: true });

    const outcome = policy.updateCheckAllowed(ec, state);
    expect(outcome.status === 'succeeded' && outcome.result.updatesEnabled).toBe(false);
  });

  it('libera a primeira verificacao alguns minutos apos o updater subir', () => {
    const { state, ec, policy } = setup();

    expect(policy.updateCheckAllowed(ec, state)).toEqual(ALLOWED);
  });

  it('adia a verificacao periodica e desperta no horario agendado', () => {
    const { state, ec, policy, scheduler } = setup();
    state.updater.recordCheck(minutesFrom(NOW, -1), true);

    expect(policy.updateCheckAllowed(ec, state)).toEqual({ status: 'ask-me-again-later' });
    expect(ec.runOnValueChangeOrTimeout(() => undefined)).toBe(true);

    const delay = scheduler.nextDelayMs();
    expect(delay).not.toBeNull();
    expect(delay ?? 0).toBeGreaterThanOrEqual(39 * MINUTE_MS + 1);
    expect(delay ?? 0).toBeLessThanOrEqual(49 * MINUTE_MS + 1);
  });

  it('libera a verificacao periodica depois do intervalo maximo com fuzz', () => {
    const { state, ec, policy } = setup();
    state.updater.recordCheck(minutesFrom(NOW, -60), true);

    expect(policy.updateCheckAllowed(ec, state)).toEqual(ALLOWED);
  });

  it('espaca verificacoes apos falhas consecutivas', () => {
    const { state, ec, policy } = setup();
    state.updater.recordCheck(minutesFrom(NOW, -80), false);
    state.updater.recordCheck(minutesFrom(NOW, -80), false);

    expect(policy.updateCheckAllowed(ec, state)).toEqual({ status: 'ask-me-again-later' });

    state.updater.recordCheck(minutesFrom(NOW, -400), false);
    ec.resetEvaluation();
    expect(policy.updateCheckAllowed(ec, state)).toEqual(ALLOWED);
  });

  it('respeita o intervalo ditado pelo servidor limitado ao teto', () => {
    const { state, ec, policy } = setup();
    state.updater.recordCheck(minutesFrom(NOW, -60), true, 6 * HOUR_MS);

    expect(policy.updateCheckAllowed(ec, state)).toEqual({ status: 'ask-me-again-later' });
  });

  it('verificacao forcada ignora o agendamento', () => {
    const { state, ec, policy } = setup();
    state.updater.recordCheck(minutesFrom(NOW, -1), true);
    state.updater.requestForcedUpdate(true);

    expect(policy.updateCheckAllowed(ec, state)).toEqual({
      status: 'succeeded',
      result: { updatesEnabled: true, targetVersionPrefix: '', targetChannel: '', isInteractive: true }
    });

    state.updater.requestForcedUpdate(false);
    ec.resetEvaluation();
    expect(policy.updateCheckAllowed(ec, state)).toEqual(ALLOWED);
  });

  it('copia prefixo de versao e canal da politica do dispositivo', () => {
    const { state, ec, policy } = setup();
    state.devicePolicy.apply(
      buildDevicePolicy({ targetVersionPrefix: '1412.', releaseChannel: 'beta-channel', releaseChannelDelegated: false })
    );

    expect(policy.updateCheckAllowed(ec, state)).toEqual({
      status: 'succeeded',
      result: { updatesEnabled: true, targetVersionPrefix: '1412.', targetChannel: 'beta-channel', isInteractive: false }
    });
  });

  it('deixa o canal vazio quando a escolha foi delegada ao usuario', () => {
    const { state, ec, policy } = setup();
    state.devicePolicy.apply(buildDevicePolicy({ releaseChannel: 'beta-channel', releaseChannelDelegated: true }));

    const outcome = policy.updateCheckAllowed(ec, state);
    expect(outcome.status === 'succeeded' && outcome.result.targetChannel).toBe('');
  });

  it('espera enquanto a politica do dispositivo desabilita updates', () => {
    const { state, ec, policy, scheduler } = setup();
    state.devicePolicy.apply(buildDevicePolicy({ updateDisabled: true }));
    const wake = vi.fn();

    expect(policy.updateCheckAllowed(ec, state)).toEqual({ status: 'ask-me-again-later' });
    expect(ec.runOnValueChangeOrTimeout(wake)).toBe(true);
    expect(scheduler.pendingCount()).toBe(0);

    state.devicePolicy.apply(buildDevicePolicy({ updateDisabled: false }));
    scheduler.advance(0);
    expect(wake).toHaveBeenCalledTimes(1);

    ec.resetEvaluation();
    expect(policy.updateCheckAllowed(ec, state)).toEqual(ALLOWED);
  });

  it('espera o fim do OOBE quando ele esta habilitado', () => {
    const { state, ec, policy, scheduler } = setup({ config: { updatesEnabled: true, oobeEnabled: true } });
    const wake = vi.fn();

    expect(policy.updateCheckAllowed(ec, state)).toEqual({ status: 'ask-me-again-later' });
    expect(ec.runOnValueChangeOrTimeout(wake)).toBe(true);

    state.system.markOobeComplete();
    scheduler.advance(0);
    expect(wake).toHaveBeenCalledTimes(1);

    ec.resetEvaluation();
    expect(policy.updateCheckAllowed(ec, state)).toEqual(ALLOWED);
  });

  it('falha nomeando a variavel ilegivel', () => {
    const { state, ec, policy } = setup();
    state.updater.lastCheckedTime.unset();

    expect(policy.updateCheckAllowed(ec, state)).toEqual({
      status: 'failed',
      error: 'StandardPolicy::UpdateCheckAllowed: Variavel updater.last_checked_time indisponivel.'
    });
  });
});

describe('periodicCheckInterval', () => {
  it('usa o intervalo regular sem falhas', () => {
    expect(periodicCheckInterval(0, 0, DEFAULT_POLICY_TUNING)).toEqual({
      intervalMs: 45 * MINUTE_MS,
      fuzzMs: 10 * MINUTE_MS
    });
  });

  it('dobra o intervalo por falha consecutiva e limita ao teto', () => {
    expect(periodicCheckInterval(0, 1, DEFAULT_POLICY_TUNING)).toEqual({
      intervalMs: 90 * MINUTE_MS,
      fuzzMs: 90 * MINUTE_MS
    });
    expect(periodicCheckInterval(0, 3, DEFAULT_POLICY_TUNING)).toEqual({
      intervalMs: 4 * HOUR_MS,
      fuzzMs: 4 * HOUR_MS
    });
  });

  it('aceita intervalo do servidor e nunca fica abaixo do regular', () => {
    expect(periodicCheckInterval(2 * HOUR_MS, 5, DEFAULT_POLICY_TUNING)).toEqual({
      intervalMs: 2 * HOUR_MS,
      fuzzMs: 2 * HOUR_MS
    });
    expect(periodicCheckInterval(10 * MINUTE_MS, 0, DEFAULT_POLICY_TUNING)).toEqual({
      intervalMs: 45 * MINUTE_MS,
      fuzzMs: 10 * MINUTE_MS
    });
  });
});
