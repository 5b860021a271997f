import { describe, expect, it, vi } from 'vitest';
import { FallbackPolicy } from '@main/services/policy/FallbackPolicy';
import { askMeAgainLater, type Policy } from '@main/services/policy/Policy';
import { StandardPolicy } from '@main/services/policy/StandardPolicy';
import { PolicyRequestCancelledError, UpdateManager, type UpdateManagerOptions } from '@main/services/update/UpdateManager';
import {
  FakeClock,
  FakeScheduler,
  HOUR_MS,
  MINUTE_MS,
  NOW,
  buildDevicePolicy,
  buildUpdateState,
  createTestState,
  minutesFrom
} from './helpers/fakes';

const ALLOWED = {
  status: 'succeeded',
  result: { updatesEnabled: true, targetVersionPrefix: '', targetChannel: '', isInteractive: false }
};

function createLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

function createManager(options: UpdateManagerOptions = {}, policy: Policy = new StandardPolicy()) {
  const clock = new FakeClock();
  const scheduler = new FakeScheduler(clock);
  const state = createTestState(clock);
  const logger = createLogger();
  const manager = new UpdateManager(policy, state, clock, scheduler, logger, options);
  return { clock, scheduler, state, logger, manager };
}

describe('UpdateManager', () => {
  it('avalia pedidos sincronos num contexto novo', () => {
    const { manager, state, logger } = createManager();
    state.network.setConnection('ethernet');

    expect(manager.policyRequest('UpdateDownloadAllowed')).toEqual({ status: 'succeeded', result: true });
    expect(logger.debug).toHaveBeenCalledWith('policy.request.evaluated', {
      request: 'StandardPolicy::UpdateDownloadAllowed',
      status: 'succeeded'
    });
  });

  it('repassa o UpdateState para UpdateCanStart', () => {
    const { manager } = createManager();
    const outcome = manager.policyRequest('UpdateCanStart', buildUpdateState());

    expect(outcome.status === 'succeeded' && outcome.result.downloadUrlIdx).toBe(0);
  });

  it('libera os observadores depois de um pedido sincrono adiado', () => {
    const { manager, state } = createManager();
    state.devicePolicy.apply(buildDevicePolicy({ updateDisabled: true }));

    expect(manager.policyRequest('UpdateCheckAllowed')).toEqual({ status: 'ask-me-again-later' });
    expect(state.devicePolicy.updateDisabled.observerCount()).toBe(0);
  });

  it('registra a falha e devolve failed sem politica reserva', () => {
    const { manager, logger } = createManager();
    const error = 'StandardPolicy::UpdateDownloadAllowed: Variavel network.connection_type indisponivel.';

    expect(manager.policyRequest('UpdateDownloadAllowed')).toEqual({ status: 'failed', error });
    expect(logger.warn).toHaveBeenCalledWith(
      'policy.request.failed',
      expect.objectContaining({ request: 'StandardPolicy::UpdateDownloadAllowed', error })
    );
  });

  it('usa a politica reserva quando a principal falha', () => {
    const { manager, logger } = createManager({ fallbackPolicy: new FallbackPolicy() });

    expect(manager.policyRequest('UpdateDownloadAllowed')).toEqual({ status: 'succeeded', result: true });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith('policy.request.fallback', {
      request: 'FallbackPolicy::UpdateDownloadAllowed',
      status: 'succeeded'
    });
  });

  it('reavalia pedido assincrono no horario agendado', async () => {
    const { manager, state, scheduler, logger } = createManager();
    state.updater.recordCheck(minutesFrom(NOW, -1), true);

    const pending = manager.asyncPolicyRequest('UpdateCheckAllowed');
    expect(manager.pendingRequestCount()).toBe(1);
    expect(logger.debug).toHaveBeenCalledWith(
      'policy.request.deferred',
      expect.objectContaining({ request: 'StandardPolicy::UpdateCheckAllowed' })
    );

    scheduler.advance(50 * MINUTE_MS);
    await expect(pending).resolves.toEqual(ALLOWED);
    expect(manager.pendingRequestCount()).toBe(0);
  });

  it('reavalia pedido assincrono quando uma variavel observada muda', async () => {
    const { manager, state, scheduler } = createManager();
    state.devicePolicy.apply(buildDevicePolicy({ updateDisabled: true }));

    const pending = manager.asyncPolicyRequest('UpdateCheckAllowed');
    expect(scheduler.pendingCount()).toBe(0);

    state.devicePolicy.apply(buildDevicePolicy({ updateDisabled: false }));
    scheduler.advance(0);

    await expect(pending).resolves.toEqual(ALLOWED);
  });

  it('encerra com failed quando a avaliacao expira', async () => {
    const { manager, state, scheduler, logger } = createManager({ expirationMs: HOUR_MS });
    state.devicePolicy.apply(buildDevicePolicy({ updateDisabled: true }));

    const pending = manager.asyncPolicyRequest('UpdateCheckAllowed');
    scheduler.advance(HOUR_MS);

    const reason = 'StandardPolicy::UpdateCheckAllowed: avaliacao expirou sem resposta definitiva.';
    await expect(pending).resolves.toEqual({ status: 'failed', error: reason });
    expect(logger.error).toHaveBeenCalledWith(
      'policy.request.stalled',
      expect.objectContaining({ request: 'StandardPolicy::UpdateCheckAllowed', reason })
    );
  });

  it('encerra com failed quando a politica adia sem condicao de despertar', async () => {
    const stub: Policy = {
      name: 'StubPolicy',
      updateCheckAllowed: () => askMeAgainLater(),
      updateCanStart: () => askMeAgainLater(),
      updateDownloadAllowed: () => askMeAgainLater()
    };
    const { manager } = createManager({}, stub);

    await expect(manager.asyncPolicyRequest('UpdateDownloadAllowed')).resolves.toEqual({
      status: 'failed',
      error: 'StubPolicy::UpdateDownloadAllowed: adiada sem nenhuma condicao de despertar registrada.'
    });
  });

  it('cancela pedidos pendentes no dispose', async () => {
    const { manager, state, logger } = createManager();
    state.devicePolicy.apply(buildDevicePolicy({ updateDisabled: true }));

    const pending = manager.asyncPolicyRequest('UpdateCheckAllowed');
    manager.dispose();

    await expect(pending).rejects.toBeInstanceOf(PolicyRequestCancelledError);
    expect(manager.pendingRequestCount()).toBe(0);
    expect(state.devicePolicy.updateDisabled.observerCount()).toBe(0);
    expect(logger.info).toHaveBeenCalledWith('policy.request.cancelled', {
      request: 'StandardPolicy::UpdateCheckAllowed'
    });
  });
});
