import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { Logger } from '@main/services/logging/Logger';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function createDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'update-logger-'));
  tempDirs.push(dir);
  return dir;
}

describe('Logger', () => {
  it('grava linhas JSON com evento e meta', () => {
    const dir = createDir();
    const logger = new Logger(dir);

    logger.warn('policy.request.failed', { request: 'StandardPolicy::UpdateCanStart' });

    const entries = logger.entries();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'warn',
      message: 'policy.request.failed',
      meta: { request: 'StandardPolicy::UpdateCanStart' }
    });
    expect(fs.existsSync(path.join(dir, 'logs', 'update-policy.log'))).toBe(true);
  });

  it('descarta niveis abaixo do minimo', () => {
    const logger = new Logger(createDir(), { minLevel: 'warn' });

    logger.debug('policy.request.evaluated');
    logger.info('policy.request.fallback');
    logger.error('policy.request.stalled');

    expect(logger.entries().map((entry) => entry.message)).toEqual(['policy.request.stalled']);
  });

  it('rotaciona o arquivo ao atingir o limite e continua lendo as duas partes', () => {
    const dir = createDir();
    const logger = new Logger(dir, { maxBytes: 120 });

    for (let index = 0; index < 4; index += 1) {
      logger.info(`policy.request.deferred.${index}`);
    }

    expect(fs.existsSync(path.join(dir, 'logs', 'update-policy.log.1'))).toBe(true);
    expect(logger.entries(2).map((entry) => entry.message)).toEqual([
      'policy.request.deferred.2',
      'policy.request.deferred.3'
    ]);
  });

  it('espelha as linhas no arquivo extra', () => {
    const dir = createDir();
    const mirror = path.join(dir, 'mirror', 'debug.log');
    const logger = new Logger(dir, { mirrorFilePath: `  ${mirror}  ` });

    logger.info('update.core.started');

    expect(fs.readFileSync(mirror, 'utf-8')).toContain('"message":"update.core.started"');
  });

  it('le linhas que nao sao JSON como mensagens simples', () => {
    const dir = createDir();
    const logger = new Logger(dir);
    fs.appendFileSync(path.join(dir, 'logs', 'update-policy.log'), 'linha solta\n');

    expect(logger.entries()).toEqual([expect.objectContaining({ level: 'info', message: 'linha solta' })]);
  });
});
