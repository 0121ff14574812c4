import { describe, test, expect, vi, afterEach } from 'vitest';
import { createLogger } from '../../src/shared/logging/logger.js';
import type { LogLevel } from '../../src/shared/config/index.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('設定レベル未満のログは出さない', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('test', () => 'warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[warn] test: shown');
  });

  test('コンテキストは2番目の引数で渡す', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('repo', () => 'debug');

    logger.error('failed', { path: 'a.txt' });

    expect(spy).toHaveBeenCalledWith('[error] repo: failed', { path: 'a.txt' });
  });

  test('レベルは出力のたびに評価する', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    let level: LogLevel = 'error';
    const logger = createLogger('dynamic', () => level);

    logger.info('first');
    level = 'info';
    logger.info('second');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[info] dynamic: second');
  });
});
