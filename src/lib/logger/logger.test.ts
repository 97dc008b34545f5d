import { describe, expect, it } from 'vitest';
import { createLogger, type LevelName } from './index';

const capture = () => {
  const entries: Array<{ level: LevelName; line: string }> = [];
  return { entries, sink: (level: LevelName, line: string) => void entries.push({ level, line }) };
};

describe('logger', () => {
  it('drops entries below the configured level', () => {
    const { entries, sink } = capture();
    const logger = createLogger({ level: 'warn', enabled: true, json: false, service: '', plain: true, sink });

    logger.info('hidden');
    logger.warn('shown');

    expect(entries).toEqual([{ level: 'warn', line: '[WARN] shown' }]);
  });

  it('prefixes namespaces for child loggers', () => {
    const { entries, sink } = capture();
    const logger = createLogger({ level: 'info', enabled: true, json: false, service: 'si', plain: true, sink });

    logger.child('api').child(['token']).error('failed', { status: 401 });

    expect(entries[0]?.line).toBe('[si] [ERROR] [api:token] failed {"status":401}');
  });

  it('writes JSON lines with serialized errors', () => {
    const { entries, sink } = capture();
    const logger = createLogger({ level: 'info', enabled: true, json: true, service: '', sink }, 'cli');

    logger.error('boom', { err: new Error('bad') });

    const payload = JSON.parse(entries[0]?.line ?? '{}');
    expect(payload).toMatchObject({ level: 'error', ns: 'cli', msg: 'boom', meta: { err: { name: 'Error', message: 'bad' } } });
    expect(payload.service).toBeUndefined();
  });

  it('serializes errors in text-mode metadata', () => {
    const { entries, sink } = capture();
    const logger = createLogger({ level: 'info', enabled: true, json: false, service: '', plain: true, sink });

    logger.error('Unexpected failure', { err: new TypeError('boom'), step: 'fetch' });

    const line = entries[0]?.line ?? '';
    expect(line.startsWith('[ERROR] Unexpected failure {"err":{"message":"boom","stack":"TypeError: boom')).toBe(true);
    expect(line.endsWith('"name":"TypeError"},"step":"fetch"}')).toBe(true);
  });

  it('writes nothing when disabled', () => {
    const { entries, sink } = capture();
    createLogger({ enabled: false, sink }).error('nope');
    expect(entries).toEqual([]);
  });
});
