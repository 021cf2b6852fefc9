import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { createWalletLogger } from '../../../src/logger/logger.js';
import { capturingLogger } from '../../helpers/fixtures.js';

const logLine = z.record(z.unknown());

function parse(line: string | undefined): Record<string, unknown> {
  return logLine.parse(JSON.parse(line ?? '{}'));
}

describe('createLogger()', () => {
  it('redacts secret-adjacent fields at the top level', () => {
    const { logger, lines } = capturingLogger();
    logger.info({ seed: 'abcd', passphrase: 'test-secret', slateId: 's1' }, 'hello');

    const line = parse(lines[0]);
    expect(line['seed']).toBe('[REDACTED]');
    expect(line['passphrase']).toBe('[REDACTED]');
    expect(line['slateId']).toBe('s1');
    expect(line['msg']).toBe('hello');
  });

  it('redacts secret-adjacent fields one level down', () => {
    const { logger, lines } = capturingLogger();
    logger.info({ session: { token: 'tok', username: 'alice' } }, 'nested');
    expect(lines[0]).toContain('"session":{"token":"[REDACTED]","username":"alice"}');
  });

  it('serialises errors with their message', () => {
    const { logger, lines } = capturingLogger();
    logger.error({ err: new Error('boom') }, 'failed');
    expect(lines[0]).toContain('"message":"boom"');
  });
});

describe('createWalletLogger()', () => {
  it('binds the username to every line', () => {
    const { logger, lines } = capturingLogger();
    createWalletLogger(logger, 'alice').info('hi');
    expect(parse(lines[0])['username']).toBe('alice');
  });
});
