import { match, strictEqual, throws } from 'node:assert';
import { describe, it } from 'node:test';
import { UnresolvedTokenError } from '../../../src/libs/engine/route-errors';
import {
  createTokenContext,
  defaultTokenGenerators
} from '../../../src/libs/engine/token-resolver';

const now = new Date('2024-01-02T03:04:05.000Z');

describe('Token resolver', () => {
  it('should resolve request fields and path parameters', () => {
    const context = createTokenContext({
      payload: { state: 'xyz', user_id: 'from-body' },
      pathParams: { user_id: '42' }
    });

    strictEqual(context.resolve('state', false), 'xyz');
    strictEqual(context.resolve('user_id', false), '42');
  });

  it('should fail on an absent request field', () => {
    const context = createTokenContext({ payload: { state: null } });

    throws(
      () => context.resolve('state', false),
      new UnresolvedTokenError('state')
    );
    throws(() => context.resolve('toString', false), UnresolvedTokenError);
  });

  it('should fail on an unknown synthetic token', () => {
    const context = createTokenContext({ payload: {} });

    throws(
      () => context.resolve('unknown', true),
      (error: unknown) =>
        error instanceof UnresolvedTokenError &&
        error.message === 'Unresolved token {$unknown}'
    );
  });

  it('should compute a synthetic value once per request', () => {
    let calls = 0;
    const context = createTokenContext({
      payload: {},
      generators: {
        counter: () => {
          calls += 1;

          return calls;
        }
      }
    });

    strictEqual(context.resolve('counter', true), 1);
    strictEqual(context.resolve('counter', true), 1);
    strictEqual(calls, 1);

    const nextRequest = createTokenContext({
      payload: {},
      generators: { counter: () => 2 }
    });
    strictEqual(nextRequest.resolve('counter', true), 2);
  });

  it('should keep request fields and synthetic tokens apart', () => {
    const context = createTokenContext({
      payload: { hash: 'from-body' },
      generators: { hash: () => 'generated' }
    });

    strictEqual(context.resolve('hash', false), 'from-body');
    strictEqual(context.resolve('hash', true), 'generated');
  });

  it('should generate the built-in tokens', () => {
    const context = createTokenContext({
      payload: { a: 1 },
      now,
      settings: { webhookUrl: 'http://localhost:9000/hooks' }
    });

    strictEqual(context.resolve('current_timestamp', true), 1704164645);
    match(String(context.resolve('hash', true)), /^[0-9a-f]{32}$/);
    match(
      String(context.resolve('access_token', true)),
      /^[0-9a-f-]{36}-1704164645$/
    );
    match(String(context.resolve('refresh_token', true)), /^[0-9a-f-]{36}$/);
    match(String(context.resolve('verification_code', true)), /^\d{6}$/);
    strictEqual(
      context.resolve('webhook_url', true),
      'http://localhost:9000/hooks'
    );

    const code = context.resolve('random_code', true);
    strictEqual(typeof code, 'number');
  });

  it('should fail on webhook_url when no URL is configured', () => {
    throws(
      () =>
        defaultTokenGenerators.webhook_url({ payload: {}, now, settings: {} }),
      UnresolvedTokenError
    );
  });
});
