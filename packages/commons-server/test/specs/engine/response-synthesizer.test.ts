import { deepStrictEqual, strictEqual, throws } from 'node:assert';
import { describe, it } from 'node:test';
import {
  collectTokenReferences,
  compileTemplate,
  renderTemplate
} from '../../../src/libs/engine/response-synthesizer';
import {
  TemplateCoercionError,
  UnresolvedTokenError
} from '../../../src/libs/engine/route-errors';
import { createTokenContext } from '../../../src/libs/engine/token-resolver';
import { ConfigValidationError } from '../../../src/types/route-config';
import { fixedGenerators } from '../../libs/routes';

const render = (raw: unknown, payload: unknown = {}) =>
  renderTemplate(
    compileTemplate(raw),
    createTokenContext({ payload, generators: fixedGenerators })
  );

describe('Response synthesizer', () => {
  it('should copy literals as they are', () => {
    deepStrictEqual(render({ ok: true, total: 35, items: ['a', null] }), {
      ok: true,
      total: 35,
      items: ['a', null]
    });
  });

  it('should keep the native type of a lone token', () => {
    deepStrictEqual(
      render({ id: '{$random_code}', count: '{count}' }, { count: 3 }),
      { id: 424242, count: 3 }
    );
  });

  it('should interpolate tokens inside text', () => {
    strictEqual(
      render('Bearer {$access_token} for {client_id}', { client_id: 'c-1' }),
      'Bearer access-token-1 for c-1'
    );
  });

  it('should coerce typed values', () => {
    deepStrictEqual(
      render(
        {
          created: { value: '{$current_timestamp}', type: 'int' },
          id: { value: '{user_id}', type: 'integer' },
          ratio: { value: '{ratio}', type: 'float' },
          active: { value: '{active}', type: 'bool' },
          label: { value: '{$random_code}', type: 'string' }
        },
        { user_id: '17', ratio: '0.25', active: 'true' }
      ),
      {
        created: 1700000000,
        id: 17,
        ratio: 0.25,
        active: true,
        label: '424242'
      }
    );
  });

  it('should only read value/type mappings with exactly those keys as typed', () => {
    deepStrictEqual(
      render({ field: { value: 'a', type: 'int', extra: 1 } }),
      { field: { value: 'a', type: 'int', extra: 1 } }
    );
  });

  it('should keep value/type mappings without a token as plain data', () => {
    deepStrictEqual(
      render({
        content: { type: 'link', value: 'https://example.com' },
        ratio: { value: '0.25', type: 'float' },
        attachment: { value: 'photo.png', type: 'image' }
      }),
      {
        content: { type: 'link', value: 'https://example.com' },
        ratio: { value: '0.25', type: 'float' },
        attachment: { value: 'photo.png', type: 'image' }
      }
    );
  });

  it('should reuse a synthetic value across the whole tree', () => {
    const context = createTokenContext({ payload: {} });
    const hash = context.resolve('hash', true);

    deepStrictEqual(
      renderTemplate(
        compileTemplate({ a: '{$hash}', nested: { b: '{$hash}' }, list: ['{$hash}'] }),
        context
      ),
      { a: hash, nested: { b: hash }, list: [hash] }
    );
  });

  it('should fail on unresolved tokens and impossible conversions', () => {
    throws(
      () => render({ code: '{code}' }),
      new UnresolvedTokenError('code')
    );
    throws(
      () => render({ id: { value: '{name}', type: 'int' } }, { name: 'abc' }),
      TemplateCoercionError
    );
  });

  it('should leave text that is not a token untouched', () => {
    strictEqual(render('{not a token} {1x}'), '{not a token} {1x}');
  });

  it('should turn YAML timestamps into ISO strings', () => {
    strictEqual(
      render(new Date('2024-01-02T03:04:05.000Z')),
      '2024-01-02T03:04:05.000Z'
    );
  });

  it('should reject values a configuration cannot hold', () => {
    throws(
      () => compileTemplate({ fn: () => 1 }, 'routes[0].response'),
      ConfigValidationError
    );
  });

  it('should list every referenced token', () => {
    deepStrictEqual(
      collectTokenReferences(
        compileTemplate({
          a: '{state}',
          b: [{ value: '{$current_timestamp}', type: 'int' }],
          c: 'x {$unknown} {state}'
        })
      ),
      ['state', '$current_timestamp', '$unknown']
    );
  });
});
