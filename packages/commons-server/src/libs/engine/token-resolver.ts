import { createHash, randomBytes, randomInt, randomUUID } from 'crypto';
import { isPlainObject } from '../utils';
import { UnresolvedTokenError } from './route-errors';
import type { PathParams } from './path-matcher';

export interface TokenSettings {
  webhookUrl?: string;
}

export interface GeneratorInput {
  payload: unknown;
  now: Date;
  settings: TokenSettings;
}

export type TokenGenerator = (input: GeneratorInput) => unknown;

const epochSeconds = (date: Date) => Math.floor(date.getTime() / 1000);

/**
 * Synthetic tokens (`{$name}`). Adding an entry here is the only way to add one.
 */
export const defaultTokenGenerators: Readonly<Record<string, TokenGenerator>> =
  {
    current_timestamp: ({ now }) => epochSeconds(now),
    random_code: () => randomInt(0, 2 ** 31 - 1),
    hash: ({ payload, now }) =>
      createHash('md5')
        .update(JSON.stringify(payload ?? null))
        .update(String(now.getTime()))
        .update(randomBytes(8))
        .digest('hex'),
    access_token: ({ now }) => `${randomUUID()}-${epochSeconds(now)}`,
    refresh_token: () => randomUUID(),
    verification_code: () => String(randomInt(0, 1_000_000)).padStart(6, '0'),
    session_id: () => randomUUID(),
    webhook_url: ({ settings }) => {
      if (!settings.webhookUrl) {
        throw new UnresolvedTokenError('$webhook_url');
      }

      return settings.webhookUrl;
    }
  };

/**
 * Values tokens resolve to while handling one request
 */
export interface TokenContext {
  /**
   * @param name - token name without braces or `$`
   * @param synthetic - `{$name}` rather than `{name}`
   */
  resolve(name: string, synthetic: boolean): unknown;
}

export interface TokenContextInput {
  payload: unknown;
  pathParams?: PathParams;
  generators?: Readonly<Record<string, TokenGenerator>>;
  settings?: TokenSettings;
  now?: Date;
}

class RequestTokenContext implements TokenContext {
  private syntheticValues = new Map<string, unknown>();
  private requestValues: Record<string, unknown>;

  constructor(
    private input: GeneratorInput,
    pathParams: PathParams,
    private generators: Readonly<Record<string, TokenGenerator>>
  ) {
    // path parameters take precedence over payload fields of the same name
    this.requestValues = {
      ...(isPlainObject(input.payload) ? input.payload : {}),
      ...pathParams
    };
  }

  public resolve(name: string, synthetic: boolean): unknown {
    if (!synthetic) {
      const value = Object.hasOwn(this.requestValues, name)
        ? this.requestValues[name]
        : undefined;

      if (value === undefined) {
        throw new UnresolvedTokenError(name);
      }

      return value;
    }

    if (this.syntheticValues.has(name)) {
      return this.syntheticValues.get(name);
    }

    const generator = Object.hasOwn(this.generators, name)
      ? this.generators[name]
      : undefined;

    if (!generator) {
      throw new UnresolvedTokenError(`$${name}`);
    }

    const value = generator(this.input);
    this.syntheticValues.set(name, value);

    return value;
  }
}

/**
 * Build the token context of a request. Synthetic values are computed on first
 * use and then reused, so a token resolves to the same value everywhere in the
 * response and the webhook of the same request.
 */
export const createTokenContext = ({
  payload,
  pathParams = {},
  generators = defaultTokenGenerators,
  settings = {},
  now = new Date()
}: TokenContextInput): TokenContext =>
  new RequestTokenContext({ payload, now, settings }, pathParams, generators);
