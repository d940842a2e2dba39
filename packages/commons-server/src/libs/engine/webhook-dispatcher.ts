import type {
  HttpMethod,
  WebhookBranch,
  WebhookSpec
} from '../../types/route-config';
import { getValueAtPath, stringifyValue } from '../utils';
import { renderTemplate } from './response-synthesizer';
import type { TokenContext } from './token-resolver';

export interface WebhookRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Delivers a webhook. The response body is never read.
 */
export interface WebhookTransport {
  send(request: WebhookRequest): Promise<{ status: number }>;
}

export interface WebhookResult {
  /** discriminator value that selected the branch */
  event: string;
  request?: WebhookRequest;
  status?: number;
  error?: Error;
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export const fetchWebhookTransport: WebhookTransport = {
  async send(request) {
    const hasBody = request.method !== 'GET' && request.method !== 'HEAD';
    const response = await fetch(request.url, {
      method: request.method,
      headers: {
        ...(hasBody ? { 'Content-Type': 'application/json' } : {}),
        ...request.headers
      },
      body: hasBody ? JSON.stringify(request.body) : undefined
    });

    await response.body?.cancel();

    return { status: response.status };
  }
};

export class WebhookDispatcher {
  constructor(private transport: WebhookTransport = fetchWebhookTransport) {}

  /**
   * Select the branch keyed by the request's discriminator field, render it
   * and hand it to the transport without waiting for the delivery.
   *
   * Returns null when nothing is sent. The returned promise never rejects:
   * delivery and template failures end up in `WebhookResult.error`.
   */
  public dispatch(
    spec: WebhookSpec | undefined,
    payload: unknown,
    context: TokenContext
  ): Promise<WebhookResult> | null {
    if (!spec?.enabled) {
      return null;
    }

    const discriminatorValue = getValueAtPath(payload, spec.discriminator);

    if (discriminatorValue === undefined || discriminatorValue === null) {
      return null;
    }

    const event = stringifyValue(discriminatorValue);
    const branch = spec.branches.get(event);

    if (!branch) {
      return null;
    }

    const request = this.renderRequest(branch, context);

    if (request instanceof Error) {
      return Promise.resolve({ event, error: request });
    }

    return Promise.resolve()
      .then(() => this.transport.send(request))
      .then(
        ({ status }): WebhookResult =>
          status < 400
            ? { event, request, status }
            : {
                event,
                request,
                status,
                error: new Error(`Webhook target answered with status ${status}`)
              },
        (error: unknown): WebhookResult => ({
          event,
          request,
          error: toError(error)
        })
      );
  }

  private renderRequest(
    branch: WebhookBranch,
    context: TokenContext
  ): WebhookRequest | Error {
    try {
      return {
        url: stringifyValue(renderTemplate(branch.url, context)),
        method: branch.method,
        headers: { ...branch.headers },
        body: renderTemplate(branch.data, context)
      };
    } catch (error) {
      return toError(error);
    }
  }
}
