import type { WebhookResult } from '../libs/engine/webhook-dispatcher';

export enum ServerErrorCodes {
  PORT_ALREADY_USED = 'PORT_ALREADY_USED',
  PORT_INVALID = 'PORT_INVALID',
  HOSTNAME_UNAVAILABLE = 'HOSTNAME_UNAVAILABLE',
  HOSTNAME_UNKNOWN = 'HOSTNAME_UNKNOWN',
  UNKNOWN_SERVER_ERROR = 'UNKNOWN_SERVER_ERROR',
  REQUEST_BODY_PARSE = 'REQUEST_BODY_PARSE',
  ROUTE_SERVING_ERROR = 'ROUTE_SERVING_ERROR'
}

export const defaultMaxTransactionLogs = 100;

export interface ServerOptions {
  port: number;
  hostname: string;
  /** value of the `{$webhook_url}` token */
  webhookUrl?: string;
  enableAdminApi: boolean;
  maxTransactionLogs: number;
}

export type Header = { key: string; value: string };

export type Transaction = {
  timestamp: string;
  /** path template of the matched route */
  routePath?: string;
  request: {
    method: string;
    urlPath: string;
    query: unknown;
    headers: Header[];
  };
  response: {
    statusCode: number;
    statusMessage: string;
    body: unknown;
  };
};

// typed-emitter needs a type alias, interfaces have no index signature
export type ServerEvents = {
  started: () => void;
  stopped: () => void;
  error: (
    errorCode: ServerErrorCodes,
    originalError: Error | null,
    payload?: Record<string, unknown>
  ) => void;
  'transaction-complete': (transaction: Transaction) => void;
  'webhook-dispatched': (result: WebhookResult) => void;
};
