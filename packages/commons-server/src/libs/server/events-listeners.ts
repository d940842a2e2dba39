import { format } from 'util';
import { Logger } from 'winston';
import { ServerMessages } from '../../constants/server-messages.constants';
import {
  ServerErrorCodes,
  ServerOptions,
  Transaction
} from '../../types/server.types';
import type { WebhookResult } from '../engine/webhook-dispatcher';
import { ConfmockServer } from './server';

export const listenServerEvents = function (
  server: ConfmockServer,
  options: Pick<ServerOptions, 'port' | 'hostname'>,
  logger: Logger,
  logTransaction?: boolean
): void {
  const defaultLogMeta = {
    app: 'confmock'
  };

  server.on('started', () => {
    logger.info(
      format(ServerMessages.SERVER_STARTED, server.getAddress()?.port ?? options.port),
      { ...defaultLogMeta }
    );

    if (process.send) {
      process.send('ready');
    }
  });

  server.on('stopped', () => {
    logger.info(ServerMessages.SERVER_STOPPED, { ...defaultLogMeta });
  });

  server.on('error', (errorCode, error, payload) => {
    let message = '';

    switch (errorCode) {
      case ServerErrorCodes.PORT_ALREADY_USED:
      case ServerErrorCodes.PORT_INVALID:
        message = format(ServerMessages[errorCode], options.port);
        break;
      case ServerErrorCodes.HOSTNAME_UNKNOWN:
      case ServerErrorCodes.HOSTNAME_UNAVAILABLE:
        message = format(ServerMessages[errorCode], options.hostname);
        break;
      case ServerErrorCodes.REQUEST_BODY_PARSE:
      case ServerErrorCodes.ROUTE_SERVING_ERROR:
      case ServerErrorCodes.UNKNOWN_SERVER_ERROR:
        message = format(ServerMessages[errorCode], error?.message ?? '');
        break;
    }

    logger.error(message, { ...defaultLogMeta, ...payload });
  });

  server.on('transaction-complete', (transaction: Transaction) => {
    const logMeta: Record<string, unknown> = {
      ...defaultLogMeta,
      requestMethod: transaction.request.method.toUpperCase(),
      requestPath: transaction.request.urlPath,
      routePath: transaction.routePath,
      responseStatus: transaction.response.statusCode
    };

    if (logTransaction) {
      logMeta.transaction = transaction;
    }

    logger.info('Transaction recorded', logMeta);
  });

  server.on('webhook-dispatched', (result: WebhookResult) => {
    const url = result.request?.url ?? '';
    const logMeta: Record<string, unknown> = {
      ...defaultLogMeta,
      webhookEvent: result.event,
      webhookMethod: result.request?.method,
      webhookUrl: url,
      webhookStatus: result.status
    };

    if (logTransaction && result.request) {
      logMeta.webhookBody = result.request.body;
    }

    if (result.error) {
      logger.error(
        format(ServerMessages.WEBHOOK_ERROR, result.event, url, result.error.message),
        logMeta
      );

      return;
    }

    logger.info(format(ServerMessages.WEBHOOK_DISPATCHED, result.event, url), logMeta);
  });
};
