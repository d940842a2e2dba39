import { EventEmitter } from 'events';
import express, { Application, NextFunction, Request, Response } from 'express';
import {
  createServer as httpCreateServer,
  Server as httpServer
} from 'http';
import type { AddressInfo } from 'net';
import type { RequestListener } from 'http';
import { parse as qsParse } from 'qs';
import TypedEmitter from 'typed-emitter';
import type { RouteDefinition } from '../../types/route-config';
import {
  ServerErrorCodes,
  ServerEvents,
  ServerOptions,
  Transaction,
  defaultMaxTransactionLogs
} from '../../types/server.types';
import {
  ParsedBody,
  RequestRouter,
  RouteResult
} from '../engine/request-router';
import { MethodNotAllowedError, RouteError } from '../engine/route-errors';
import type { TokenGenerator } from '../engine/token-resolver';
import type { WebhookTransport } from '../engine/webhook-dispatcher';
import { CreateTransaction, getMediaType } from '../utils';

export interface ServerDependencies {
  /** outbound webhook delivery, `fetch` when missing */
  transport?: WebhookTransport;
  generators?: Readonly<Record<string, TokenGenerator>>;
}

/**
 * Create a server instance serving a compiled route table.
 *
 * Extends EventEmitter.
 */
export class ConfmockServer extends (EventEmitter as new () => TypedEmitter<ServerEvents>) {
  private serverInstance?: httpServer;
  private options: ServerOptions = {
    port: 8000,
    hostname: '0.0.0.0',
    enableAdminApi: true,
    maxTransactionLogs: defaultMaxTransactionLogs
  };
  private transactionLogs: Transaction[] = [];
  private parsedBodies = new WeakMap<Request, ParsedBody>();
  private router: RequestRouter;

  constructor(
    routes: readonly RouteDefinition[],
    options: Partial<ServerOptions> = {},
    dependencies: ServerDependencies = {}
  ) {
    super();

    this.options = { ...this.options, ...options };
    this.router = new RequestRouter(routes, {
      settings: { webhookUrl: this.options.webhookUrl },
      generators: dependencies.generators,
      transport: dependencies.transport
    });
  }

  /**
   * Start a server
   */
  public start(): void {
    this.serverInstance = httpCreateServer(this.createRequestListener());

    // handle server errors
    this.serverInstance.on('error', (error: NodeJS.ErrnoException) => {
      let errorCode: ServerErrorCodes;

      switch (error.code) {
        case 'EADDRINUSE':
          errorCode = ServerErrorCodes.PORT_ALREADY_USED;
          break;
        case 'EACCES':
          errorCode = ServerErrorCodes.PORT_INVALID;
          break;
        case 'EADDRNOTAVAIL':
          errorCode = ServerErrorCodes.HOSTNAME_UNAVAILABLE;
          break;
        case 'ENOTFOUND':
          errorCode = ServerErrorCodes.HOSTNAME_UNKNOWN;
          break;
        default:
          errorCode = ServerErrorCodes.UNKNOWN_SERVER_ERROR;
      }
      this.emit('error', errorCode, error);
    });

    try {
      this.serverInstance.listen(
        { port: this.options.port, host: this.options.hostname },
        () => {
          this.emit('started');
        }
      );
    } catch (error) {
      if (
        error instanceof Error &&
        'code' in error &&
        error.code === 'ERR_SOCKET_BAD_PORT'
      ) {
        this.emit('error', ServerErrorCodes.PORT_INVALID, error);
      } else {
        throw error;
      }
    }
  }

  /**
   * Stop the server, open connections included
   */
  public stop(): void {
    if (this.serverInstance) {
      const serverInstance = this.serverInstance;

      serverInstance.close(() => {
        this.emit('stopped');
      });
      serverInstance.closeAllConnections();
      this.serverInstance = undefined;
    }
  }

  /**
   * Address the server listens on, null when it is not started
   */
  public getAddress(): AddressInfo | null {
    const address = this.serverInstance?.address();

    return address && typeof address === 'object' ? address : null;
  }

  public getTransactionLogs(): Transaction[] {
    return [...this.transactionLogs];
  }

  /**
   * Create a request listener
   */
  public createRequestListener(): RequestListener {
    const app = express();
    app.disable('x-powered-by');
    app.disable('etag');

    app.use(this.parseBody);

    // registered ahead of the route table so that no route can shadow them
    app.get('/health', (_request, response) => {
      response.status(200).json({ status: 'ok' });
    });

    if (this.options.enableAdminApi) {
      this.createAdminEndpoint(app);
    }

    app.use(this.logRequest);
    app.use(this.handleRoute);
    app.use(this.errorHandler);

    return app;
  }

  /**
   * Parse the raw body according to its content type. Parsing failures are
   * kept on the request and answered by the router once a route is matched.
   *
   * @param request
   * @param rawBody
   */
  private processRawBody(request: Request, rawBody: Buffer[]): ParsedBody {
    const stringBody = Buffer.concat(rawBody).toString('utf8');

    if (stringBody.trim() === '') {
      return { kind: 'none' };
    }

    if (
      getMediaType(request.header('Content-Type')) ===
      'application/x-www-form-urlencoded'
    ) {
      return { kind: 'parsed', value: qsParse(stringBody, { depth: 10 }) };
    }

    try {
      return { kind: 'parsed', value: JSON.parse(stringBody) };
    } catch (error) {
      return {
        kind: 'invalid',
        error: `Malformed JSON body: ${
          error instanceof Error ? error.message : String(error)
        }`
      };
    }
  }

  /**
   * ### Middleware ###
   * Read the body as a raw string and parse it as JSON or form data
   *
   * @param request
   * @param response
   * @param next
   */
  private parseBody = (
    request: Request,
    response: Response,
    next: NextFunction
  ) => {
    const rawBody: Buffer[] = [];

    request.on('data', (chunk) => {
      rawBody.push(Buffer.from(chunk, 'binary'));
    });

    request.on('end', () => {
      this.parsedBodies.set(request, this.processRawBody(request, rawBody));
      next();
    });

    request.on('error', (error) => {
      this.emit('error', ServerErrorCodes.REQUEST_BODY_PARSE, error);
      next(error);
    });
  };

  /**
   * ### Middleware ###
   * Emit an event when response emit the 'close' event
   *
   * @param request
   * @param response
   * @param next
   */
  private logRequest = (
    request: Request,
    response: Response,
    next: NextFunction
  ) => {
    response.on('close', () => {
      const routePath =
        typeof response.locals.routePath === 'string'
          ? response.locals.routePath
          : undefined;
      const transaction = CreateTransaction(request, response, routePath);

      this.emit('transaction-complete', transaction);

      // store the transaction logs at beginning of the array
      this.transactionLogs.unshift(transaction);

      // keep only the last n transactions
      if (this.transactionLogs.length > this.options.maxTransactionLogs) {
        this.transactionLogs = this.transactionLogs.slice(
          0,
          this.options.maxTransactionLogs
        );
      }
    });

    next();
  };

  /**
   * ### Middleware ###
   * Resolve every request through the route table
   *
   * @param request
   * @param response
   * @param next
   */
  private handleRoute = (
    request: Request,
    response: Response,
    next: NextFunction
  ) => {
    let result: RouteResult;

    try {
      result = this.router.handle({
        method: request.method,
        path: request.path,
        query: request.query,
        contentType: request.header('Content-Type'),
        body: this.parsedBodies.get(request) ?? { kind: 'none' }
      });
    } catch (error) {
      next(error);

      return;
    }

    switch (result.kind) {
      case 'empty':
        response.status(result.statusCode).end();
        break;
      case 'redirect':
        response.locals.routePath = result.route.path;
        response.redirect(result.statusCode, result.location);
        break;
      case 'json':
        response.locals.routePath = result.route.path;
        response.locals.body = result.body;
        response.status(result.statusCode).json(result.body);

        result.webhook
          ?.then((webhookResult) => {
            this.emit('webhook-dispatched', webhookResult);
          })
          .catch((error: unknown) => {
            this.emit(
              'error',
              ServerErrorCodes.UNKNOWN_SERVER_ERROR,
              error instanceof Error ? error : new Error(String(error))
            );
          });
        break;
    }
  };

  /**
   * Register the admin endpoints, before the route table
   *
   * @param app
   */
  private createAdminEndpoint(app: Application) {
    app.get('/__admin/logs', (request, response) => {
      const lines = Number(request.query.lines);

      response
        .status(200)
        .json(
          Number.isInteger(lines) && lines > 0
            ? this.transactionLogs.slice(0, lines)
            : this.transactionLogs
        );
    });
  }

  /**
   * ### Middleware ###
   * Catch all error handler
   * http://expressjs.com/en/guide/error-handling.html#catching-errors
   */
  private errorHandler = (
    error: unknown,
    request: Request,
    response: Response,
    _next: NextFunction
  ) => {
    if (error instanceof RouteError) {
      if (error instanceof MethodNotAllowedError) {
        response.set('Allow', error.allowedMethods.join(', '));
      }

      const body = error.toResponseBody();
      response.locals.body = body;
      response.status(error.statusCode).json(body);

      return;
    }

    this.emit(
      'error',
      ServerErrorCodes.ROUTE_SERVING_ERROR,
      error instanceof Error ? error : new Error(String(error)),
      { requestMethod: request.method, requestPath: request.path }
    );

    const body = { status: 'internal_error', message: 'Internal server error' };
    response.locals.body = body;
    response.status(500).json(body);
  };
}
