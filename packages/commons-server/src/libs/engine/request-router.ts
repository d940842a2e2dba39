import type {
  MethodDefinition,
  RedirectSpec,
  RouteDefinition
} from '../../types/route-config';
import { getMediaType, stringifyValue } from '../utils';
import { matchPaths, type PathParams } from './path-matcher';
import { renderTemplate } from './response-synthesizer';
import {
  ContentTypeMismatchError,
  InvalidBodyError,
  MethodNotAllowedError,
  NoRouteMatchError,
  TemplateCoercionError,
  UnresolvedTokenError,
  ValidationFailedError
} from './route-errors';
import { validateRequest } from './schema-validator';
import {
  createTokenContext,
  defaultTokenGenerators,
  type TokenContext,
  type TokenGenerator,
  type TokenSettings
} from './token-resolver';
import {
  WebhookDispatcher,
  type WebhookResult,
  type WebhookTransport
} from './webhook-dispatcher';

export type ParsedBody =
  | { kind: 'none' }
  | { kind: 'parsed'; value: unknown }
  | { kind: 'invalid'; error: string };

export interface RouterRequest {
  method: string;
  path: string;
  query: unknown;
  contentType?: string;
  body: ParsedBody;
}

export type RouteResult =
  | {
      kind: 'json';
      statusCode: number;
      body: unknown;
      route: RouteDefinition;
      webhook: Promise<WebhookResult> | null;
    }
  | {
      kind: 'redirect';
      statusCode: number;
      location: string;
      route: RouteDefinition;
    }
  | { kind: 'empty'; statusCode: 204 };

export interface RequestRouterOptions {
  settings?: TokenSettings;
  generators?: Readonly<Record<string, TokenGenerator>>;
  transport?: WebhookTransport;
}

type RouteLookup =
  | {
      status: 'matched';
      route: RouteDefinition;
      params: PathParams;
      definition: MethodDefinition;
    }
  | { status: 'no-route' }
  | { status: 'no-method'; allowedMethods: string[] };

// answered with an empty 204 unless a route declares them
const browserPaths = new Set([
  '/favicon.ico',
  '/robots.txt',
  '/sitemap.xml',
  '/humans.txt'
]);

export class RequestRouter {
  private dispatcher: WebhookDispatcher;
  private settings: TokenSettings;
  private generators: Readonly<Record<string, TokenGenerator>>;

  constructor(
    private routes: readonly RouteDefinition[],
    options: RequestRouterOptions = {}
  ) {
    this.dispatcher = new WebhookDispatcher(options.transport);
    this.settings = options.settings ?? {};
    this.generators = options.generators ?? defaultTokenGenerators;
  }

  /**
   * Answer one request. Client and configuration errors are thrown as
   * RouteError subclasses.
   */
  public handle(request: RouterRequest): RouteResult {
    const method = request.method.toUpperCase();
    const lookup = this.lookup(method, request.path);

    if (lookup.status === 'no-route') {
      if (browserPaths.has(request.path)) {
        return { kind: 'empty', statusCode: 204 };
      }

      throw new NoRouteMatchError(request.path);
    }

    if (lookup.status === 'no-method') {
      throw new MethodNotAllowedError(
        method,
        request.path,
        lookup.allowedMethods
      );
    }

    const { route, params, definition } = lookup;

    this.checkContentType(definition, request);

    const payload = this.selectPayload(method, request);
    const validation = validateRequest(definition.requestSchema, payload);

    if (!validation.valid) {
      throw new ValidationFailedError(validation.violations);
    }

    const context = createTokenContext({
      payload,
      pathParams: params,
      generators: this.generators,
      settings: this.settings
    });

    if (definition.redirect) {
      return {
        kind: 'redirect',
        statusCode: definition.redirect.statusCode,
        location: this.buildRedirectLocation(definition.redirect, context),
        route
      };
    }

    const body = renderTemplate(definition.response, context);
    const webhook = this.dispatcher.dispatch(
      definition.webhook,
      payload,
      context
    );

    return {
      kind: 'json',
      statusCode: definition.statusCode,
      body,
      route,
      webhook
    };
  }

  /**
   * The first route matching both the path and the method wins. HEAD is
   * answered by the GET definition of a route that does not declare it. When
   * paths match but none declares the method, the union of their methods is
   * allowed.
   */
  private lookup(method: string, path: string): RouteLookup {
    let pathMatched = false;
    const allowedMethods = new Set<string>();

    for (const { route, params } of matchPaths(this.routes, path)) {
      pathMatched = true;
      const definition =
        route.methods.find((candidate) => candidate.method === method) ??
        (method === 'HEAD'
          ? route.methods.find((candidate) => candidate.method === 'GET')
          : undefined);

      if (definition) {
        return { status: 'matched', route, params, definition };
      }

      route.methods.forEach((candidate) => allowedMethods.add(candidate.method));
    }

    return pathMatched
      ? { status: 'no-method', allowedMethods: [...allowedMethods] }
      : { status: 'no-route' };
  }

  /**
   * Only requests carrying a body are checked: GET and DELETE calls declared
   * with a content type usually send none.
   */
  private checkContentType(
    definition: MethodDefinition,
    request: RouterRequest
  ) {
    if (!definition.contentType || request.body.kind === 'none') {
      return;
    }

    const expected = getMediaType(definition.contentType);
    const received = getMediaType(request.contentType);

    if (expected !== received) {
      throw new ContentTypeMismatchError(definition.contentType, received);
    }
  }

  private selectPayload(method: string, request: RouterRequest): unknown {
    if (method === 'GET' || method === 'HEAD') {
      return request.query;
    }

    switch (request.body.kind) {
      case 'none':
        return request.query;
      case 'invalid':
        throw new InvalidBodyError(request.body.error);
      case 'parsed':
        return request.body.value;
    }
  }

  private buildRedirectLocation(
    redirect: RedirectSpec,
    context: TokenContext
  ): string {
    const rawUrl = stringifyValue(renderTemplate(redirect.url, context));
    let target: URL;

    try {
      target = new URL(rawUrl);
    } catch (_error) {
      throw new TemplateCoercionError(rawUrl, 'url');
    }

    for (const parameter of redirect.parameters) {
      let value: unknown;

      try {
        value = renderTemplate(parameter.value, context);
      } catch (error) {
        if (parameter.optional && error instanceof UnresolvedTokenError) {
          continue;
        }
        throw error;
      }

      target.searchParams.append(parameter.name, stringifyValue(value));
    }

    return target.toString();
  }
}
