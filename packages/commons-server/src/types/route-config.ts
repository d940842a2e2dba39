/**
 * Route configuration types
 *
 * The `Raw*` interfaces describe documents as they are written in the YAML/JSON
 * route files. The loader turns them into the compiled definitions at the
 * bottom of this file.
 */
import type { RequestSchema } from '../libs/engine/schema-validator';
import type { TemplateNode } from '../libs/engine/response-synthesizer';
import type { PathMatcher } from '../libs/engine/path-matcher';

export const HttpMethods = [
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'HEAD',
  'OPTIONS'
] as const;

export type HttpMethod = (typeof HttpMethods)[number];

/**
 * Top level of a route file
 */
export interface RawRouteDocument {
  routes: RawRoute[];
}

export interface RawRoute {
  path: string;
  methods: RawMethod[];
}

export interface RawMethod {
  method?: string;
  content_type?: string;
  status_code?: number;
  request_schema?: Record<string, unknown>;
  response?: unknown;
  redirect?: RawRedirect;
  webhook?: RawWebhook;
}

export interface RawRedirect {
  enabled?: boolean;
  url: string;
  status_code?: number;
  parameters?: { name: string; value: string; optional?: boolean }[];
}

export interface RawWebhook {
  enabled?: boolean;
  discriminator?: string;
  data_mapping?: Record<string, RawWebhookBranch>;
}

export interface RawWebhookBranch {
  url: string;
  method?: string;
  headers?: Record<string, string>;
  data?: unknown;
}

/**
 * Compiled, read-only definitions
 */
export interface RouteDefinition {
  readonly path: string;
  readonly matcher: PathMatcher;
  readonly methods: readonly MethodDefinition[];
  readonly source: string;
}

export interface MethodDefinition {
  readonly method: HttpMethod;
  readonly contentType?: string;
  readonly statusCode: number;
  readonly requestSchema?: RequestSchema;
  readonly response: TemplateNode;
  readonly redirect?: RedirectSpec;
  readonly webhook?: WebhookSpec;
}

export interface RedirectSpec {
  readonly url: TemplateNode;
  readonly statusCode: number;
  readonly parameters: readonly RedirectParameter[];
}

export interface RedirectParameter {
  readonly name: string;
  readonly value: TemplateNode;
  readonly optional: boolean;
}

export interface WebhookSpec {
  readonly enabled: boolean;
  readonly discriminator: string;
  readonly branches: ReadonlyMap<string, WebhookBranch>;
}

export interface WebhookBranch {
  readonly url: TemplateNode;
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
  readonly data: TemplateNode;
}

/**
 * Validation errors
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}
