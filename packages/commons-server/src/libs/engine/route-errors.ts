import type { Violation } from './schema-validator';

export type RouteErrorStatus =
  | 'no_route_match'
  | 'method_not_allowed'
  | 'content_type_mismatch'
  | 'invalid_body'
  | 'validation_failed'
  | 'template_error';

export interface ErrorResponseBody {
  status: RouteErrorStatus | 'internal_error';
  message: string;
  errors?: Violation[];
}

/**
 * Base class of every error the router turns into an HTTP response.
 */
export abstract class RouteError extends Error {
  public abstract readonly statusCode: number;
  public abstract readonly status: RouteErrorStatus;

  public toResponseBody(): ErrorResponseBody {
    return { status: this.status, message: this.message };
  }
}

export class NoRouteMatchError extends RouteError {
  public readonly statusCode = 404;
  public readonly status = 'no_route_match';

  constructor(public readonly path: string) {
    super(`No route matches ${path}`);
    this.name = 'NoRouteMatchError';
  }
}

export class MethodNotAllowedError extends RouteError {
  public readonly statusCode = 405;
  public readonly status = 'method_not_allowed';

  constructor(
    public readonly method: string,
    public readonly path: string,
    public readonly allowedMethods: readonly string[]
  ) {
    super(`Method ${method} is not allowed for ${path}`);
    this.name = 'MethodNotAllowedError';
  }
}

export class ContentTypeMismatchError extends RouteError {
  public readonly statusCode = 400;
  public readonly status = 'content_type_mismatch';

  constructor(
    public readonly expected: string,
    public readonly received: string | undefined
  ) {
    super(
      `Expected content type ${expected}, received ${received ?? 'none'}`
    );
    this.name = 'ContentTypeMismatchError';
  }
}

export class InvalidBodyError extends RouteError {
  public readonly statusCode = 400;
  public readonly status = 'invalid_body';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidBodyError';
  }
}

export class ValidationFailedError extends RouteError {
  public readonly statusCode = 400;
  public readonly status = 'validation_failed';

  constructor(public readonly violations: readonly Violation[]) {
    super(
      `Request validation failed: ${violations
        .map((violation) => violation.field)
        .join(', ')}`
    );
    this.name = 'ValidationFailedError';
  }

  public override toResponseBody(): ErrorResponseBody {
    return {
      status: this.status,
      message: this.message,
      errors: [...this.violations]
    };
  }
}

/**
 * A template could not be rendered. This points at the route configuration,
 * not at the client, hence the 500.
 */
export abstract class TemplateError extends RouteError {
  public readonly statusCode = 500;
  public readonly status = 'template_error';
}

export class UnresolvedTokenError extends TemplateError {
  constructor(public readonly token: string) {
    super(`Unresolved token {${token}}`);
    this.name = 'UnresolvedTokenError';
  }
}

export class TemplateCoercionError extends TemplateError {
  constructor(
    public readonly value: unknown,
    public readonly targetType: string
  ) {
    super(`Cannot convert ${JSON.stringify(value)} to ${targetType}`);
    this.name = 'TemplateCoercionError';
  }
}
