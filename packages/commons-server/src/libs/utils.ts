import type { Request, Response } from 'express';
import type { Header, Transaction } from '../types/server.types';

export const isPlainObject = (
  value: unknown
): value is Record<string, unknown> =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  (Object.getPrototypeOf(value) === Object.prototype ||
    Object.getPrototypeOf(value) === null);

/**
 * Descend nested mappings following a dot path (`message.text`).
 * Returns undefined as soon as a step is not a mapping.
 */
export const getValueAtPath = (source: unknown, path: string): unknown => {
  let current: unknown = source;

  for (const key of path.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
};

/**
 * Media type of a Content-Type header, without parameters, lower cased
 */
export const getMediaType = (contentType?: string): string | undefined => {
  const mediaType = contentType?.split(';')[0].trim().toLowerCase();

  return mediaType ? mediaType : undefined;
};

/**
 * String form of a value interpolated in a template or a URL
 */
export const stringifyValue = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }

  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'object') {
    return JSON.stringify(value);
  }

  return String(value);
};

const authorizationHeaders = ['authorization', 'proxy-authorization'];
export const filterAuthorizationHeaders = (header: Header): Header => {
  if (authorizationHeaders.includes(header.key.toLowerCase())) {
    const headerSplit = header.value.split(' ');

    return {
      key: header.key,
      value: headerSplit.length === 1 ? '***' : `${headerSplit[0]} ***`
    };
  }

  return header;
};

/**
 * Create a transaction log entry from an express request and its response,
 * credentials masked
 */
export const CreateTransaction = (
  request: Request,
  response: Response,
  routePath?: string
): Transaction => ({
  timestamp: new Date().toISOString(),
  routePath,
  request: {
    method: request.method,
    urlPath: request.path,
    query: request.query,
    headers: Object.entries(request.headers).map(([key, value]) =>
      filterAuthorizationHeaders({
        key,
        value: Array.isArray(value) ? value.join(', ') : (value ?? '')
      })
    )
  },
  response: {
    statusCode: response.statusCode,
    statusMessage: response.statusMessage,
    body: response.locals.body
  }
});
