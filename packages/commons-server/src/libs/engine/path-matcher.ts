import { match } from 'path-to-regexp';
import { ConfigValidationError } from '../../types/route-config';

export type PathParams = Record<string, string>;

/**
 * Returns the captured placeholders, or null when the path does not match.
 */
export type PathMatcher = (path: string) => PathParams | null;

export interface PathMatch<T> {
  route: T;
  params: PathParams;
}

const placeholderRegex = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/;
// characters path-to-regexp gives a meaning to
const reservedCharsRegex = /[\\{}()*+?:]/g;

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch (_error) {
    return value;
  }
};

/**
 * Convert a `{name}` path template into a matcher.
 *
 * Each segment is either a literal or a whole-segment placeholder capturing
 * exactly one non-empty segment. Matching is case sensitive and the trailing
 * slash is significant: `/messages` and `/messages/` are two routes.
 */
export const compilePathTemplate = (template: string): PathMatcher => {
  if (!template.startsWith('/')) {
    throw new ConfigValidationError(
      `Path template "${template}" must start with "/"`
    );
  }

  const names = new Set<string>();
  const pattern = template
    .split('/')
    .map((segment) => {
      const placeholder = placeholderRegex.exec(segment);

      if (placeholder) {
        const name = placeholder[1];

        if (names.has(name)) {
          throw new ConfigValidationError(
            `Path template "${template}" declares {${name}} twice`
          );
        }
        names.add(name);

        return `:${name}`;
      }

      if (segment.includes('{') || segment.includes('}')) {
        throw new ConfigValidationError(
          `Path template "${template}" has a placeholder that is not a whole segment: "${segment}"`
        );
      }

      return segment.replace(reservedCharsRegex, '\\$&');
    })
    .join('/');

  const matchFn = match<PathParams>(pattern, {
    decode: safeDecode,
    strict: true,
    sensitive: true,
    end: true
  });

  return (path: string) => {
    const result = matchFn(path);

    return result ? { ...result.params } : null;
  };
};

/**
 * Yield every route whose template matches the path, in declaration order.
 */
export function* matchPaths<T extends { matcher: PathMatcher }>(
  routes: readonly T[],
  path: string
): Generator<PathMatch<T>> {
  for (const route of routes) {
    const params = route.matcher(path);

    if (params) {
      yield { route, params };
    }
  }
}

/**
 * First route whose template matches, or null (no route match).
 */
export const matchPath = <T extends { matcher: PathMatcher }>(
  routes: readonly T[],
  path: string
): PathMatch<T> | null => {
  for (const found of matchPaths(routes, path)) {
    return found;
  }

  return null;
};
