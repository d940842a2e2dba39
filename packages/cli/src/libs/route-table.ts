import {
  RouteDefinition,
  TemplateNode,
  TokenGenerator,
  collectTokenReferences,
  defaultTokenGenerators
} from 'confmock-commons-server';

export interface RouteTableLine {
  method: string;
  path: string;
  statusCode: number;
  /** `redirect`, `webhook` or both */
  features: string[];
}

export interface UnknownTokenReport {
  method: string;
  path: string;
  token: string;
}

const methodTemplates = (
  definition: RouteDefinition['methods'][number]
): TemplateNode[] => {
  const templates = [definition.response];

  if (definition.redirect) {
    templates.push(
      definition.redirect.url,
      ...definition.redirect.parameters.map((parameter) => parameter.value)
    );
  }

  definition.webhook?.branches.forEach((branch) => {
    templates.push(branch.url, branch.data);
  });

  return templates;
};

/**
 * Flatten the route table, one line per declared method
 */
export const describeRoutes = (
  routes: readonly RouteDefinition[]
): RouteTableLine[] =>
  routes.flatMap((route) =>
    route.methods.map((definition) => ({
      method: definition.method,
      path: route.path,
      statusCode: definition.redirect?.statusCode ?? definition.statusCode,
      features: [
        ...(definition.redirect ? ['redirect'] : []),
        ...(definition.webhook?.enabled ? ['webhook'] : [])
      ]
    }))
  );

export const formatRouteTable = (lines: RouteTableLine[]): string[] => {
  const methodWidth = Math.max(...lines.map((line) => line.method.length));
  const pathWidth = Math.max(...lines.map((line) => line.path.length));

  return lines.map((line) =>
    [
      line.method.padEnd(methodWidth),
      line.path.padEnd(pathWidth),
      String(line.statusCode),
      line.features.length > 0 ? `[${line.features.join(', ')}]` : ''
    ]
      .join('  ')
      .trimEnd()
  );
};

/**
 * Synthetic tokens (`{$name}`) that no generator produces. Such a template
 * answers 500 on every request.
 */
export const findUnknownSyntheticTokens = (
  routes: readonly RouteDefinition[],
  generators: Readonly<Record<string, TokenGenerator>> = defaultTokenGenerators
): UnknownTokenReport[] =>
  routes.flatMap((route) =>
    route.methods.flatMap((definition) => {
      const tokens = new Set(
        methodTemplates(definition).flatMap(collectTokenReferences)
      );

      return [...tokens]
        .filter(
          (token) =>
            token.startsWith('$') && !Object.hasOwn(generators, token.slice(1))
        )
        .map((token) => ({
          method: definition.method,
          path: route.path,
          token
        }));
    })
  );
