import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { load as loadYaml } from 'js-yaml';
import { extname, join, resolve } from 'path';
import {
  ConfigValidationError,
  HttpMethod,
  HttpMethods,
  MethodDefinition,
  RedirectParameter,
  RedirectSpec,
  RouteDefinition,
  WebhookBranch,
  WebhookSpec
} from '../types/route-config';
import { PathMatcher, compilePathTemplate } from './engine/path-matcher';
import { compileTemplate } from './engine/response-synthesizer';
import { compileRequestSchema } from './engine/schema-validator';
import { isPlainObject } from './utils';

const configExtensions = ['.yaml', '.yml', '.json'];

const isHttpMethod = (value: string): value is HttpMethod =>
  HttpMethods.some((method) => method === value);

/**
 * Loads route files and compiles them into an ordered route table.
 *
 * Documents are appended in load order. Duplicate paths are kept: the router
 * scans the table linearly and the first declaration wins.
 */
export class RouteConfigLoader {
  private routes: RouteDefinition[] = [];
  private sourceFiles: string[] = [];
  private warnings: string[] = [];

  /**
   * Load every route file found at the given paths
   * @param configPaths Files or directories (absolute or relative to cwd), directories are read recursively
   */
  public loadConfig(configPaths: string | string[]): RouteDefinition[] {
    const paths = Array.isArray(configPaths) ? configPaths : [configPaths];

    for (const configPath of paths) {
      for (const file of this.listConfigFiles(configPath)) {
        this.addDocument(this.parseFile(file), file);
      }
    }

    if (this.routes.length === 0) {
      throw new ConfigValidationError(
        `No route found in configuration: ${paths.join(', ')}`
      );
    }

    return this.getRoutes();
  }

  /**
   * Compile an already parsed document and append its routes
   * @param document Parsed YAML or JSON document
   * @param source File name used in messages
   */
  public addDocument(document: unknown, source: string): RouteDefinition[] {
    this.sourceFiles.push(source);

    if (!isPlainObject(document) || document.routes === undefined) {
      this.warnings.push(`${source} does not declare any routes`);

      return [];
    }

    if (!Array.isArray(document.routes)) {
      throw new ConfigValidationError(`${source}: routes must be a list`);
    }

    const compiled = document.routes.map((route, index) =>
      this.compileRoute(route, source, `${source}: routes[${index}]`)
    );

    for (const route of compiled) {
      if (this.routes.some((existing) => existing.path === route.path)) {
        this.warnings.push(
          `${route.source}: path ${route.path} is declared more than once, the first declaration of each method wins`
        );
      }
      this.routes.push(route);
    }

    return compiled;
  }

  /**
   * Check if at least one route is loaded
   */
  public isLoaded(): boolean {
    return this.routes.length > 0;
  }

  public getRoutes(): RouteDefinition[] {
    return [...this.routes];
  }

  public getSourceFiles(): string[] {
    return [...this.sourceFiles];
  }

  /**
   * Non fatal findings (empty documents, duplicated declarations)
   */
  public getWarnings(): string[] {
    return [...this.warnings];
  }

  private listConfigFiles(configPath: string): string[] {
    const resolvedPath = resolve(process.cwd(), configPath);

    if (!existsSync(resolvedPath)) {
      throw new ConfigValidationError(
        `Config path not found: ${resolvedPath}`
      );
    }

    if (!statSync(resolvedPath).isDirectory()) {
      return [resolvedPath];
    }

    return readdirSync(resolvedPath, { recursive: true, encoding: 'utf-8' })
      .filter((entry) => configExtensions.includes(extname(entry)))
      .map((entry) => join(resolvedPath, entry))
      .filter((file) => statSync(file).isFile())
      .sort();
  }

  private parseFile(file: string): unknown {
    const content = readFileSync(file, 'utf-8');

    try {
      return extname(file) === '.json'
        ? JSON.parse(content)
        : loadYaml(content, { filename: file });
    } catch (error) {
      throw new ConfigValidationError(
        `Invalid ${extname(file).slice(1).toUpperCase()} in config file ${file}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  private compileRoute(
    raw: unknown,
    source: string,
    location: string
  ): RouteDefinition {
    if (!isPlainObject(raw)) {
      throw new ConfigValidationError(`${location}: a route must be a mapping`);
    }

    if (typeof raw.path !== 'string' || raw.path.trim() === '') {
      throw new ConfigValidationError(
        `${location}: path must be a non-empty string`
      );
    }

    if (!Array.isArray(raw.methods) || raw.methods.length === 0) {
      throw new ConfigValidationError(
        `${location}: methods must be a non-empty list`
      );
    }

    const path = raw.path;
    let matcher: PathMatcher;

    try {
      matcher = compilePathTemplate(path);
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        throw new ConfigValidationError(`${location}: ${error.message}`);
      }
      throw error;
    }

    const methods: MethodDefinition[] = [];

    raw.methods.forEach((rawMethod: unknown, index: number) => {
      const method = this.compileMethod(
        rawMethod,
        `${location}.methods[${index}]`
      );

      if (methods.some((existing) => existing.method === method.method)) {
        this.warnings.push(
          `${location}: ${method.method} ${path} is declared twice, the first declaration wins`
        );

        return;
      }
      methods.push(method);
    });

    return {
      path,
      matcher,
      methods,
      source
    };
  }

  private compileMethod(raw: unknown, location: string): MethodDefinition {
    if (!isPlainObject(raw)) {
      throw new ConfigValidationError(`${location}: a method must be a mapping`);
    }

    const verb =
      raw.method === undefined ? 'GET' : String(raw.method).toUpperCase();

    if (!isHttpMethod(verb)) {
      throw new ConfigValidationError(
        `${location}: unsupported HTTP method ${String(raw.method)}`
      );
    }

    const contentType = raw.content_type;
    const requestSchema = raw.request_schema;

    if (contentType !== undefined && typeof contentType !== 'string') {
      throw new ConfigValidationError(
        `${location}: content_type must be a string`
      );
    }

    if (requestSchema !== undefined && !isPlainObject(requestSchema)) {
      throw new ConfigValidationError(
        `${location}: request_schema must be a mapping`
      );
    }

    return {
      method: verb,
      contentType,
      statusCode: this.statusCode(raw.status_code, 200, location),
      requestSchema: requestSchema
        ? compileRequestSchema(requestSchema, location)
        : undefined,
      response: compileTemplate(raw.response ?? {}, `${location}.response`),
      redirect: this.compileRedirect(raw.redirect, `${location}.redirect`),
      webhook: this.compileWebhook(raw.webhook, `${location}.webhook`)
    };
  }

  private compileRedirect(
    raw: unknown,
    location: string
  ): RedirectSpec | undefined {
    if (raw === undefined) {
      return undefined;
    }

    if (!isPlainObject(raw)) {
      throw new ConfigValidationError(`${location}: must be a mapping`);
    }

    if (raw.enabled === false) {
      return undefined;
    }

    if (typeof raw.url !== 'string' || raw.url === '') {
      throw new ConfigValidationError(`${location}: url must be a string`);
    }

    const rawParameters = raw.parameters ?? [];

    if (!Array.isArray(rawParameters)) {
      throw new ConfigValidationError(`${location}: parameters must be a list`);
    }

    const parameters: RedirectParameter[] = rawParameters.map(
      (parameter: unknown, index: number) => {
        if (
          !isPlainObject(parameter) ||
          typeof parameter.name !== 'string' ||
          parameter.value === undefined
        ) {
          throw new ConfigValidationError(
            `${location}.parameters[${index}]: a parameter needs a name and a value`
          );
        }

        return {
          name: parameter.name,
          value: compileTemplate(
            parameter.value,
            `${location}.parameters[${index}].value`
          ),
          optional: parameter.optional === true
        };
      }
    );

    const statusCode = this.statusCode(raw.status_code, 302, location);

    if (statusCode < 300 || statusCode > 399) {
      throw new ConfigValidationError(
        `${location}: status_code must be a 3xx code`
      );
    }

    return {
      url: compileTemplate(raw.url, `${location}.url`),
      statusCode,
      parameters
    };
  }

  private compileWebhook(
    raw: unknown,
    location: string
  ): WebhookSpec | undefined {
    if (raw === undefined) {
      return undefined;
    }

    if (!isPlainObject(raw)) {
      throw new ConfigValidationError(`${location}: must be a mapping`);
    }

    const enabled = raw.enabled === true;
    const discriminator = raw.discriminator ?? 'type';

    if (typeof discriminator !== 'string' || discriminator === '') {
      throw new ConfigValidationError(
        `${location}: discriminator must be a field name`
      );
    }

    const mapping = raw.data_mapping ?? {};

    if (!isPlainObject(mapping)) {
      throw new ConfigValidationError(
        `${location}: data_mapping must be a mapping`
      );
    }

    if (enabled && Object.keys(mapping).length === 0) {
      throw new ConfigValidationError(
        `${location}: an enabled webhook needs at least one data_mapping entry`
      );
    }

    const branches = new Map<string, WebhookBranch>();

    for (const [event, branch] of Object.entries(mapping)) {
      branches.set(
        event,
        this.compileWebhookBranch(branch, `${location}.data_mapping.${event}`)
      );
    }

    return { enabled, discriminator, branches };
  }

  private compileWebhookBranch(raw: unknown, location: string): WebhookBranch {
    if (!isPlainObject(raw) || typeof raw.url !== 'string') {
      throw new ConfigValidationError(`${location}: url must be a string`);
    }

    const method =
      raw.method === undefined ? 'POST' : String(raw.method).toUpperCase();

    if (!isHttpMethod(method)) {
      throw new ConfigValidationError(
        `${location}: unsupported HTTP method ${String(raw.method)}`
      );
    }

    const headers: Record<string, string> = {};

    if (raw.headers !== undefined) {
      if (!isPlainObject(raw.headers)) {
        throw new ConfigValidationError(`${location}: headers must be a mapping`);
      }

      for (const [key, value] of Object.entries(raw.headers)) {
        headers[key] = String(value);
      }
    }

    return {
      url: compileTemplate(raw.url, `${location}.url`),
      method,
      headers,
      data: compileTemplate(raw.data ?? {}, `${location}.data`)
    };
  }

  private statusCode(value: unknown, fallback: number, location: string) {
    if (value === undefined) {
      return fallback;
    }

    if (
      typeof value !== 'number' ||
      !Number.isInteger(value) ||
      value < 100 ||
      value > 599
    ) {
      throw new ConfigValidationError(
        `${location}: status_code must be an integer between 100 and 599`
      );
    }

    return value;
  }
}
