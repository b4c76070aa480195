/**
 * Minimal method + path-template router for the HTTP adapter.
 *
 * Templates use `:name` segments, e.g. `/tasks/:id/toggle`. Resolution
 * distinguishes an unknown path from a known path hit with the wrong method.
 */

import { TaskTreeError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/** Everything a handler sees of the request. */
export interface RouteContext {
  params: Record<string, string>;
  query: URLSearchParams;
  /** Parsed JSON body; undefined when the request had none. */
  body: unknown;
}

export interface RouteResult {
  status: number;
  body: unknown;
}

export type RouteHandler = (ctx: RouteContext) => RouteResult | Promise<RouteResult>;

interface Route {
  method: HttpMethod;
  template: string;
  segments: string[];
  handler: RouteHandler;
}

export type RouteMatch =
  | { kind: 'found'; handler: RouteHandler; params: Record<string, string> }
  | { kind: 'method-not-allowed'; allowed: HttpMethod[] }
  | { kind: 'not-found' };

function splitPath(path: string): string[] {
  return path.split('/').filter((s) => s.length > 0);
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    throw new TaskTreeError(ExitCode.INVALID_INPUT, `Malformed path segment: ${segment}`, { cause: err });
  }
}

function matchSegments(template: string[], actual: string[]): Record<string, string> | null {
  if (template.length !== actual.length) return null;
  const params: Record<string, string> = {};
  for (let i = 0; i < template.length; i++) {
    const expected = template[i] ?? '';
    const segment = actual[i] ?? '';
    if (expected.startsWith(':')) {
      params[expected.slice(1)] = decodeSegment(segment);
    } else if (expected !== segment) {
      return null;
    }
  }
  return params;
}

export class Router {
  private readonly routes: Route[] = [];

  add(method: HttpMethod, template: string, handler: RouteHandler): this {
    this.routes.push({ method, template, segments: splitPath(template), handler });
    return this;
  }

  get(template: string, handler: RouteHandler): this {
    return this.add('GET', template, handler);
  }

  post(template: string, handler: RouteHandler): this {
    return this.add('POST', template, handler);
  }

  patch(template: string, handler: RouteHandler): this {
    return this.add('PATCH', template, handler);
  }

  delete(template: string, handler: RouteHandler): this {
    return this.add('DELETE', template, handler);
  }

  resolve(method: string, pathname: string): RouteMatch {
    const actual = splitPath(pathname);
    const allowed: HttpMethod[] = [];

    for (const route of this.routes) {
      const params = matchSegments(route.segments, actual);
      if (!params) continue;
      if (route.method === method) {
        return { kind: 'found', handler: route.handler, params };
      }
      allowed.push(route.method);
    }

    return allowed.length > 0 ? { kind: 'method-not-allowed', allowed } : { kind: 'not-found' };
  }
}
