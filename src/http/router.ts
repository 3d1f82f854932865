/**
 * Router
 * Ordered (method, pattern, handler) table; the first registered match wins
 */
import type { HttpMethod, HttpRequest, HttpResponse } from "../shared/types.js";

const PARAM_MARKER = ":";

export type RouteHandler<C> = (request: HttpRequest, context: C) => HttpResponse;

export interface Route<C> {
    method: HttpMethod;
    pattern: string;
    segments: string[];
    handler: RouteHandler<C>;
}

export interface RouteMatch<C> {
    route: Route<C>;
    params: Map<string, string>;
}

export class Router<C> {
    private readonly routes: Route<C>[] = [];

    /**
     * Register a route. Patterns use ":name" segments for parameters.
     */
    add(method: HttpMethod, pattern: string, handler: RouteHandler<C>): this {
        this.routes.push({ method, pattern, segments: splitPath(pattern), handler });
        return this;
    }

    /**
     * Find the first route for this method whose pattern matches the path
     */
    match(method: HttpMethod, path: string): RouteMatch<C> | null {
        const segments = splitPath(path);

        for (const route of this.routes) {
            if (route.method !== method) continue;

            const params = matchSegments(route.segments, segments);
            if (params) {
                return { route, params };
            }
        }

        return null;
    }

    get size(): number {
        return this.routes.length;
    }
}

/**
 * Split a path into segments after trimming one trailing "/"
 */
export function splitPath(path: string): string[] {
    const trimmed = path.endsWith("/") ? path.slice(0, -1) : path;
    return trimmed.split("/");
}

/**
 * Match a pattern against a path
 * @returns bound parameters, or null when the path does not match
 */
export function matchPath(pattern: string, path: string): Map<string, string> | null {
    return matchSegments(splitPath(pattern), splitPath(path));
}

function matchSegments(patternSegments: string[], pathSegments: string[]): Map<string, string> | null {
    if (patternSegments.length !== pathSegments.length) {
        return null;
    }

    const params = new Map<string, string>();

    for (let i = 0; i < patternSegments.length; i++) {
        const patternPart = patternSegments[i];
        const pathPart = pathSegments[i];

        if (patternPart.startsWith(PARAM_MARKER)) {
            params.set(patternPart.slice(PARAM_MARKER.length), pathPart);
        } else if (patternPart !== pathPart) {
            return null;
        }
    }

    return params;
}
