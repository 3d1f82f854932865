/**
 * Request Line Parser
 * Only the request line is read: method, target and an ignored version token
 */
import type { HttpMethod } from "../shared/types.js";

export const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "DELETE"];

export type RequestLine =
    | { kind: "malformed" }
    | { kind: "unknown_method"; method: string }
    | { kind: "request"; method: HttpMethod; path: string; query: Map<string, string> };

/**
 * Case-insensitive method lookup
 */
export function parseMethod(token: string): HttpMethod | null {
    const upper = token.toUpperCase();
    return HTTP_METHODS.find((method) => method === upper) ?? null;
}

/**
 * Decode a query string; the last value wins on duplicate keys
 */
export function parseQuery(queryString: string): Map<string, string> {
    return new Map(new URLSearchParams(queryString));
}

/**
 * Parse a request line such as "GET /mails?limit=5&k=secret HTTP/1.1"
 */
export function parseRequestLine(line: string): RequestLine {
    const parts = line.trim().split(/\s+/).filter((part) => part.length > 0);

    if (parts.length < 2) {
        return { kind: "malformed" };
    }

    const [methodToken, target] = parts;

    const method = parseMethod(methodToken);
    if (!method) {
        return { kind: "unknown_method", method: methodToken };
    }

    // Split on the first "?"
    const queryStart = target.indexOf("?");
    const path = queryStart === -1 ? target : target.slice(0, queryStart);
    const queryString = queryStart === -1 ? "" : target.slice(queryStart + 1);

    // Targets are not validated here: the gate runs first, then an unroutable target is a 404
    return { kind: "request", method, path, query: parseQuery(queryString) };
}
