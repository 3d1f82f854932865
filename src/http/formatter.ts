/**
 * HTTP Response Formatter
 */
import type { HttpResponse, HttpStatus } from "../shared/types.js";

const STATUS_TEXT: Record<HttpStatus, string> = {
    200: "OK",
    400: "Bad Request",
    404: "Not Found",
    500: "Internal Server Error",
};

/**
 * Format a response for sending. Bodiless responses are the status line alone.
 */
export function formatResponse(response: HttpResponse): string {
    const statusLine = `HTTP/1.1 ${response.status} ${STATUS_TEXT[response.status]}\r\n`;

    if (response.body === undefined) {
        return `${statusLine}\r\n`;
    }

    return (
        statusLine +
        `Content-Type: ${response.contentType ?? "text/plain; charset=utf-8"}\r\n` +
        `Content-Length: ${Buffer.byteLength(response.body, "utf-8")}\r\n` +
        "\r\n" +
        response.body
    );
}

export function emptyResponse(status: HttpStatus): HttpResponse {
    return { status };
}

export function jsonResponse(status: HttpStatus, value: unknown): HttpResponse {
    return { status, contentType: "application/json", body: JSON.stringify(value) };
}

export function htmlResponse(status: HttpStatus, html: string): HttpResponse {
    return { status, contentType: "text/html; charset=utf-8", body: html };
}
