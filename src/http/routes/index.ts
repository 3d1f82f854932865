/**
 * Query API route table and handlers
 */
import type { HttpRequest, HttpResponse, ListDecodePolicy, Logger, Mail, MailJson } from "../../shared/types.js";
import { MailSinkError, ErrorCodes, errorMessage } from "../../shared/errors.js";
import { SERVER_NAME, SERVER_VERSION, escapeHtml } from "../../shared/config.js";
import { toMailJson, type MailStore } from "../../store/index.js";
import { Router } from "../router.js";
import { emptyResponse, htmlResponse, jsonResponse } from "../formatter.js";

export const DEFAULT_LIST_LIMIT = 10;
export const DEFAULT_LIST_OFFSET = 0;

export interface RouteContext {
    store: MailStore;
    logger: Logger;
    listDecodePolicy: ListDecodePolicy;
    startedAt: Date;
}

/**
 * Build the routing table
 */
export function buildRoutes(): Router<RouteContext> {
    return new Router<RouteContext>()
        .add("GET", "/mails/:mail_id", getMail)
        .add("DELETE", "/mails/:mail_id", deleteMail)
        .add("GET", "/mails", listMails)
        .add("DELETE", "/mails", deleteAllMails)
        .add("GET", "/preview/:mail_id", previewMail)
        .add("POST", "/info", serverInfo);
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * GET /mails/:mail_id
 */
export function getMail(request: HttpRequest, context: RouteContext): HttpResponse {
    const mail = context.store.get(request.params.get("mail_id") ?? "");
    if (!mail) {
        return emptyResponse(404);
    }
    return jsonResponse(200, toMailJson(mail));
}

/**
 * DELETE /mails/:mail_id
 * An id with no stored mail answers 404
 */
export function deleteMail(request: HttpRequest, context: RouteContext): HttpResponse {
    const id = request.params.get("mail_id") ?? "";
    if (!context.store.delete(id)) {
        return emptyResponse(404);
    }
    context.logger.info("http", `Deleted mail ${id}`);
    return emptyResponse(200);
}

/**
 * GET /mails?limit=N&offset=M
 */
export function listMails(request: HttpRequest, context: RouteContext): HttpResponse {
    const limit = parseCount(request.query, "limit", DEFAULT_LIST_LIMIT);
    const offset = parseCount(request.query, "offset", DEFAULT_LIST_OFFSET);

    const mails: MailJson[] = [];
    if (limit === 0) {
        return jsonResponse(200, mails);
    }

    for (const entry of context.store.iterate(offset)) {
        let mail: Mail;
        try {
            mail = entry.decode();
        } catch (error) {
            if (context.listDecodePolicy === "fail-fast") {
                throw error;
            }
            context.logger.warn("http", `Skipping mail ${entry.id}: ${errorMessage(error)}`);
            continue;
        }

        mails.push(toMailJson(mail));
        if (mails.length >= limit) {
            break;
        }
    }

    return jsonResponse(200, mails);
}

/**
 * DELETE /mails
 */
export function deleteAllMails(request: HttpRequest, context: RouteContext): HttpResponse {
    const deleted = context.store.clear();
    context.logger.info("http", `Deleted all mails (${deleted})`);
    return jsonResponse(200, { deleted });
}

/**
 * GET /preview/:mail_id
 */
export function previewMail(request: HttpRequest, context: RouteContext): HttpResponse {
    const mail = context.store.get(request.params.get("mail_id") ?? "");
    if (!mail) {
        return emptyResponse(404);
    }
    return htmlResponse(200, renderPreview(mail));
}

/**
 * POST /info
 */
export function serverInfo(request: HttpRequest, context: RouteContext): HttpResponse {
    const stats = context.store.stats();
    return jsonResponse(200, {
        name: SERVER_NAME,
        version: SERVER_VERSION,
        mails: stats.mails,
        size: stats.size,
        uptime_seconds: Math.floor((Date.now() - context.startedAt.getTime()) / 1000),
    });
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Non-negative integer query parameter
 */
function parseCount(query: Map<string, string>, name: string, fallback: number): number {
    const raw = query.get(name);
    if (raw === undefined) {
        return fallback;
    }

    const value = /^\d+$/.test(raw) ? Number(raw) : NaN;
    if (!Number.isSafeInteger(value)) {
        throw new MailSinkError(`Invalid ${name}: ${raw}`, ErrorCodes.INVALID_QUERY, { statusCode: 400 });
    }

    return value;
}

export function renderPreview(mail: Mail): string {
    const title = escapeHtml(mail.subject || "(no subject)");
    const headers = [
        `From: ${mail.from}`,
        `To: ${mail.to.join(", ")}`,
        `Subject: ${mail.subject}`,
        `Date: ${mail.receivedAt.toISOString()}`,
    ].join("\n");

    return [
        "<!DOCTYPE html>",
        `<html><head><meta charset="utf-8"><title>${title}</title></head>`,
        `<body><pre>${escapeHtml(headers)}</pre><hr><pre>${escapeHtml(mail.body)}</pre></body></html>`,
    ].join("\n");
}
