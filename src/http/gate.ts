/**
 * Access Gate
 * Shared-secret check on the `k` query parameter, run before routing
 */
import { createHash, timingSafeEqual } from "crypto";

export const ACCESS_KEY_PARAM = "k";

/**
 * Missing and wrong keys are both just `false`
 */
export function checkAccess(query: Map<string, string>, secret: string): boolean {
    const provided = query.get(ACCESS_KEY_PARAM);
    if (provided === undefined || !secret) {
        return false;
    }

    // Equal-length digests for a constant-time comparison
    return timingSafeEqual(digest(provided), digest(secret));
}

function digest(value: string): Buffer {
    return createHash("sha256").update(value, "utf-8").digest();
}
