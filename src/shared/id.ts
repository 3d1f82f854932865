import { randomBytes } from "crypto";

/**
 * Generate a mail id: 12 hex digits of the receipt time in milliseconds
 * followed by 12 random hex digits, so key order follows receipt order
 */
export function generateMailId(receivedAt: Date = new Date()): string {
    const time = receivedAt.getTime().toString(16).padStart(12, "0");
    return `${time}${randomBytes(6).toString("hex")}`;
}
