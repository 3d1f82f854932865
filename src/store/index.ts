/**
 * Store Module
 * Durable mail storage and record encodings
 */

export { MailStore, type MailStoreOptions, type MailEntry } from "./mail-store.js";
export { encodeMail, decodeMail, toMailJson } from "./codec.js";
