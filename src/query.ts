import { ValidationFailure, errorMessage, isConnectionError } from "./errors.js";
import { createLogger } from "./log.js";
import type { MailMessage } from "./message.js";

const log = createLogger("query");

export type SearchField = "sender" | "recipient" | "cc" | "subject" | "content" | "attachment" | "all";

export const SEARCH_FIELDS: readonly SearchField[] = [
  "sender",
  "recipient",
  "cc",
  "subject",
  "content",
  "attachment",
  "all",
];

export function isSearchField(value: unknown): value is SearchField {
  return SEARCH_FIELDS.some((f) => f === value);
}

/** Scan budget per page: at most this many ids are decoded for each requested match. */
export const SCAN_BUDGET_FACTOR = 10;

export function clampLimit(
  value: unknown,
  maxResults: number,
  defaultLimit: number = 10
): number {
  const fallback = Number.isFinite(defaultLimit) ? Math.max(1, Math.floor(defaultLimit)) : 10;
  const cap = Number.isFinite(maxResults) ? Math.max(1, Math.floor(maxResults)) : 1000;
  const n = typeof value === "number" ? value : fallback;
  const normalized = Number.isFinite(n) ? Math.max(1, Math.floor(n)) : fallback;
  return Math.min(normalized, cap);
}

export function encodeCursor(id: string): string {
  return Buffer.from(id, "utf8").toString("base64url");
}

export function decodeCursor(cursor: string | undefined): string | undefined {
  if (!cursor) return undefined;
  const decoded = Buffer.from(cursor, "base64url").toString("utf8").trim();
  if (!decoded || encodeCursor(decoded) !== cursor.trim()) {
    throw new ValidationFailure("Invalid cursor value");
  }
  return decoded;
}

export function splitKeywords(keywords: string): string[] {
  return keywords
    .split(/\s+/)
    .map((k) => k.trim().toLowerCase())
    .filter(Boolean);
}

function fieldText(message: MailMessage, field: SearchField): string {
  const attachmentNames = message.attachments.map((a) => a.filename).join(" ");
  switch (field) {
    case "sender":
      return message.sender;
    case "recipient":
      return message.recipients.join(" ");
    case "cc":
      return message.cc.join(" ");
    case "subject":
      return message.subject;
    case "content":
      return message.body;
    case "attachment":
      return attachmentNames;
    case "all":
      return [
        message.sender,
        message.recipients.join(" "),
        message.cc.join(" "),
        message.subject,
        message.body,
        attachmentNames,
      ].join(" ");
  }
}

/** True when the field contains ANY keyword, case-insensitively. */
export function matchesKeywords(message: MailMessage, keywords: string[], field: SearchField): boolean {
  if (keywords.length === 0) return false;
  const haystack = fieldText(message, field).toLowerCase();
  if (!haystack) return false;
  return keywords.some((k) => haystack.includes(k.toLowerCase()));
}

/**
 * Position a start-id cursor in an ordered id list: the slice begins just
 * after the cursor. An unknown cursor is ignored and the list is returned whole.
 */
export function sliceAfterCursor(ids: readonly string[], cursor: string | undefined): string[] {
  if (!cursor) return [...ids];
  const index = ids.indexOf(cursor);
  if (index < 0) {
    log.warn(`Cursor ${cursor} not found, starting from the beginning`);
    return [...ids];
  }
  return ids.slice(index + 1);
}

export interface KeywordScanInput {
  /** Full id universe in scan order (newest first). */
  ids: readonly string[];
  keywords: string[];
  field: SearchField;
  pageSize: number;
  /** Id of the last scanned message of the previous page. */
  afterId?: string;
  load(id: string): Promise<MailMessage>;
}

export interface KeywordScanPage {
  messages: MailMessage[];
  /** Ids decoded during this page, in order. */
  scanned: string[];
  /** Last scanned id; pass back as `afterId` to continue. */
  lastId?: string;
  /** Unscanned ids remain. Says nothing about whether they would match. */
  hasMore: boolean;
  failures: Array<{ id: string; error: string }>;
}

/**
 * Linear keyword scan over an ordered id list. Stops at `pageSize` matches or
 * after `pageSize * SCAN_BUDGET_FACTOR` ids, whichever comes first. Messages
 * that fail to decode are skipped and reported; a lost connection ends the scan.
 */
export async function scanForKeywords(input: KeywordScanInput): Promise<KeywordScanPage> {
  const pageSize = Math.max(1, Math.floor(input.pageSize));
  const remaining = sliceAfterCursor(input.ids, input.afterId);
  const budget = Math.min(remaining.length, pageSize * SCAN_BUDGET_FACTOR);

  const messages: MailMessage[] = [];
  const scanned: string[] = [];
  const failures: Array<{ id: string; error: string }> = [];

  for (const id of remaining) {
    if (messages.length >= pageSize || scanned.length >= budget) break;
    scanned.push(id);
    try {
      const message = await input.load(id);
      if (matchesKeywords(message, input.keywords, input.field)) messages.push(message);
    } catch (err) {
      if (isConnectionError(err)) throw err;
      log.warn(`Skipping message ${id} during search`, errorMessage(err));
      failures.push({ id, error: errorMessage(err) });
    }
  }

  return {
    messages,
    scanned,
    lastId: scanned[scanned.length - 1],
    hasMore: scanned.length < remaining.length,
    failures,
  };
}
