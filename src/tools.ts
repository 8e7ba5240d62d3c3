/**
 * Tool-invocation boundary. Every operation takes loose JSON arguments and
 * returns a response envelope; nothing here throws to the caller.
 */

import { randomUUID } from "node:crypto";
import type { ArchiveManager } from "./archive.js";
import { renderAttachmentContent, type AttachmentManager, type DownloadResult } from "./attachments.js";
import type { AccountConfig, AccountRegistry, ServerConfig } from "./config.js";
import { AttachmentFailure, MailVaultError, ValidationFailure, errorMessage, isConnectionError, type ErrorKind } from "./errors.js";
import { createLogger, maskAddress } from "./log.js";
import { toMessageRecord, type MailMessage, type MessageRecord } from "./message.js";
import { clampLimit, decodeCursor, encodeCursor, isSearchField, SEARCH_FIELDS } from "./query.js";
import type { OutgoingMessage } from "./smtp.js";
import { canRetrieve, createMailStore, type MailStore, type StoreOptions } from "./store.js";
import { buildDateRange, formatWithOffset, parseDateInput, type DateRange, type ParsedDateInput } from "./time.js";

const log = createLogger("tools");

export const MAX_SEARCH_PAGE_SIZE = 50;
export const DEFAULT_SEARCH_PAGE_SIZE = 5;
export const DEFAULT_CLEANUP_DAYS = 30;

export interface SuccessResponse<T = unknown> {
  status: "success";
  message: string;
  data: T;
  timestamp: string;
  requestId: string;
}

export interface ErrorResponse {
  status: "error";
  errorType: ErrorKind | "InternalError";
  errorMessage: string;
  timestamp: string;
  requestId: string;
}

export type ToolResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;

export type ToolArgs = Record<string, unknown>;

export interface ToolContext {
  config: ServerConfig;
  registry: AccountRegistry;
  attachments: AttachmentManager;
  archives: ArchiveManager;
  /** Store client construction; tests pass fake protocol clients here. */
  storeOptions: StoreOptions;
  now?: () => Date;
  newRequestId?: () => string;
}

export interface FetchedEmail extends MessageRecord {
  attachmentDownload?: DownloadResult;
}

// ---------------------------------------------------------------------------
// Argument coercion
// ---------------------------------------------------------------------------

export function toOptString(v: unknown): string | undefined {
  if (v == null) return undefined;
  const s = String(v).trim();
  return s.length > 0 ? s : undefined;
}

function toOptNumber(name: string, v: unknown): number | undefined {
  if (v == null || v === "") return undefined;
  const n = typeof v === "number" ? v : Number(String(v).trim());
  if (!Number.isFinite(n)) throw new ValidationFailure(`${name} must be a number`);
  return n;
}

function toBool(v: unknown, defaultValue: boolean): boolean {
  if (v == null) return defaultValue;
  if (typeof v === "boolean") return v;
  const s = String(v).trim().toLowerCase();
  if (s === "true" || s === "1" || s === "yes") return true;
  if (s === "false" || s === "0" || s === "no") return false;
  return defaultValue;
}

/** Comma-separated string or array of strings into a trimmed list. */
export function toList(v: unknown): string[] {
  if (v == null) return [];
  const items = Array.isArray(v) ? v.map((x) => String(x)) : String(v).split(",");
  return items.map((s) => s.trim()).filter(Boolean);
}

function requireString(a: ToolArgs, name: string): string {
  const v = toOptString(a[name]);
  if (!v) throw new ValidationFailure(`${name} is required`);
  return v;
}

function parseDateArg(name: string, v: unknown, offsetMinutes: number): ParsedDateInput | undefined {
  const s = toOptString(v);
  if (!s) return undefined;
  const parsed = parseDateInput(s, offsetMinutes);
  if (!parsed) {
    throw new ValidationFailure(`Invalid ${name}: ${s} (use YYYY-MM-DD, YYYY-MM-DD HH:MM[:SS] or ISO 8601)`);
  }
  return parsed;
}

export function errorKindOf(err: unknown): ErrorKind | "InternalError" {
  if (err instanceof MailVaultError) return err.kind;
  if (isConnectionError(err)) return "ConnectionFailure";
  return "InternalError";
}

// ---------------------------------------------------------------------------
// Tool descriptors (MCP JSON schema)
// ---------------------------------------------------------------------------

const ACCOUNT_PROPERTY = {
  type: "string",
  description: "Configured account address; defaults to the first enabled account",
} as const;

const MESSAGE_ID_PROPERTY = {
  type: "string",
  description: "Message id from fetch_emails or search_emails",
} as const;

export const TOOL_NAMES = [
  "fetch_emails",
  "search_emails",
  "send_email",
  "list_attachments",
  "get_attachment_info",
  "read_attachment",
  "get_storage_stats",
  "cleanup_old_attachments",
  "extract_archives",
  "list_accounts",
  "reload_accounts",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: "fetch_emails",
    description:
      "Fetch messages from a folder, optionally within a date range. Dates without a zone are read in the configured offset; a date-only end_date is inclusive.",
    inputSchema: {
      type: "object",
      properties: {
        account: ACCOUNT_PROPERTY,
        folder: { type: "string", description: "Folder name (IMAP only), default INBOX" },
        start_date: { type: "string", description: "YYYY-MM-DD[ HH:MM[:SS]], YYYY/MM/DD or ISO 8601" },
        end_date: { type: "string", description: "YYYY-MM-DD[ HH:MM[:SS]], YYYY/MM/DD or ISO 8601" },
        limit: { type: "number", description: "Max messages (1-1000)", default: 10 },
        start_id: { type: "string", description: "Continue after this message id" },
        reverse_order: { type: "boolean", description: "Newest first", default: false },
        download_attachments: { type: "boolean", description: "Store attachments locally", default: true },
      },
    },
  },
  {
    name: "search_emails",
    description:
      "Keyword search (any keyword matches, case-insensitive) with cursor pagination. Pass pagination.nextCursor back as cursor to continue.",
    inputSchema: {
      type: "object",
      properties: {
        account: ACCOUNT_PROPERTY,
        keywords: { type: "string", description: "Whitespace-separated keywords" },
        search_type: { type: "string", enum: [...SEARCH_FIELDS], default: "all" },
        page_size: { type: "number", description: "Matches per page (1-50)", default: DEFAULT_SEARCH_PAGE_SIZE },
        cursor: { type: "string", description: "Opaque cursor from the previous page" },
        folder: { type: "string", description: "Folder name (IMAP only), default INBOX" },
        download_attachments: { type: "boolean", default: true },
      },
      required: ["keywords"],
    },
  },
  {
    name: "send_email",
    description: "Send a message over SMTP. Attachments are local file paths (each at most 25 MiB).",
    inputSchema: {
      type: "object",
      properties: {
        account: ACCOUNT_PROPERTY,
        to: { type: ["string", "array"], items: { type: "string" }, description: "Comma-separated or list" },
        cc: { type: ["string", "array"], items: { type: "string" } },
        bcc: { type: ["string", "array"], items: { type: "string" } },
        subject: { type: "string" },
        body: { type: "string", description: "Plain-text body" },
        html_body: { type: "string", description: "Optional HTML body" },
        attachments: { type: ["string", "array"], items: { type: "string" }, description: "Local file paths" },
      },
      required: ["to", "subject"],
    },
  },
  {
    name: "list_attachments",
    description: "List stored files for a message, including extracted archive contents.",
    inputSchema: {
      type: "object",
      properties: { account: ACCOUNT_PROPERTY, message_id: MESSAGE_ID_PROPERTY },
      required: ["message_id"],
    },
  },
  {
    name: "get_attachment_info",
    description: "Stored attachment metadata (attachments.json) for a message.",
    inputSchema: {
      type: "object",
      properties: { account: ACCOUNT_PROPERTY, message_id: MESSAGE_ID_PROPERTY },
      required: ["message_id"],
    },
  },
  {
    name: "read_attachment",
    description:
      "Read one stored attachment. Text (.txt, .md, .csv) and HTML files come back as text when parse_content is on; everything else as base64.",
    inputSchema: {
      type: "object",
      properties: {
        account: ACCOUNT_PROPERTY,
        message_id: MESSAGE_ID_PROPERTY,
        filename: { type: "string" },
        parse_content: { type: "boolean", description: "Return text for text and HTML files", default: true },
      },
      required: ["message_id", "filename"],
    },
  },
  {
    name: "get_storage_stats",
    description: "Size and counts of the local attachment store.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "cleanup_old_attachments",
    description: "Delete stored message directories older than the given number of days.",
    inputSchema: {
      type: "object",
      properties: { days: { type: "number", default: DEFAULT_CLEANUP_DAYS } },
    },
  },
  {
    name: "extract_archives",
    description: "Extract archives in a message directory, recursively up to max_depth rounds.",
    inputSchema: {
      type: "object",
      properties: {
        account: ACCOUNT_PROPERTY,
        message_id: MESSAGE_ID_PROPERTY,
        max_depth: { type: "number", description: "Extraction rounds (default from config)" },
      },
      required: ["message_id"],
    },
  },
  {
    name: "list_accounts",
    description: "Configured accounts (address, protocol, enabled). No secrets.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "reload_accounts",
    description: "Re-read the accounts file.",
    inputSchema: { type: "object", properties: {} },
  },
];

type Handler = (a: ToolArgs) => Promise<{ message: string; data: unknown }>;

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export class MailTools {
  private readonly now: () => Date;
  private readonly newRequestId: () => string;
  private readonly handlers: Record<ToolName, Handler>;

  constructor(private readonly ctx: ToolContext) {
    this.now = ctx.now ?? (() => new Date());
    this.newRequestId = ctx.newRequestId ?? randomUUID;
    this.handlers = {
      fetch_emails: (a) => this.fetchEmails(a),
      search_emails: (a) => this.searchEmails(a),
      send_email: (a) => this.sendEmail(a),
      list_attachments: (a) => this.listAttachments(a),
      get_attachment_info: (a) => this.getAttachmentInfo(a),
      read_attachment: (a) => this.readAttachment(a),
      get_storage_stats: () => this.getStorageStats(),
      cleanup_old_attachments: (a) => this.cleanupOldAttachments(a),
      extract_archives: (a) => this.extractArchives(a),
      list_accounts: () => this.listAccounts(),
      reload_accounts: () => this.reloadAccounts(),
    };
  }

  private timestamp(): string {
    return formatWithOffset(this.now(), this.ctx.config.timezoneOffsetMinutes);
  }

  private isToolName(name: string): name is ToolName {
    return Object.prototype.hasOwnProperty.call(this.handlers, name);
  }

  async invoke(name: string, args: ToolArgs = {}): Promise<ToolResponse> {
    const requestId = this.newRequestId();
    log.info(`${name} [${requestId}]${typeof args.account === "string" ? ` account=${maskAddress(args.account)}` : ""}`);
    try {
      if (!this.isToolName(name)) throw new ValidationFailure(`Unknown tool: ${name}`);
      const { message, data } = await this.handlers[name](args);
      return { status: "success", message, data, timestamp: this.timestamp(), requestId };
    } catch (err) {
      const errorType = errorKindOf(err);
      if (errorType === "InternalError") log.error(`${name} [${requestId}] failed`, err);
      else log.warn(`${name} [${requestId}] ${errorType}`, errorMessage(err));
      return { status: "error", errorType, errorMessage: errorMessage(err), timestamp: this.timestamp(), requestId };
    }
  }

  private resolveAccount(a: ToolArgs): AccountConfig {
    const address = toOptString(a.account);
    if (address) return this.ctx.registry.require(address);
    const fallback = this.ctx.registry.defaultAccount();
    if (!fallback) throw new ValidationFailure("No enabled account configured");
    return fallback;
  }

  /** One store connection per request, closed on the way out. */
  private async withStore<T>(account: AccountConfig, run: (store: MailStore) => Promise<T>): Promise<T> {
    const store = createMailStore(account, this.ctx.storeOptions);
    try {
      return await run(store);
    } finally {
      await store.disconnect();
    }
  }

  private async storeAttachments(account: AccountConfig, message: MailMessage): Promise<FetchedEmail> {
    const record: FetchedEmail = toMessageRecord(message);
    if (message.attachments.length === 0) return record;
    try {
      record.attachmentDownload = await this.ctx.attachments.download(account.address, message.id, message.attachments);
    } catch (err) {
      log.error(`Storing attachments of message ${message.id} failed`, errorMessage(err));
      record.attachmentDownload = this.ctx.attachments.failedDownload(account.address, message.id, message.attachments, err);
    }
    return record;
  }

  private async recordsFor(account: AccountConfig, messages: MailMessage[], download: boolean): Promise<FetchedEmail[]> {
    const records: FetchedEmail[] = [];
    for (const message of messages) {
      records.push(download ? await this.storeAttachments(account, message) : toMessageRecord(message));
    }
    return records;
  }

  private async fetchEmails(a: ToolArgs): Promise<{ message: string; data: unknown }> {
    const account = this.resolveAccount(a);
    const offset = this.ctx.config.timezoneOffsetMinutes;
    const start = parseDateArg("start_date", a.start_date, offset);
    const end = parseDateArg("end_date", a.end_date, offset);
    if (start && end && start.date.getTime() > end.date.getTime()) {
      throw new ValidationFailure("start_date must not be after end_date");
    }
    const range: DateRange = buildDateRange(start, end);
    const limitArg = toOptNumber("limit", a.limit);
    if (limitArg != null && limitArg < 1) throw new ValidationFailure("limit must be at least 1");
    const limit = clampLimit(limitArg, this.ctx.config.maxFetchLimit, 10);
    const folder = toOptString(a.folder) ?? account.defaultFolder;
    const startId = toOptString(a.start_id);
    const reverse = toBool(a.reverse_order, false);
    const download = toBool(a.download_attachments, true);

    return this.withStore(account, async (store) => {
      if (!canRetrieve(store)) throw new ValidationFailure(`Account ${account.address} is send-only`);
      const batch = await store.fetch({ folder, range, limit, startId, reverse });
      const emails = await this.recordsFor(account, batch.messages, download);
      const last = emails[emails.length - 1];
      return {
        message: `Fetched ${emails.length} email(s)` + (batch.failures.length ? `, ${batch.failures.length} failed to decode` : ""),
        data: {
          account: account.address,
          protocol: account.protocol,
          folder: account.protocol === "imap" ? folder : undefined,
          count: emails.length,
          emails,
          failures: batch.failures,
          nextStartId: last ? last.id : null,
          dateRange: {
            since: range.since ? formatWithOffset(range.since, offset) : null,
            before: range.before ? formatWithOffset(range.before, offset) : null,
          },
        },
      };
    });
  }

  private async searchEmails(a: ToolArgs): Promise<{ message: string; data: unknown }> {
    const account = this.resolveAccount(a);
    const keywords = requireString(a, "keywords");
    const field = toOptString(a.search_type) ?? "all";
    if (!isSearchField(field)) {
      throw new ValidationFailure(`search_type must be one of: ${SEARCH_FIELDS.join(", ")}`);
    }
    const pageSizeArg = toOptNumber("page_size", a.page_size);
    if (pageSizeArg != null && pageSizeArg < 1) throw new ValidationFailure("page_size must be at least 1");
    const pageSize = clampLimit(pageSizeArg, MAX_SEARCH_PAGE_SIZE, DEFAULT_SEARCH_PAGE_SIZE);
    const afterId = decodeCursor(toOptString(a.cursor));
    const folder = toOptString(a.folder) ?? account.defaultFolder;
    const download = toBool(a.download_attachments, true);

    return this.withStore(account, async (store) => {
      if (!canRetrieve(store)) throw new ValidationFailure(`Account ${account.address} is send-only`);
      const page = await store.search({ keywords, field, pageSize, afterId, folder });
      const emails = await this.recordsFor(account, page.messages, download);
      return {
        message: `Found ${emails.length} matching email(s) after scanning ${page.scannedCount}`,
        data: {
          account: account.address,
          keywords,
          searchType: field,
          emails,
          failures: page.failures,
          pagination: {
            pageSize,
            scanned: page.scannedCount,
            hasMore: page.hasMore,
            nextCursor: page.hasMore && page.lastId ? encodeCursor(page.lastId) : null,
          },
        },
      };
    });
  }

  private async sendEmail(a: ToolArgs): Promise<{ message: string; data: unknown }> {
    const account = this.resolveAccount(a);
    const message: OutgoingMessage = {
      to: toList(a.to),
      cc: toList(a.cc),
      bcc: toList(a.bcc),
      subject: toOptString(a.subject) ?? "",
      body: a.body == null ? "" : String(a.body),
      htmlBody: toOptString(a.html_body),
      attachments: toList(a.attachments),
    };
    if (message.to.length === 0) throw new ValidationFailure("to is required");

    return this.withStore(account, async (store) => {
      const receipt = await store.send(message);
      return {
        message: `Sent to ${receipt.recipients.length} recipient(s)`,
        data: { account: account.address, ...receipt },
      };
    });
  }

  private async listAttachments(a: ToolArgs): Promise<{ message: string; data: unknown }> {
    const account = this.resolveAccount(a);
    const messageId = requireString(a, "message_id");
    const listing = await this.ctx.attachments.list(account.address, messageId);
    return {
      message: listing.exists
        ? `${listing.files.length} file(s) stored for message ${messageId}`
        : `No stored attachments for message ${messageId}`,
      data: listing,
    };
  }

  private async getAttachmentInfo(a: ToolArgs): Promise<{ message: string; data: unknown }> {
    const account = this.resolveAccount(a);
    const messageId = requireString(a, "message_id");
    const info = await this.ctx.attachments.getAttachmentInfo(account.address, messageId);
    return {
      message: info ? `${info.totalAttachments} attachment(s) recorded` : `No attachment metadata for message ${messageId}`,
      data: info,
    };
  }

  private async readAttachment(a: ToolArgs): Promise<{ message: string; data: unknown }> {
    const account = this.resolveAccount(a);
    const messageId = requireString(a, "message_id");
    const filename = requireString(a, "filename");
    const parse = toBool(a.parse_content, true);
    const found = await this.ctx.attachments.read(account.address, messageId, filename);
    if (!found) throw new AttachmentFailure(`Attachment ${filename} not found for message ${messageId}`);
    const rendered = renderAttachmentContent(found.path, found.data, {
      parse,
      normalizer: this.ctx.storeOptions.normalizer,
    });
    return {
      message: `Read ${found.data.length} byte(s)` + (rendered.contentType === "parsed" ? " as text" : ""),
      data: {
        filename,
        path: found.path,
        size: found.data.length,
        ...rendered,
      },
    };
  }

  private async getStorageStats(): Promise<{ message: string; data: unknown }> {
    const stats = await this.ctx.attachments.getStorageStats();
    return { message: `${stats.fileCount} file(s), ${stats.totalSizeMb} MiB`, data: stats };
  }

  private async cleanupOldAttachments(a: ToolArgs): Promise<{ message: string; data: unknown }> {
    const days = toOptNumber("days", a.days) ?? DEFAULT_CLEANUP_DAYS;
    const removed = await this.ctx.attachments.cleanup(days);
    return { message: `Removed ${removed} message director${removed === 1 ? "y" : "ies"}`, data: { days, removed } };
  }

  private async extractArchives(a: ToolArgs): Promise<{ message: string; data: unknown }> {
    const account = this.resolveAccount(a);
    const messageId = requireString(a, "message_id");
    const depthArg = toOptNumber("max_depth", a.max_depth);
    if (depthArg != null && depthArg < 1) throw new ValidationFailure("max_depth must be at least 1");
    const maxDepth = depthArg != null ? Math.floor(depthArg) : this.ctx.config.maxExtractDepth;
    const dir = this.ctx.attachments.messageDir(account.address, messageId);
    const session = await this.ctx.archives.processMessageDirectory(dir, maxDepth);
    const { totalExtracted, depthExceeded } = session.result;
    return {
      message:
        `Extracted ${totalExtracted} file(s)` +
        (depthExceeded ? ` (stopped at max depth ${maxDepth}, archives remain)` : ""),
      data: session,
    };
  }

  private async listAccounts(): Promise<{ message: string; data: unknown }> {
    const accounts = this.ctx.registry.list();
    return { message: `${accounts.length} account(s) configured`, data: accounts };
  }

  private async reloadAccounts(): Promise<{ message: string; data: unknown }> {
    const count = this.ctx.registry.reload();
    return { message: `Reloaded ${count} account(s)`, data: { count } };
  }
}
