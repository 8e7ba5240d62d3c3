/**
 * Folder/UID store over IMAP (imapflow). Read-only on the mailbox: folders
 * are opened read-only and nothing is flagged, moved or deleted.
 */

import { ImapFlow } from "imapflow";
import type { AccountConfig } from "./config.js";
import { ConnectionFailure, describeError, errorMessage, isConnectionError } from "./errors.js";
import type { TextNormalizer } from "./html.js";
import { createLogger, maskAddress } from "./log.js";
import { decodeMessage, type DecodedBatch, type MailMessage } from "./message.js";
import { scanForKeywords, sliceAfterCursor, splitKeywords } from "./query.js";
import { SmtpSender, type OutgoingMessage, type SendReceipt, type TransportFactory } from "./smtp.js";
import type { FetchFilter, ImapMailStore, SearchPage, SearchRequest, SessionState } from "./store.js";
import type { DateRange } from "./time.js";

const log = createLogger("imap");

export type ImapClientLike = {
  connect(): Promise<void>;
  logout(): Promise<void>;
  mailboxOpen(path: string, options?: { readOnly?: boolean }): Promise<unknown>;
  search(query: Record<string, unknown>, options?: { uid?: boolean }): Promise<number[] | false>;
  fetchOne(
    range: string,
    query: Record<string, unknown>,
    options?: { uid?: boolean }
  ): Promise<{ uid?: number; source?: Buffer } | false>;
};

export type ImapClientFactory = (account: AccountConfig) => ImapClientLike;

function defaultClientFactory(account: AccountConfig): ImapClientLike {
  return new ImapFlow({
    host: account.imap.host,
    port: account.imap.port,
    secure: account.imap.secure,
    auth: {
      user: account.address,
      pass: account.password,
    },
    tls: { rejectUnauthorized: account.tlsRejectUnauthorized },
    logger: false,
  }) as unknown as ImapClientLike;
}

async function safeLogout(client: ImapClientLike): Promise<void> {
  try {
    await client.logout();
  } catch (err) {
    // Connection may already be closed (server BYE or timeout).
    log.debug("Logout failed", errorMessage(err));
  }
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** UTC-midnight marker for the calendar day of `instant` at the fixed offset. */
function calendarDay(instant: Date, offsetMinutes: number): Date {
  const shifted = new Date(instant.getTime() + offsetMinutes * 60 * 1000);
  return new Date(Date.UTC(shifted.getUTCFullYear(), shifted.getUTCMonth(), shifted.getUTCDate()));
}

/**
 * IMAP SINCE/BEFORE compare whole days. The exclusive end moves to the next
 * day unless it already sits on midnight, so a date-only end stays inclusive.
 */
export function imapDayBounds(range: DateRange, offsetMinutes: number): { since?: Date; before?: Date } {
  const bounds: { since?: Date; before?: Date } = {};
  if (range.since) bounds.since = calendarDay(range.since, offsetMinutes);
  if (range.before) {
    const day = calendarDay(range.before, offsetMinutes);
    const atMidnight = range.before.getTime() + offsetMinutes * 60 * 1000 === day.getTime();
    bounds.before = atMidnight ? day : new Date(day.getTime() + DAY_MS);
  }
  return bounds;
}

export interface ImapStoreOptions {
  offsetMinutes: number;
  normalizer?: TextNormalizer;
  imapClientFactory?: ImapClientFactory;
  transportFactory?: TransportFactory;
}

export class ImapStore implements ImapMailStore {
  readonly kind = "imap" as const;
  private client: ImapClientLike | null = null;
  private selectedFolder: string | null = null;
  private readonly factory: ImapClientFactory;
  private readonly sender: SmtpSender;

  constructor(
    private readonly account: AccountConfig,
    private readonly options: ImapStoreOptions
  ) {
    this.factory = options.imapClientFactory ?? defaultClientFactory;
    this.sender = new SmtpSender(account, options.transportFactory);
  }

  get state(): SessionState {
    if (!this.client) return "disconnected";
    return this.selectedFolder ? "folder-selected" : "connected";
  }

  async connect(): Promise<void> {
    if (this.client) return;
    const client = this.factory(this.account);
    try {
      await client.connect();
    } catch (err) {
      await safeLogout(client);
      throw new ConnectionFailure(
        `IMAP connection to ${this.account.imap.host}:${this.account.imap.port} failed: ${describeError(err)}`,
        { cause: err }
      );
    }
    this.client = client;
    this.selectedFolder = null;
    log.debug(`Connected as ${maskAddress(this.account.address)}`);
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.selectedFolder = null;
    if (client) await safeLogout(client);
    await this.sender.disconnect();
  }

  private async session(): Promise<ImapClientLike> {
    await this.connect();
    const client = this.client;
    if (!client) throw new ConnectionFailure("IMAP connection not available");
    return client;
  }

  private async selectFolder(folder: string): Promise<ImapClientLike> {
    const client = await this.session();
    if (this.selectedFolder === folder) return client;
    try {
      await client.mailboxOpen(folder, { readOnly: true });
    } catch (err) {
      if (isConnectionError(err)) {
        await this.disconnect();
        throw new ConnectionFailure(`IMAP connection lost: ${describeError(err)}`, { cause: err });
      }
      throw new ConnectionFailure(`Cannot open folder ${folder}: ${describeError(err)}`, { cause: err });
    }
    this.selectedFolder = folder;
    return client;
  }

  /** All UIDs in the selected folder matching the query, ascending. */
  private async searchUids(client: ImapClientLike, query: Record<string, unknown>): Promise<string[]> {
    let raw: number[] | false;
    try {
      raw = await client.search(query, { uid: true });
    } catch (err) {
      throw new ConnectionFailure(`IMAP search failed: ${describeError(err)}`, { cause: err });
    }
    const uids = Array.isArray(raw) ? [...raw] : [];
    return uids.sort((a, b) => a - b).map(String);
  }

  private async loadMessage(client: ImapClientLike, uid: string): Promise<MailMessage> {
    let msg: { uid?: number; source?: Buffer } | false;
    try {
      msg = await client.fetchOne(uid, { uid: true, source: true }, { uid: true });
    } catch (err) {
      if (isConnectionError(err)) {
        await this.disconnect();
        throw new ConnectionFailure(`IMAP connection lost: ${describeError(err)}`, { cause: err });
      }
      throw err;
    }
    if (!msg || !msg.source) throw new Error(`Message UID ${uid} has no source`);
    return decodeMessage(uid, msg.source, {
      offsetMinutes: this.options.offsetMinutes,
      normalizer: this.options.normalizer,
    });
  }

  async fetch(filter: FetchFilter): Promise<DecodedBatch> {
    const client = await this.selectFolder(filter.folder);
    const bounds = imapDayBounds(filter.range, this.options.offsetMinutes);
    const query: Record<string, unknown> = {};
    if (bounds.since) query.since = bounds.since;
    if (bounds.before) query.before = bounds.before;
    if (!bounds.since && !bounds.before) query.all = true;

    const ordered = await this.searchUids(client, query);
    if (filter.reverse) ordered.reverse();
    const page = sliceAfterCursor(ordered, filter.startId).slice(0, Math.max(0, filter.limit));

    const batch: DecodedBatch = { messages: [], failures: [] };
    for (const uid of page) {
      try {
        batch.messages.push(await this.loadMessage(client, uid));
      } catch (err) {
        if (err instanceof ConnectionFailure) throw err;
        log.warn(`Skipping message UID ${uid}`, errorMessage(err));
        batch.failures.push({ id: uid, error: errorMessage(err) });
      }
    }
    log.info(`Fetched ${batch.messages.length} of ${page.length} message(s) from ${filter.folder}`);
    return batch;
  }

  async search(request: SearchRequest): Promise<SearchPage> {
    const client = await this.selectFolder(request.folder);
    const ids = (await this.searchUids(client, { all: true })).reverse();
    const page = await scanForKeywords({
      ids,
      keywords: splitKeywords(request.keywords),
      field: request.field,
      pageSize: request.pageSize,
      afterId: request.afterId,
      load: (uid) => this.loadMessage(client, uid),
    });
    return {
      messages: page.messages,
      hasMore: page.hasMore,
      lastId: page.lastId,
      scannedCount: page.scanned.length,
      failures: page.failures,
    };
  }

  send(message: OutgoingMessage): Promise<SendReceipt> {
    return this.sender.send(message);
  }
}
