/**
 * Sequential-number store over POP3 (node-pop3). Ids are the message numbers
 * 1..N reported by STAT; there are no folders and no server-side filtering.
 */

import type { AccountConfig } from "./config.js";
import { ConnectionFailure, describeError, errorMessage, isConnectionError } from "./errors.js";
import type { TextNormalizer } from "./html.js";
import { loadModule } from "./lazy.js";
import { createLogger, maskAddress } from "./log.js";
import { decodeMessage, type DecodedBatch, type MailMessage } from "./message.js";
import { scanForKeywords, sliceAfterCursor, splitKeywords } from "./query.js";
import { SmtpSender, type OutgoingMessage, type SendReceipt, type TransportFactory } from "./smtp.js";
import type { FetchFilter, Pop3MailStore, SearchPage, SearchRequest, SessionState } from "./store.js";
import { inDateRange, isEmptyRange } from "./time.js";

const log = createLogger("pop3");

export type Pop3ClientLike = {
  STAT(): Promise<string>;
  RETR(msgNumber: number): Promise<string>;
  QUIT(): Promise<unknown>;
};

export type Pop3ClientFactory = (account: AccountConfig) => Promise<Pop3ClientLike>;

interface Pop3CommandOptions {
  user: string;
  password: string;
  host: string;
  port: number;
  tls: boolean;
  tlsOptions?: { rejectUnauthorized: boolean };
}

type Pop3CommandConstructor = new (options: Pop3CommandOptions) => Pop3ClientLike;

function isPop3Module(mod: unknown): mod is { default: Pop3CommandConstructor } {
  return typeof mod === "object" && mod !== null && "default" in mod && typeof mod.default === "function";
}

async function defaultClientFactory(account: AccountConfig): Promise<Pop3ClientLike> {
  const mod = await loadModule("node-pop3");
  if (!isPop3Module(mod)) throw new ConnectionFailure("node-pop3 did not load");
  const Pop3Command = mod.default;
  return new Pop3Command({
    user: account.address,
    password: account.password,
    host: account.pop3.host,
    port: account.pop3.port,
    tls: account.pop3.secure,
    tlsOptions: { rejectUnauthorized: account.tlsRejectUnauthorized },
  });
}

/** Message count from a STAT reply ("<count> <octets>"). */
export function parseStatCount(reply: string): number {
  const n = parseInt(String(reply).trim().split(/\s+/)[0] ?? "", 10);
  return Number.isNaN(n) || n < 0 ? 0 : n;
}

async function safeQuit(client: Pop3ClientLike): Promise<void> {
  try {
    await client.QUIT();
  } catch (err) {
    log.debug("QUIT failed", errorMessage(err));
  }
}

export interface Pop3StoreOptions {
  offsetMinutes: number;
  normalizer?: TextNormalizer;
  pop3ClientFactory?: Pop3ClientFactory;
  transportFactory?: TransportFactory;
}

export class Pop3Store implements Pop3MailStore {
  readonly kind = "pop3" as const;
  private client: Pop3ClientLike | null = null;
  private readonly factory: Pop3ClientFactory;
  private readonly sender: SmtpSender;

  constructor(
    private readonly account: AccountConfig,
    private readonly options: Pop3StoreOptions
  ) {
    this.factory = options.pop3ClientFactory ?? defaultClientFactory;
    this.sender = new SmtpSender(account, options.transportFactory);
  }

  get state(): SessionState {
    return this.client ? "connected" : "disconnected";
  }

  /** Authenticates by issuing STAT, the first command that needs a session. */
  async connect(): Promise<void> {
    if (this.client) return;
    let client: Pop3ClientLike | null = null;
    try {
      client = await this.factory(this.account);
      await client.STAT();
    } catch (err) {
      if (client) await safeQuit(client);
      throw new ConnectionFailure(
        `POP3 connection to ${this.account.pop3.host}:${this.account.pop3.port} failed: ${describeError(err)}`,
        { cause: err }
      );
    }
    this.client = client;
    log.debug(`Connected as ${maskAddress(this.account.address)}`);
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) await safeQuit(client);
    await this.sender.disconnect();
  }

  private async session(): Promise<Pop3ClientLike> {
    await this.connect();
    const client = this.client;
    if (!client) throw new ConnectionFailure("POP3 connection not available");
    return client;
  }

  private async messageIds(client: Pop3ClientLike): Promise<string[]> {
    let reply: string;
    try {
      reply = await client.STAT();
    } catch (err) {
      await this.disconnect();
      throw new ConnectionFailure(`POP3 STAT failed: ${describeError(err)}`, { cause: err });
    }
    const count = parseStatCount(reply);
    return Array.from({ length: count }, (_, i) => String(i + 1));
  }

  private async loadMessage(client: Pop3ClientLike, id: string): Promise<MailMessage> {
    let source: string;
    try {
      source = await client.RETR(Number(id));
    } catch (err) {
      if (isConnectionError(err)) {
        await this.disconnect();
        throw new ConnectionFailure(`POP3 connection lost: ${describeError(err)}`, { cause: err });
      }
      throw err;
    }
    return decodeMessage(id, source, {
      offsetMinutes: this.options.offsetMinutes,
      normalizer: this.options.normalizer,
    });
  }

  /**
   * The date range is applied after the limit: messages outside it are
   * dropped from the page and not replaced, so a page can come back short.
   */
  async fetch(filter: FetchFilter): Promise<DecodedBatch> {
    const client = await this.session();
    const ordered = await this.messageIds(client);
    if (filter.reverse) ordered.reverse();
    const page = sliceAfterCursor(ordered, filter.startId).slice(0, Math.max(0, filter.limit));

    const batch: DecodedBatch = { messages: [], failures: [] };
    for (const id of page) {
      try {
        batch.messages.push(await this.loadMessage(client, id));
      } catch (err) {
        if (err instanceof ConnectionFailure) throw err;
        log.warn(`Skipping message ${id}`, errorMessage(err));
        batch.failures.push({ id, error: errorMessage(err) });
      }
    }

    if (!isEmptyRange(filter.range)) {
      const before = batch.messages.length;
      batch.messages = batch.messages.filter((m) => inDateRange(m.timestamp, filter.range));
      log.debug(`Date filter dropped ${before - batch.messages.length} message(s)`);
    }
    log.info(`Fetched ${batch.messages.length} of ${page.length} message(s)`);
    return batch;
  }

  async search(request: SearchRequest): Promise<SearchPage> {
    const client = await this.session();
    const ids = (await this.messageIds(client)).reverse();
    const page = await scanForKeywords({
      ids,
      keywords: splitKeywords(request.keywords),
      field: request.field,
      pageSize: request.pageSize,
      afterId: request.afterId,
      load: (id) => this.loadMessage(client, id),
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
