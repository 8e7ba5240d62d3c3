/**
 * Mail store clients share one capability set but come in a closed set of
 * variants, selected by the account's declared protocol:
 *   imap: folder/UID store (fetch + search + send)
 *   pop3: sequential-number store (fetch + search + send)
 *   smtp: send-only
 */

import type { AccountConfig } from "./config.js";
import type { TextNormalizer } from "./html.js";
import { ImapStore, type ImapClientFactory } from "./imap.js";
import type { DecodedBatch, MailMessage } from "./message.js";
import { Pop3Store, type Pop3ClientFactory } from "./pop3.js";
import type { SearchField } from "./query.js";
import { SmtpSender, type OutgoingMessage, type SendReceipt, type TransportFactory } from "./smtp.js";
import type { DateRange } from "./time.js";

export type SessionState = "disconnected" | "connected" | "folder-selected";

export interface FetchFilter {
  /** Ignored by the sequential store, which has no folders. */
  folder: string;
  range: DateRange;
  limit: number;
  /** Resume just after this id. Unknown ids are ignored. */
  startId?: string;
  /** Newest first. */
  reverse: boolean;
}

export interface SearchRequest {
  keywords: string;
  field: SearchField;
  pageSize: number;
  /** Last scanned id from the previous page. */
  afterId?: string;
  folder: string;
}

export interface SearchPage {
  messages: MailMessage[];
  /** Unscanned ids remain; not a promise that any of them match. */
  hasMore: boolean;
  /** Last scanned id; feed back as `afterId`. */
  lastId?: string;
  scannedCount: number;
  failures: Array<{ id: string; error: string }>;
}

export interface SessionControl {
  readonly state: SessionState;
  connect(): Promise<void>;
  /** Idempotent; never throws. */
  disconnect(): Promise<void>;
  send(message: OutgoingMessage): Promise<SendReceipt>;
}

export interface RetrievalStore extends SessionControl {
  fetch(filter: FetchFilter): Promise<DecodedBatch>;
  search(request: SearchRequest): Promise<SearchPage>;
}

export interface ImapMailStore extends RetrievalStore {
  readonly kind: "imap";
}

export interface Pop3MailStore extends RetrievalStore {
  readonly kind: "pop3";
}

export interface SendOnlyMailStore extends SessionControl {
  readonly kind: "smtp";
}

export type MailStore = ImapMailStore | Pop3MailStore | SendOnlyMailStore;

export interface StoreOptions {
  offsetMinutes: number;
  normalizer?: TextNormalizer;
  imapClientFactory?: ImapClientFactory;
  pop3ClientFactory?: Pop3ClientFactory;
  transportFactory?: TransportFactory;
}

/** Send-only variant: the session is the SMTP transport itself. */
class SendOnlyStore implements SendOnlyMailStore {
  readonly kind = "smtp" as const;
  private readonly sender: SmtpSender;

  constructor(account: AccountConfig, options: StoreOptions) {
    this.sender = new SmtpSender(account, options.transportFactory);
  }

  get state(): SessionState {
    return this.sender.connected ? "connected" : "disconnected";
  }

  async connect(): Promise<void> {
    await this.sender.connect();
  }

  async disconnect(): Promise<void> {
    await this.sender.disconnect();
  }

  send(message: OutgoingMessage): Promise<SendReceipt> {
    return this.sender.send(message);
  }
}

export function createMailStore(account: AccountConfig, options: StoreOptions): MailStore {
  switch (account.protocol) {
    case "imap":
      return new ImapStore(account, options);
    case "pop3":
      return new Pop3Store(account, options);
    case "smtp":
      return new SendOnlyStore(account, options);
  }
}

export function canRetrieve(store: MailStore): store is ImapMailStore | Pop3MailStore {
  return store.kind !== "smtp";
}
