// Shared fixtures for the test suites: raw RFC 822 messages, fake protocol
// clients and temporary directories.

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { SendMailOptions } from "nodemailer";
import { buildAccountConfig, type AccountConfig } from "./config.js";
import type { ImapClientLike } from "./imap.js";
import type { AttachmentRef, MailMessage } from "./message.js";
import type { Pop3ClientLike } from "./pop3.js";
import type { MailTransportLike, SentInfoLike } from "./smtp.js";

export interface RawAttachment {
  filename: string;
  contentType?: string;
  content: Buffer | string;
  /** Filename parameter exactly as written on the wire; defaults to `filename`. */
  wireName?: string;
}

export interface RawMessageInput {
  from?: string;
  to?: string;
  cc?: string;
  subject?: string;
  /** null leaves the Date header out. */
  date?: string | null;
  text?: string;
  html?: string;
  attachments?: RawAttachment[];
}

const CRLF = "\r\n";

function bodyPart(input: RawMessageInput): string[] {
  if (input.text != null && input.html != null) {
    const alt = "alt-boundary-7";
    return [
      `Content-Type: multipart/alternative; boundary="${alt}"`,
      "",
      `--${alt}`,
      "Content-Type: text/plain; charset=utf-8",
      "",
      input.text,
      `--${alt}`,
      "Content-Type: text/html; charset=utf-8",
      "",
      input.html,
      `--${alt}--`,
    ];
  }
  if (input.html != null) {
    return ["Content-Type: text/html; charset=utf-8", "", input.html];
  }
  return ["Content-Type: text/plain; charset=utf-8", "", input.text ?? ""];
}

export function buildRawMessage(input: RawMessageInput): string {
  const headers = [
    `From: ${input.from ?? "Sender <sender@example.com>"}`,
    `To: ${input.to ?? "recipient@example.com"}`,
    ...(input.cc ? [`Cc: ${input.cc}`] : []),
    `Subject: ${input.subject ?? "Test message"}`,
    ...(input.date === null ? [] : [`Date: ${input.date ?? "01 May 2024 10:00:00 +0000"}`]),
    "MIME-Version: 1.0",
  ];
  const attachments = input.attachments ?? [];
  if (attachments.length === 0) {
    return [...headers, ...bodyPart(input)].join(CRLF) + CRLF;
  }
  const mixed = "mixed-boundary-7";
  const lines = [...headers, `Content-Type: multipart/mixed; boundary="${mixed}"`, "", `--${mixed}`, ...bodyPart(input)];
  for (const a of attachments) {
    const wireName = a.wireName ?? a.filename;
    const data = typeof a.content === "string" ? Buffer.from(a.content, "utf8") : a.content;
    lines.push(
      `--${mixed}`,
      `Content-Type: ${a.contentType ?? "application/octet-stream"}; name="${wireName}"`,
      `Content-Disposition: attachment; filename="${wireName}"`,
      "Content-Transfer-Encoding: base64",
      "",
      data.toString("base64")
    );
  }
  lines.push(`--${mixed}--`);
  return lines.join(CRLF) + CRLF;
}

export function testAccount(protocol: "imap" | "pop3" | "smtp" = "imap", address = "tester@example.com"): AccountConfig {
  return buildAccountConfig(address, { password: "test-secret", protocol, display_name: "Test User" });
}

// ---------------------------------------------------------------------------
// Fake protocol clients
// ---------------------------------------------------------------------------

export interface FakeImapMessage {
  uid: number;
  internalDate: Date;
  raw: string;
}

export class FakeImapClient implements ImapClientLike {
  connected = false;
  connectCalls = 0;
  logoutCalls = 0;
  opened: string[] = [];
  fetched: string[] = [];
  failConnect: Error | null = null;

  constructor(public messages: FakeImapMessage[]) {}

  async connect(): Promise<void> {
    this.connectCalls++;
    if (this.failConnect) throw this.failConnect;
    this.connected = true;
  }

  async logout(): Promise<void> {
    this.logoutCalls++;
    this.connected = false;
  }

  async mailboxOpen(folder: string): Promise<unknown> {
    this.opened.push(folder);
    return { path: folder };
  }

  async search(query: Record<string, unknown>): Promise<number[] | false> {
    const since = query.since instanceof Date ? query.since.getTime() : undefined;
    const before = query.before instanceof Date ? query.before.getTime() : undefined;
    return this.messages
      .filter((m) => since == null || m.internalDate.getTime() >= since)
      .filter((m) => before == null || m.internalDate.getTime() < before)
      .map((m) => m.uid);
  }

  async fetchOne(range: string): Promise<{ uid?: number; source?: Buffer } | false> {
    this.fetched.push(range);
    const m = this.messages.find((x) => String(x.uid) === range);
    return m ? { uid: m.uid, source: Buffer.from(m.raw, "utf8") } : false;
  }
}

export class FakePop3Client implements Pop3ClientLike {
  quitCalls = 0;
  retrieved: number[] = [];

  constructor(public messages: string[]) {}

  async STAT(): Promise<string> {
    const octets = this.messages.reduce((n, m) => n + m.length, 0);
    return `${this.messages.length} ${octets}`;
  }

  async RETR(msgNumber: number): Promise<string> {
    this.retrieved.push(msgNumber);
    const m = this.messages[msgNumber - 1];
    if (m == null) throw new Error(`-ERR no such message ${msgNumber}`);
    return m;
  }

  async QUIT(): Promise<unknown> {
    this.quitCalls++;
    return "+OK";
  }
}

export class FakeTransport implements MailTransportLike {
  sent: SendMailOptions[] = [];
  verifyCalls = 0;
  closed = 0;
  failVerify: Error | null = null;

  async verify(): Promise<unknown> {
    this.verifyCalls++;
    if (this.failVerify) throw this.failVerify;
    return true;
  }

  async sendMail(options: SendMailOptions): Promise<SentInfoLike> {
    this.sent.push(options);
    const to = options.envelope && "to" in options.envelope ? options.envelope.to : [];
    return { messageId: `<fake-${this.sent.length}@example.com>`, accepted: Array.isArray(to) ? to : [to], rejected: [] };
  }

  close(): void {
    this.closed++;
  }
}

// ---------------------------------------------------------------------------
// Messages and directories
// ---------------------------------------------------------------------------

export function attachmentRef(filename: string, content: Buffer | string, contentType = "application/octet-stream"): AttachmentRef {
  const data = typeof content === "string" ? Buffer.from(content, "utf8") : content;
  return {
    filename,
    originalFilename: filename,
    contentType,
    size: data.length,
    payload: { bytes: async () => data },
  };
}

export function mailMessage(id: string, fields: Partial<Omit<MailMessage, "id">> = {}): MailMessage {
  return {
    id,
    sender: fields.sender ?? "sender@example.com",
    recipients: fields.recipients ?? ["recipient@example.com"],
    cc: fields.cc ?? [],
    bcc: fields.bcc ?? [],
    subject: fields.subject ?? `Message ${id}`,
    body: fields.body ?? "",
    date: fields.date ?? "2024-05-01T18:00:00+08:00",
    timestamp: fields.timestamp ?? Date.UTC(2024, 4, 1, 10),
    attachments: fields.attachments ?? [],
  };
}

export function makeTempDir(prefix = "mailvault-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Walk nested plain objects by key; undefined when a step is missing. */
export function pick(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    current = typeof current === "object" && current !== null ? Reflect.get(current, key) : undefined;
  }
  return current;
}
