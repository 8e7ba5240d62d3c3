/**
 * Outgoing mail over SMTP with nodemailer. Used directly by the send-only
 * store and composed into the retrieval stores for their send capability.
 */

import fs from "node:fs";
import path from "node:path";
import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";
import type { AccountConfig } from "./config.js";
import { ConnectionFailure, ValidationFailure, describeError, errorMessage } from "./errors.js";
import { createLogger, maskAddress } from "./log.js";

const log = createLogger("smtp");

/** Attachments above this size abort the send before anything is written to the wire. */
export const MAX_SEND_ATTACHMENT_BYTES = 25 * 1024 * 1024;

export interface OutgoingMessage {
  to: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  body: string;
  htmlBody?: string;
  /** Local file paths. */
  attachments?: string[];
}

export interface SendReceipt {
  messageId: string;
  /** Union of to/cc/bcc handed to the transport. */
  recipients: string[];
  accepted: string[];
  rejected: string[];
  attachmentCount: number;
}

export interface SentInfoLike {
  messageId?: string;
  accepted?: unknown[];
  rejected?: unknown[];
}

export type MailTransportLike = {
  verify(): Promise<unknown>;
  sendMail(options: SendMailOptions): Promise<SentInfoLike>;
  close(): void;
};

export type TransportFactory = (account: AccountConfig) => MailTransportLike;

function defaultTransportFactory(account: AccountConfig): MailTransportLike {
  const transporter = nodemailer.createTransport({
    host: account.smtp.host,
    port: account.smtp.port,
    secure: !account.smtp.startTls,
    requireTLS: account.smtp.startTls,
    auth: {
      user: account.address,
      pass: account.password,
    },
    tls: { rejectUnauthorized: account.tlsRejectUnauthorized },
  });
  return {
    verify: () => transporter.verify(),
    sendMail: (options) => transporter.sendMail(options),
    close: () => transporter.close(),
  };
}

function addressText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value && typeof value === "object" && "address" in value) return String(value.address);
  return String(value);
}

interface ValidatedAttachment {
  filename: string;
  path: string;
  size: number;
}

/** Every attachment must exist, be a regular file and fit under the size ceiling. */
export async function validateAttachments(paths: readonly string[]): Promise<ValidatedAttachment[]> {
  const validated: ValidatedAttachment[] = [];
  for (const p of paths) {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(p);
    } catch (err) {
      throw new ValidationFailure(`Attachment not readable: ${p} (${errorMessage(err)})`, { cause: err });
    }
    if (!stat.isFile()) {
      throw new ValidationFailure(`Attachment is not a regular file: ${p}`);
    }
    if (stat.size > MAX_SEND_ATTACHMENT_BYTES) {
      throw new ValidationFailure(
        `Attachment too large: ${p} (${stat.size} bytes, limit ${MAX_SEND_ATTACHMENT_BYTES})`
      );
    }
    validated.push({ filename: path.basename(p), path: p, size: stat.size });
  }
  return validated;
}

export function envelopeRecipients(message: OutgoingMessage): string[] {
  const all = [...message.to, ...(message.cc ?? []), ...(message.bcc ?? [])]
    .map((a) => a.trim())
    .filter(Boolean);
  return Array.from(new Set(all));
}

export class SmtpSender {
  private transport: MailTransportLike | null = null;
  private readonly factory: TransportFactory;

  constructor(
    private readonly account: AccountConfig,
    factory?: TransportFactory
  ) {
    this.factory = factory ?? defaultTransportFactory;
  }

  get connected(): boolean {
    return this.transport !== null;
  }

  async connect(): Promise<void> {
    if (this.transport) return;
    const transport = this.factory(this.account);
    try {
      await transport.verify();
    } catch (err) {
      transport.close();
      throw new ConnectionFailure(
        `SMTP connection to ${this.account.smtp.host}:${this.account.smtp.port} failed: ${describeError(err)}`,
        { cause: err }
      );
    }
    this.transport = transport;
  }

  async disconnect(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    if (!transport) return;
    try {
      transport.close();
    } catch (err) {
      log.debug("SMTP close failed", errorMessage(err));
    }
  }

  async send(message: OutgoingMessage): Promise<SendReceipt> {
    const recipients = envelopeRecipients(message);
    if (message.to.length === 0 || recipients.length === 0) {
      throw new ValidationFailure("At least one recipient is required");
    }
    const attachments = await validateAttachments(message.attachments ?? []);

    await this.connect();
    const transport = this.transport;
    if (!transport) throw new ConnectionFailure("SMTP transport not available");

    const options: SendMailOptions = {
      from: this.account.displayName
        ? { name: this.account.displayName, address: this.account.address }
        : this.account.address,
      to: message.to,
      subject: message.subject,
      text: message.body,
      envelope: { from: this.account.address, to: recipients },
    };
    if (message.cc?.length) options.cc = message.cc;
    if (message.bcc?.length) options.bcc = message.bcc;
    if (message.htmlBody) options.html = message.htmlBody;
    if (attachments.length) {
      options.attachments = attachments.map((a) => ({ filename: a.filename, path: a.path }));
    }

    log.info(`Sending from ${maskAddress(this.account.address)} to ${recipients.length} recipient(s)`);
    let info: SentInfoLike;
    try {
      info = await transport.sendMail(options);
    } catch (err) {
      throw new ConnectionFailure(`SMTP send failed: ${describeError(err)}`, { cause: err });
    }

    return {
      messageId: info.messageId ?? "",
      recipients,
      accepted: (info.accepted ?? []).map(addressText),
      rejected: (info.rejected ?? []).map(addressText),
      attachmentCount: attachments.length,
    };
  }
}
