/**
 * Message model and decoder. Turns one raw RFC 822 source into an immutable
 * MailMessage; no network I/O happens here.
 */

import { simpleParser } from "mailparser";
import type { AddressObject, Attachment, EmailAddress, ParsedMail } from "mailparser";
import { DecodeFailure, errorMessage } from "./errors.js";
import { markdownNormalizer, selectBodyText, type TextNormalizer } from "./html.js";
import { formatWithOffset } from "./time.js";

/** Serializable attachment description. Safe to persist or return to callers. */
export interface AttachmentMetadata {
  /** Decoded logical filename. */
  filename: string;
  /** Filename as it appeared on the wire, before header decoding. */
  originalFilename: string;
  contentType: string;
  size: number;
}

/**
 * Session-bound access to attachment bytes. Lives only as long as the
 * retrieval session that produced it.
 */
export interface PayloadHandle {
  bytes(): Promise<Buffer>;
}

/** Live attachment reference: metadata plus an in-memory payload handle. */
export interface AttachmentRef extends Readonly<AttachmentMetadata> {
  readonly payload: PayloadHandle;
}

export interface MailMessage {
  /** Protocol-assigned id: folder UID (IMAP) or sequence number (POP3). */
  readonly id: string;
  readonly sender: string;
  readonly recipients: readonly string[];
  readonly cc: readonly string[];
  readonly bcc: readonly string[];
  readonly subject: string;
  readonly body: string;
  /** ISO 8601 at the configured fixed offset. */
  readonly date: string;
  /** Epoch milliseconds of `date`. */
  readonly timestamp: number;
  readonly attachments: readonly AttachmentRef[];
}

/** What crosses a serialization boundary: no payload handles. */
export interface MessageRecord {
  id: string;
  sender: string;
  recipients: string[];
  cc: string[];
  bcc: string[];
  subject: string;
  body: string;
  date: string;
  attachments: AttachmentMetadata[];
}

export interface DecodeOptions {
  offsetMinutes: number;
  normalizer?: TextNormalizer;
  /** Fallback clock for messages without a usable Date header. */
  now?: () => Date;
}

export function toAttachmentMetadata(ref: AttachmentMetadata): AttachmentMetadata {
  return {
    filename: ref.filename,
    originalFilename: ref.originalFilename,
    contentType: ref.contentType,
    size: ref.size,
  };
}

export function toMessageRecord(message: MailMessage): MessageRecord {
  return {
    id: message.id,
    sender: message.sender,
    recipients: [...message.recipients],
    cc: [...message.cc],
    bcc: [...message.bcc],
    subject: message.subject,
    body: message.body,
    date: message.date,
    attachments: message.attachments.map(toAttachmentMetadata),
  };
}

function formatAddress(a: EmailAddress): string[] {
  if (a.group?.length) return a.group.flatMap(formatAddress);
  const address = a.address?.trim() ?? "";
  const name = a.name?.trim() ?? "";
  if (name && address) return [`${name} <${address}>`];
  return address ? [address] : name ? [name] : [];
}

/** Flatten one or more decoded address headers into an ordered list. */
export function flattenAddresses(value: AddressObject | AddressObject[] | undefined): string[] {
  if (!value) return [];
  const objects = Array.isArray(value) ? value : [value];
  return objects.flatMap((o) => o.value.flatMap(formatAddress));
}

const FILENAME_PARAM = /(?:^|;)\s*(?:file)?name\*?(?:\*0\*?)?\s*=\s*("([^"]*)"|[^;\s]+)/i;

function structuredParam(value: unknown, name: string): string | undefined {
  if (typeof value !== "object" || value === null || !("params" in value)) return undefined;
  const params = value.params;
  if (typeof params !== "object" || params === null || !(name in params)) return undefined;
  const v: unknown = Reflect.get(params, name);
  return typeof v === "string" && v.trim() ? v.trim() : undefined;
}

/** Raw filename parameter from the part headers, still transport-encoded. */
function encodedFilename(attachment: Attachment): string | undefined {
  const fromHeaders =
    structuredParam(attachment.headers?.get("content-disposition"), "filename") ??
    structuredParam(attachment.headers?.get("content-type"), "name");
  if (fromHeaders) return fromHeaders;
  const lines = attachment.headerLines ?? [];
  const ordered = [
    ...lines.filter((l) => l.key === "content-disposition"),
    ...lines.filter((l) => l.key === "content-type"),
  ];
  for (const { line } of ordered) {
    const unfolded = line.replace(/\r?\n[ \t]+/g, " ");
    const params = unfolded.slice(unfolded.indexOf(":") + 1);
    const m = FILENAME_PARAM.exec(params);
    if (m) return (m[2] ?? m[1]).trim();
  }
  return undefined;
}

function isAttachmentPart(attachment: Attachment): boolean {
  return String(attachment.contentDisposition ?? "").toLowerCase() === "attachment";
}

function toAttachmentRef(attachment: Attachment, index: number): AttachmentRef {
  const filename = attachment.filename?.trim() || `attachment_${index}`;
  const content = attachment.content;
  return {
    filename,
    originalFilename: encodedFilename(attachment) ?? filename,
    contentType: attachment.contentType || "application/octet-stream",
    size: attachment.size ?? content.length,
    payload: { bytes: async () => content },
  };
}

function messageTime(parsed: ParsedMail, now: () => Date): Date {
  const d = parsed.date;
  return d && !Number.isNaN(d.getTime()) ? d : now();
}

/**
 * Decode one raw message. Throws DecodeFailure when the source cannot be
 * parsed; batch callers catch it per message.
 */
export async function decodeMessage(
  id: string,
  source: Buffer | string,
  options: DecodeOptions
): Promise<MailMessage> {
  let parsed: ParsedMail;
  try {
    parsed = await simpleParser(source);
  } catch (err) {
    throw new DecodeFailure(id, `Failed to decode message ${id}: ${errorMessage(err)}`, { cause: err });
  }

  const time = messageTime(parsed, options.now ?? (() => new Date()));
  const html = typeof parsed.html === "string" ? parsed.html : undefined;
  const attachments = parsed.attachments.filter(isAttachmentPart).map(toAttachmentRef);

  return {
    id,
    sender: flattenAddresses(parsed.from).join(", "),
    recipients: flattenAddresses(parsed.to),
    cc: flattenAddresses(parsed.cc),
    bcc: flattenAddresses(parsed.bcc),
    subject: (parsed.subject ?? "").trim(),
    body: selectBodyText(parsed.text ?? "", html, options.normalizer ?? markdownNormalizer),
    date: formatWithOffset(time, options.offsetMinutes),
    timestamp: time.getTime(),
    attachments,
  };
}

export interface DecodedBatch {
  messages: MailMessage[];
  failures: Array<{ id: string; error: string }>;
}
