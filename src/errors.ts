/**
 * Error taxonomy. Item-local failures (one message, attachment or archive)
 * are captured into result records; the rest end the operation.
 */

export type ErrorKind =
  | "ConnectionFailure"
  | "ValidationFailure"
  | "DecodeFailure"
  | "AttachmentFailure"
  | "ArchiveFailure";

export class MailVaultError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/** Auth or network failure at the store or send transport. */
export class ConnectionFailure extends MailVaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ConnectionFailure", message, options);
  }
}

/** Bad request parameters or missing account configuration, raised before any I/O. */
export class ValidationFailure extends MailVaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ValidationFailure", message, options);
  }
}

export class DecodeFailure extends MailVaultError {
  readonly messageId: string;

  constructor(messageId: string, message: string, options?: { cause?: unknown }) {
    super("DecodeFailure", message, options);
    this.messageId = messageId;
  }
}

export class AttachmentFailure extends MailVaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AttachmentFailure", message, options);
  }
}

export class ArchiveFailure extends MailVaultError {
  readonly archive: string;

  constructor(archive: string, message: string, options?: { cause?: unknown }) {
    super("ArchiveFailure", message, options);
    this.archive = archive;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Transport errors that mean the session is gone (server BYE, socket closed). */
export function isConnectionError(err: unknown): boolean {
  if (err instanceof ConnectionFailure) return true;
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  const code = "code" in err ? String(err.code) : "";
  return (
    msg.includes("connection not available") ||
    msg.includes("connection closed") ||
    code === "NoConnection" ||
    code === "EConnectionClosed" ||
    code === "ECONNREFUSED" ||
    code === "ECONNRESET" ||
    code === "ETIMEDOUT" ||
    code === "ENOTFOUND" ||
    code === "EAUTH"
  );
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Error text surfaced to callers. Keeps server response details the way
 * imapflow and nodemailer attach them.
 */
export function describeError(err: unknown): string {
  const e = err instanceof Error ? err : new Error(String(err));
  const parts = [e.message];
  if ("responseText" in e && e.responseText) parts.push(String(e.responseText));
  if ("responseStatus" in e && e.responseStatus) parts.push(`(${String(e.responseStatus)})`);
  if ("code" in e && e.code) parts.push(`code: ${String(e.code)}`);
  return parts.join(" ");
}
