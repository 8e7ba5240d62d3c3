/**
 * Local attachment store. Layout:
 *
 *   {base}/{account-folder}/{message-id}/<files>
 *   {base}/{account-folder}/{message-id}/attachments.json
 *   {base}/{account-folder}/{message-id}/extraction_log.json
 *
 * Downloads are idempotent: identical bytes under an existing name are not
 * written again, different bytes get the next free `name_n.ext`. Two
 * overlapping downloads for the same message id are not coordinated.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ArchiveManager, readExtractionLog, type ExtractionLog, type ExtractionSession } from "./archive.js";
import { accountFolderName } from "./config.js";
import { ValidationFailure, errorMessage, isMissingFile } from "./errors.js";
import { markdownNormalizer, selectBodyText, type TextNormalizer } from "./html.js";
import { createLogger, maskAddress } from "./log.js";
import type { AttachmentRef } from "./message.js";
import { ATTACHMENT_INDEX_FILE, SIDECAR_FILES, isInside, numberedName, sanitizeFilename } from "./paths.js";
import { formatWithOffset } from "./time.js";

const log = createLogger("attachments");


const storedAttachmentSchema = z.object({
  filename: z.string(),
  originalFilename: z.string(),
  safeFilename: z.string(),
  contentType: z.string(),
  size: z.number(),
  localPath: z.string().nullable(),
  status: z.enum(["success", "skipped_existing", "failed"]),
  downloadTime: z.string(),
  error: z.string().optional(),
});

const attachmentIndexSchema = z.object({
  account: z.string(),
  messageId: z.string(),
  downloadTime: z.string(),
  totalAttachments: z.number(),
  successfulDownloads: z.number(),
  attachments: z.array(storedAttachmentSchema),
});

export type DownloadStatus = z.infer<typeof storedAttachmentSchema>["status"];
export type StoredAttachment = z.infer<typeof storedAttachmentSchema>;
export type AttachmentIndex = z.infer<typeof attachmentIndexSchema>;

export interface DownloadResult {
  directory: string;
  attachments: StoredAttachment[];
  /** Set when the message directory or its index could not be written. */
  error?: string;
  /** Present when auto-extraction ran. */
  extraction?: ExtractionSession;
  extractionError?: string;
}

export interface ReadAttachmentResult {
  path: string;
  data: Buffer;
}

export type ParsingStatus = "success" | "failed" | "not_applicable";

export interface AttachmentContent {
  extension: string;
  contentType: "parsed" | "raw";
  encoding: "utf8" | "base64";
  content: string;
  parsingStatus: ParsingStatus;
  error?: string;
}

const TEXT_EXTENSIONS: ReadonlySet<string> = new Set([".txt", ".md", ".csv"]);
const MARKUP_EXTENSIONS: ReadonlySet<string> = new Set([".html", ".htm"]);

/**
 * Text and markup attachments come back as text (markup through the
 * normalizer); everything else, and anything that is not valid UTF-8, as base64.
 */
export function renderAttachmentContent(
  filePath: string,
  data: Buffer,
  options: { parse: boolean; normalizer?: TextNormalizer }
): AttachmentContent {
  const extension = path.extname(filePath).toLowerCase();
  const raw = (parsingStatus: ParsingStatus, error?: string): AttachmentContent => ({
    extension,
    contentType: "raw",
    encoding: "base64",
    content: data.toString("base64"),
    parsingStatus,
    ...(error ? { error } : {}),
  });

  const isMarkup = MARKUP_EXTENSIONS.has(extension);
  if (!options.parse || !(isMarkup || TEXT_EXTENSIONS.has(extension))) return raw("not_applicable");

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(data);
  } catch (err) {
    log.warn(`Cannot read ${filePath} as UTF-8 text`, errorMessage(err));
    return raw("failed", errorMessage(err));
  }
  return {
    extension,
    contentType: "parsed",
    encoding: "utf8",
    content: isMarkup ? selectBodyText("", text, options.normalizer ?? markdownNormalizer) : text,
    parsingStatus: "success",
  };
}

export interface AttachmentListing {
  directory: string;
  exists: boolean;
  /** Paths relative to the message directory, sidecars excluded. */
  files: Array<{ path: string; size: number }>;
  directories: string[];
  structure: "flat" | "hierarchical";
  extractionLog: ExtractionLog | null;
}

export interface StorageStats {
  basePath: string;
  totalSizeBytes: number;
  totalSizeMb: number;
  fileCount: number;
  accountCount: number;
  messageCount: number;
}

export interface AttachmentManagerOptions {
  baseDir: string;
  offsetMinutes: number;
  autoExtract: boolean;
  archives: ArchiveManager;
  now?: () => Date;
}

async function statOrNull(p: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(p);
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

async function subdirectories(dir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
    if (isMissingFile(err)) return [];
    throw err;
  });
  return entries.filter((e) => e.isDirectory()).map((e) => path.join(dir, e.name));
}

export class AttachmentManager {
  readonly baseDir: string;
  private readonly now: () => Date;

  constructor(private readonly options: AttachmentManagerOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.now = options.now ?? (() => new Date());
  }

  private timestamp(): string {
    return formatWithOffset(this.now(), this.options.offsetMinutes);
  }

  messageDir(account: string, messageId: string): string {
    if (!messageId.trim()) throw new ValidationFailure("message_id is required");
    return path.join(this.baseDir, accountFolderName(account), sanitizeFilename(messageId));
  }

  /**
   * Store one attachment. Walks `name`, `name_1`, ... : an existing file with
   * the same bytes ends the walk as skipped_existing, the first free name is
   * written.
   */
  private async storeOne(dir: string, ref: AttachmentRef): Promise<StoredAttachment> {
    const safeFilename = sanitizeFilename(ref.filename);
    const base = {
      filename: ref.filename,
      originalFilename: ref.originalFilename,
      safeFilename,
      contentType: ref.contentType,
    };
    try {
      const data = await ref.payload.bytes();
      for (let n = 0; ; n++) {
        const name = n === 0 ? safeFilename : numberedName(safeFilename, n);
        if (SIDECAR_FILES.has(name)) continue;
        const target = path.join(dir, name);
        const existing = await statOrNull(target);
        if (!existing) {
          await fs.promises.writeFile(target, data);
          log.debug(`Saved ${ref.filename} -> ${target}`);
          return { ...base, size: data.length, localPath: target, status: "success", downloadTime: this.timestamp() };
        }
        if (existing.isFile() && existing.size === data.length && data.equals(await fs.promises.readFile(target))) {
          log.debug(`Already stored: ${ref.filename} -> ${target}`);
          return { ...base, size: data.length, localPath: target, status: "skipped_existing", downloadTime: this.timestamp() };
        }
      }
    } catch (err) {
      log.error(`Failed to store attachment ${ref.filename}`, errorMessage(err));
      return {
        ...base,
        size: ref.size,
        localPath: null,
        status: "failed",
        downloadTime: this.timestamp(),
        error: errorMessage(err),
      };
    }
  }

  async download(account: string, messageId: string, refs: readonly AttachmentRef[]): Promise<DownloadResult> {
    const dir = this.messageDir(account, messageId);
    await fs.promises.mkdir(dir, { recursive: true });

    const attachments: StoredAttachment[] = [];
    for (const ref of refs) {
      attachments.push(await this.storeOne(dir, ref));
    }

    const index: AttachmentIndex = {
      account,
      messageId,
      downloadTime: this.timestamp(),
      totalAttachments: attachments.length,
      successfulDownloads: attachments.filter((a) => a.status === "success").length,
      attachments,
    };
    await fs.promises.writeFile(path.join(dir, ATTACHMENT_INDEX_FILE), JSON.stringify(index, null, 2) + "\n", "utf8");
    log.info(
      `Stored ${index.successfulDownloads} new of ${attachments.length} attachment(s) for ${maskAddress(account)} message ${messageId}`
    );

    const result: DownloadResult = { directory: dir, attachments };
    if (this.options.autoExtract && index.successfulDownloads > 0) {
      try {
        result.extraction = await this.options.archives.processMessageDirectory(dir);
      } catch (err) {
        log.error(`Archive extraction failed for message ${messageId}`, errorMessage(err));
        result.extractionError = errorMessage(err);
      }
    }
    return result;
  }

  /** Download result for a message whose directory or index could not be written. */
  failedDownload(account: string, messageId: string, refs: readonly AttachmentRef[], err: unknown): DownloadResult {
    const error = errorMessage(err);
    const downloadTime = this.timestamp();
    return {
      directory: this.messageDir(account, messageId),
      error,
      attachments: refs.map((ref) => ({
        filename: ref.filename,
        originalFilename: ref.originalFilename,
        safeFilename: sanitizeFilename(ref.filename),
        contentType: ref.contentType,
        size: ref.size,
        localPath: null,
        status: "failed",
        downloadTime,
        error,
      })),
    };
  }

  async getAttachmentInfo(account: string, messageId: string): Promise<AttachmentIndex | null> {
    const file = path.join(this.messageDir(account, messageId), ATTACHMENT_INDEX_FILE);
    let text: string;
    try {
      text = await fs.promises.readFile(file, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    try {
      return attachmentIndexSchema.parse(JSON.parse(text));
    } catch (err) {
      log.error(`Unreadable ${file}`, errorMessage(err));
      return null;
    }
  }

  private async readableFile(dir: string, candidate: string): Promise<string | null> {
    if (!isInside(dir, candidate) || path.resolve(candidate) === path.resolve(dir)) return null;
    const stat = await statOrNull(candidate);
    return stat?.isFile() ? candidate : null;
  }

  private async locate(account: string, messageId: string, filename: string): Promise<string | null> {
    const dir = this.messageDir(account, messageId);
    if (!(await statOrNull(dir))?.isDirectory()) return null;

    const exact = await this.readableFile(dir, path.join(dir, filename));
    if (exact) return exact;

    const sanitized = await this.readableFile(dir, path.join(dir, sanitizeFilename(filename)));
    if (sanitized) return sanitized;

    const index = await this.getAttachmentInfo(account, messageId);
    for (const a of index?.attachments ?? []) {
      if (!a.localPath) continue;
      if (filename === a.filename || filename === a.originalFilename || filename === a.safeFilename) {
        const found = await this.readableFile(dir, a.localPath);
        if (found) return found;
      }
    }

    const prefix = filename.split(".")[0] ?? "";
    if (!prefix) return null;
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    const names = entries
      .filter((e) => e.isFile() && !SIDECAR_FILES.has(e.name) && e.name.startsWith(prefix))
      .map((e) => e.name)
      .sort();
    for (const name of names) {
      const found = await this.readableFile(dir, path.join(dir, name));
      if (found) return found;
    }
    return null;
  }

  /**
   * Resolve a stored attachment by exact name, sanitized name, recorded
   * names, then name prefix. Null when nothing matches.
   */
  async read(account: string, messageId: string, filename: string): Promise<ReadAttachmentResult | null> {
    const found = await this.locate(account, messageId, filename);
    if (!found) {
      log.warn(`Attachment ${filename} not found for message ${messageId}`);
      return null;
    }
    return { path: found, data: await fs.promises.readFile(found) };
  }

  async list(account: string, messageId: string): Promise<AttachmentListing> {
    const dir = this.messageDir(account, messageId);
    const listing: AttachmentListing = {
      directory: dir,
      exists: false,
      files: [],
      directories: [],
      structure: "flat",
      extractionLog: null,
    };
    if (!(await statOrNull(dir))?.isDirectory()) return listing;
    listing.exists = true;

    const walk = async (current: string): Promise<void> => {
      const entries = await fs.promises.readdir(current, { withFileTypes: true });
      entries.sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        const full = path.join(current, entry.name);
        const rel = path.relative(dir, full);
        if (entry.isDirectory()) {
          listing.directories.push(rel);
          await walk(full);
        } else if (entry.isFile() && !(current === dir && SIDECAR_FILES.has(entry.name))) {
          listing.files.push({ path: rel, size: (await fs.promises.stat(full)).size });
        }
      }
    };
    await walk(dir);

    listing.structure = listing.directories.length > 0 ? "hierarchical" : "flat";
    listing.extractionLog = await readExtractionLog(dir);
    return listing;
  }

  /** Remove message directories last modified more than `days` days ago. */
  async cleanup(days: number): Promise<number> {
    if (!Number.isFinite(days) || days < 0) throw new ValidationFailure(`Invalid days value: ${days}`);
    const cutoff = this.now().getTime() - days * 24 * 60 * 60 * 1000;
    let removed = 0;
    for (const accountDir of await subdirectories(this.baseDir)) {
      for (const messageDir of await subdirectories(accountDir)) {
        try {
          const stat = await fs.promises.stat(messageDir);
          if (stat.mtimeMs >= cutoff) continue;
          await fs.promises.rm(messageDir, { recursive: true, force: true });
          removed++;
          log.info(`Removed old attachments in ${messageDir}`);
        } catch (err) {
          log.error(`Failed to clean up ${messageDir}`, errorMessage(err));
        }
      }
    }
    return removed;
  }

  async getStorageStats(): Promise<StorageStats> {
    const stats: StorageStats = {
      basePath: this.baseDir,
      totalSizeBytes: 0,
      totalSizeMb: 0,
      fileCount: 0,
      accountCount: 0,
      messageCount: 0,
    };
    const walk = async (current: string): Promise<void> => {
      for (const entry of await fs.promises.readdir(current, { withFileTypes: true })) {
        const full = path.join(current, entry.name);
        if (entry.isDirectory()) await walk(full);
        else if (entry.isFile()) {
          stats.fileCount++;
          stats.totalSizeBytes += (await fs.promises.stat(full)).size;
        }
      }
    };
    const accounts = await subdirectories(this.baseDir);
    stats.accountCount = accounts.length;
    for (const accountDir of accounts) {
      stats.messageCount += (await subdirectories(accountDir)).length;
      await walk(accountDir);
    }
    stats.totalSizeMb = Math.round((stats.totalSizeBytes / (1024 * 1024)) * 100) / 100;
    return stats;
  }
}
