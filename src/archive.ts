/**
 * Archive detection and extraction inside a message directory.
 *
 * Archives are unpacked beside themselves in rounds until a round finds
 * nothing new. Every archive is marked processed (by full path) before it is
 * opened, so an archive that contains itself is extracted once per session.
 * Archives listed in earlier sessions of the directory's extraction log count
 * as processed too.
 */

import fs from "node:fs";
import path from "node:path";
import zlib from "node:zlib";
import AdmZip from "adm-zip";
import tar from "tar-stream";
import { z } from "zod";
import { ArchiveFailure, ValidationFailure, errorMessage, isMissingFile } from "./errors.js";
import { loadModule } from "./lazy.js";
import { createLogger } from "./log.js";
import {
  EXTRACTION_LOG_FILE,
  SIDECAR_FILES,
  isInside,
  sanitizeMemberPath,
  splitExtension,
  uniqueName,
} from "./paths.js";
import { formatWithOffset } from "./time.js";

const log = createLogger("archive");

export { EXTRACTION_LOG_FILE };
export const DEFAULT_MAX_DEPTH = 10;

export type ArchiveFormat = "zip" | "tar" | "tar.gz" | "tar.bz2" | "tar.xz" | "gz" | "bz2" | "xz" | "rar" | "7z";

const COMPOUND_EXTENSIONS: Array<[string, ArchiveFormat]> = [
  [".tar.gz", "tar.gz"],
  [".tar.bz2", "tar.bz2"],
  [".tar.xz", "tar.xz"],
];

const SINGLE_EXTENSIONS: Record<string, ArchiveFormat> = {
  ".zip": "zip",
  ".rar": "rar",
  ".7z": "7z",
  ".tar": "tar",
  ".tgz": "tar.gz",
  ".tbz2": "tar.bz2",
  ".txz": "tar.xz",
  ".gz": "gz",
  ".bz2": "bz2",
  ".xz": "xz",
};

/** Formats recognised but never opened: there is no in-process decoder for them. */
const UNDECODABLE: ReadonlySet<ArchiveFormat> = new Set<ArchiveFormat>(["rar", "7z", "xz", "tar.xz"]);

export function detectArchiveFormat(filePath: string): ArchiveFormat | undefined {
  const lower = filePath.toLowerCase();
  for (const [ext, format] of COMPOUND_EXTENSIONS) {
    if (lower.endsWith(ext)) return format;
  }
  return SINGLE_EXTENSIONS[path.extname(lower)];
}

export function isArchive(filePath: string): boolean {
  return detectArchiveFormat(filePath) !== undefined;
}

// ---------------------------------------------------------------------------
// Extraction log (persisted beside the files)
// ---------------------------------------------------------------------------

const archiveExtractionSchema = z.object({
  archive: z.string(),
  format: z.string(),
  extractedTo: z.string(),
  files: z.array(z.string()),
});

const skippedArchiveSchema = z.object({
  archive: z.string(),
  format: z.string(),
  reason: z.string(),
});

const archiveErrorSchema = z.object({
  archive: z.string(),
  error: z.string(),
});

const extractionRoundSchema = z.object({
  round: z.number(),
  archivesFound: z.number(),
  extracted: z.array(archiveExtractionSchema),
  skipped: z.array(skippedArchiveSchema),
  errors: z.array(archiveErrorSchema),
});

const extractionResultSchema = z.object({
  totalExtracted: z.number(),
  rounds: z.array(extractionRoundSchema),
  warnings: z.array(z.string()),
  depthExceeded: z.boolean(),
});

const extractionSessionSchema = z.object({
  messageId: z.string(),
  extractionTime: z.string(),
  maxDepth: z.number(),
  result: extractionResultSchema,
});

const extractionLogSchema = z.object({
  sessions: z.array(extractionSessionSchema),
});

export type ArchiveExtraction = z.infer<typeof archiveExtractionSchema>;
export type SkippedArchive = z.infer<typeof skippedArchiveSchema>;
export type ArchiveError = z.infer<typeof archiveErrorSchema>;
export type ExtractionRound = z.infer<typeof extractionRoundSchema>;
export type ExtractionResult = z.infer<typeof extractionResultSchema>;
export type ExtractionSession = z.infer<typeof extractionSessionSchema>;
export type ExtractionLog = z.infer<typeof extractionLogSchema>;

/** Parsed extraction log of a message directory, or null when absent or unreadable. */
export async function readExtractionLog(dir: string): Promise<ExtractionLog | null> {
  const file = path.join(dir, EXTRACTION_LOG_FILE);
  let text: string;
  try {
    text = await fs.promises.readFile(file, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
  try {
    return extractionLogSchema.parse(JSON.parse(text));
  } catch (err) {
    log.warn(`Ignoring unreadable ${file}`, errorMessage(err));
    return null;
  }
}

function archivesIn(session: ExtractionSession): string[] {
  return session.result.rounds.flatMap((r) => [
    ...r.extracted.map((e) => e.archive),
    ...r.skipped.map((s) => s.archive),
    ...r.errors.map((e) => e.archive),
  ]);
}

// ---------------------------------------------------------------------------
// Decoders
// ---------------------------------------------------------------------------

interface ArchiveMember {
  name: string;
  data: Buffer;
}

function readZip(buffer: Buffer): ArchiveMember[] {
  const zip = new AdmZip(buffer);
  return zip
    .getEntries()
    .filter((entry) => !entry.isDirectory)
    .map((entry) => ({ name: entry.entryName, data: entry.getData() }));
}

function readTar(buffer: Buffer): Promise<ArchiveMember[]> {
  return new Promise((resolve, reject) => {
    const members: ArchiveMember[] = [];
    const extract = tar.extract();
    extract.on("entry", (header, stream, next) => {
      const chunks: Buffer[] = [];
      stream.on("data", (chunk: Buffer) => chunks.push(chunk));
      stream.on("error", reject);
      stream.on("end", () => {
        if (header.type === "file" || header.type === "contiguous-file") {
          members.push({ name: header.name, data: Buffer.concat(chunks) });
        }
        next();
      });
    });
    extract.on("finish", () => resolve(members));
    extract.on("error", reject);
    extract.end(buffer);
  });
}

type Bzip2Decoder = { decode(input: Buffer): Buffer };

function isBzip2Module(mod: unknown): mod is { default: Bzip2Decoder } {
  if (typeof mod !== "object" || mod === null || !("default" in mod)) return false;
  const d = mod.default;
  return (typeof d === "function" || (typeof d === "object" && d !== null)) && "decode" in d && typeof d.decode === "function";
}

let bzip2: Promise<Bzip2Decoder | null> | undefined;

/** seek-bzip, loaded on first use. Null when it cannot be loaded. */
function loadBzip2(): Promise<Bzip2Decoder | null> {
  bzip2 ??= loadModule("seek-bzip").then(
    (mod) => (isBzip2Module(mod) ? mod.default : null),
    (err: unknown) => {
      log.warn("bzip2 decoder not available", errorMessage(err));
      return null;
    }
  );
  return bzip2;
}

export type ExtractOutcome =
  | { status: "extracted"; format: ArchiveFormat; files: string[] }
  | { status: "skipped"; format: ArchiveFormat; reason: string };

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

export interface ArchiveManagerOptions {
  maxDepth?: number;
  offsetMinutes: number;
  now?: () => Date;
}

export class ArchiveManager {
  private readonly maxDepth: number;
  private readonly now: () => Date;

  constructor(private readonly options: ArchiveManagerOptions) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Write one member below `extractTo`, keeping its (sanitized) subdirectories.
   * Sidecar names are taken at `root`, so a member cannot replace them.
   */
  private async writeMember(extractTo: string, member: ArchiveMember, root: string): Promise<string | undefined> {
    const rel = sanitizeMemberPath(member.name);
    if (!rel) return undefined;
    const dir = path.join(extractTo, path.dirname(rel));
    if (!isInside(extractTo, dir)) return undefined;
    await fs.promises.mkdir(dir, { recursive: true });
    const reserved = path.resolve(dir) === path.resolve(root) ? SIDECAR_FILES : undefined;
    const target = path.join(dir, uniqueName(dir, path.basename(rel), reserved));
    await fs.promises.writeFile(target, member.data);
    log.debug(`Extracted ${member.name} -> ${target}`);
    return target;
  }

  private async writeMembers(extractTo: string, members: ArchiveMember[], root: string): Promise<string[]> {
    const files: string[] = [];
    for (const member of members) {
      const written = await this.writeMember(extractTo, member, root);
      if (written) files.push(written);
    }
    return files;
  }

  /** Single-stream output is named after the archive without its last extension. */
  private async writeStream(archivePath: string, extractTo: string, data: Buffer, root: string): Promise<string[]> {
    const stem = splitExtension(path.basename(archivePath)).stem;
    const written = await this.writeMember(extractTo, { name: stem || "extracted_file", data }, root);
    return written ? [written] : [];
  }

  private async decodeBzip2(buffer: Buffer): Promise<Buffer | null> {
    const decoder = await loadBzip2();
    return decoder ? decoder.decode(buffer) : null;
  }

  /**
   * Extract one archive into `extractTo`. Returns the files written, or a
   * skip record for formats that cannot be decoded here. Corrupt archives
   * throw ArchiveFailure. `root` is the message directory holding the sidecar
   * files; it defaults to `extractTo`.
   */
  async extractArchive(archivePath: string, extractTo: string, root: string = extractTo): Promise<ExtractOutcome> {
    const format = detectArchiveFormat(archivePath);
    if (!format) throw new ArchiveFailure(archivePath, `Unsupported archive type: ${archivePath}`);
    if (UNDECODABLE.has(format)) {
      log.warn(`No decoder for ${format}, skipping ${archivePath}`);
      return { status: "skipped", format, reason: `${format} archives are not supported` };
    }

    await fs.promises.mkdir(extractTo, { recursive: true });
    log.info(`Extracting ${format} archive ${archivePath}`);
    try {
      const buffer = await fs.promises.readFile(archivePath);
      switch (format) {
        case "zip":
          return { status: "extracted", format, files: await this.writeMembers(extractTo, readZip(buffer), root) };
        case "tar":
          return { status: "extracted", format, files: await this.writeMembers(extractTo, await readTar(buffer), root) };
        case "tar.gz":
          return {
            status: "extracted",
            format,
            files: await this.writeMembers(extractTo, await readTar(zlib.gunzipSync(buffer)), root),
          };
        case "gz":
          return { status: "extracted", format, files: await this.writeStream(archivePath, extractTo, zlib.gunzipSync(buffer), root) };
        case "tar.bz2":
        case "bz2": {
          const data = await this.decodeBzip2(buffer);
          if (!data) return { status: "skipped", format, reason: "bzip2 decoder not available" };
          const files =
            format === "bz2"
              ? await this.writeStream(archivePath, extractTo, data, root)
              : await this.writeMembers(extractTo, await readTar(data), root);
          return { status: "extracted", format, files };
        }
        default:
          return { status: "skipped", format, reason: `${format} archives are not supported` };
      }
    } catch (err) {
      throw new ArchiveFailure(archivePath, `Failed to extract ${archivePath}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async findArchives(dir: string, processed: ReadonlySet<string>): Promise<string[]> {
    const found: string[] = [];
    const walk = async (current: string): Promise<void> => {
      const entries = await fs.promises.readdir(current, { withFileTypes: true });
      for (const entry of entries) {
        const full = path.join(current, entry.name);
        if (entry.isDirectory()) await walk(full);
        else if (entry.isFile() && isArchive(entry.name) && !processed.has(path.resolve(full))) found.push(full);
      }
    };
    await walk(dir);
    return found.sort();
  }

  /**
   * Extract archives in `dir` round by round. Stops when a round finds no
   * unprocessed archive, or after `maxDepth` rounds; archives still pending
   * then set `depthExceeded` and the partial result is returned.
   */
  async extractRecursively(
    dir: string,
    maxDepth: number = this.maxDepth,
    processed: Set<string> = new Set()
  ): Promise<ExtractionResult> {
    const result: ExtractionResult = { totalExtracted: 0, rounds: [], warnings: [], depthExceeded: false };
    const rel = (p: string): string => path.relative(dir, p) || ".";

    for (let round = 1; round <= maxDepth; round++) {
      const archives = await this.findArchives(dir, processed);
      if (archives.length === 0) {
        log.info(`No more archives after ${round - 1} round(s)`);
        return result;
      }

      const record: ExtractionRound = { round, archivesFound: archives.length, extracted: [], skipped: [], errors: [] };
      for (const archive of archives) {
        processed.add(path.resolve(archive));
        const extractTo = path.dirname(archive);
        try {
          const outcome = await this.extractArchive(archive, extractTo, dir);
          if (outcome.status === "skipped") {
            record.skipped.push({ archive: rel(archive), format: outcome.format, reason: outcome.reason });
            continue;
          }
          record.extracted.push({
            archive: rel(archive),
            format: outcome.format,
            extractedTo: rel(extractTo),
            files: outcome.files.map(rel),
          });
          result.totalExtracted += outcome.files.length;
          log.info(`Extracted ${outcome.files.length} file(s) from ${archive}`);
        } catch (err) {
          log.error(`Archive ${archive} failed`, errorMessage(err));
          record.errors.push({ archive: rel(archive), error: errorMessage(err) });
        }
      }
      result.rounds.push(record);
    }

    const pending = await this.findArchives(dir, processed);
    if (pending.length > 0) {
      const warning = `Reached maximum extraction depth (${maxDepth}) with ${pending.length} archive(s) left`;
      log.warn(warning);
      result.warnings.push(warning);
      result.depthExceeded = true;
    }
    return result;
  }

  /** Run a sweep over a message directory and append it as a new session to its extraction log. */
  async processMessageDirectory(dir: string, maxDepth: number = this.maxDepth): Promise<ExtractionSession> {
    const stat = await fs.promises.stat(dir).catch((err: unknown) => {
      if (isMissingFile(err)) return null;
      throw err;
    });
    if (!stat?.isDirectory()) throw new ValidationFailure(`Message directory not found: ${dir}`);

    const previous = await readExtractionLog(dir);
    const processed = new Set<string>();
    for (const session of previous?.sessions ?? []) {
      for (const archive of archivesIn(session)) processed.add(path.resolve(dir, archive));
    }

    const session: ExtractionSession = {
      messageId: path.basename(dir),
      extractionTime: formatWithOffset(this.now(), this.options.offsetMinutes),
      maxDepth,
      result: await this.extractRecursively(dir, maxDepth, processed),
    };

    const next: ExtractionLog = { sessions: [...(previous?.sessions ?? []), session] };
    await fs.promises.writeFile(path.join(dir, EXTRACTION_LOG_FILE), JSON.stringify(next, null, 2) + "\n", "utf8");
    return session;
  }
}
