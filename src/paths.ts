// Storage-safe names and containment checks for files written under the
// attachment root.

import fs from "node:fs";
import path from "node:path";

const MAX_NAME_LENGTH = 255;

export const ATTACHMENT_INDEX_FILE = "attachments.json";
export const EXTRACTION_LOG_FILE = "extraction_log.json";

/** Bookkeeping files at the top of a message directory; never attachment or member names. */
export const SIDECAR_FILES: ReadonlySet<string> = new Set([ATTACHMENT_INDEX_FILE, EXTRACTION_LOG_FILE]);

/**
 * Replace characters that are unsafe in a file name, trim dots and spaces at
 * both ends and cap the length. Never returns an empty name.
 */
export function sanitizeFilename(name: string): string {
  let safe = name.replace(/[<>:"/\\|?*\u0000-\u001f]/g, "_").replace(/^[.\s]+|[.\s]+$/g, "");
  if (!safe) return "unnamed_file";
  if (safe.length > MAX_NAME_LENGTH) {
    const ext = path.extname(safe);
    const keep = ext.length < 16 ? ext : "";
    safe = safe.slice(0, MAX_NAME_LENGTH - keep.length) + keep;
  }
  return safe;
}

/**
 * Relative member path from an archive reduced to safe components: leading
 * slashes, drive letters, `.`, `..` and empty components are dropped and each
 * remaining component is sanitized. Returns "" when nothing is left.
 */
export function sanitizeMemberPath(member: string): string {
  const parts = member
    .replace(/^[A-Za-z]:/, "")
    .split(/[/\\]+/)
    .filter((p) => p !== "" && p !== "." && p !== "..")
    .map(sanitizeFilename);
  return parts.join(path.sep);
}

/** Split "report.final.pdf" into "report.final" and ".pdf". */
export function splitExtension(name: string): { stem: string; ext: string } {
  const ext = path.extname(name);
  if (!ext || ext === name) return { stem: name, ext: "" };
  return { stem: name.slice(0, -ext.length), ext };
}

/** `stem_n.ext` for n = 1, 2, ... */
export function numberedName(name: string, n: number): string {
  const { stem, ext } = splitExtension(name);
  return `${stem}_${n}${ext}`;
}

/** First of `name`, `name_1`, `name_2`, ... that neither exists in `dir` nor is reserved. */
export function uniqueName(dir: string, name: string, reserved: ReadonlySet<string> = new Set()): string {
  const free = (candidate: string): boolean => !reserved.has(candidate) && !fs.existsSync(path.join(dir, candidate));
  if (free(name)) return name;
  for (let n = 1; ; n++) {
    const candidate = numberedName(name, n);
    if (free(candidate)) return candidate;
  }
}

/** True when `candidate` resolves to `root` itself or a path below it. */
export function isInside(root: string, candidate: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(candidate));
  return rel === "" || (rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel));
}
