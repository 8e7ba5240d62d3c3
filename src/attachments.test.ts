import fs from "node:fs";
import path from "node:path";
import AdmZip from "adm-zip";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArchiveManager } from "./archive.js";
import { AttachmentManager, renderAttachmentContent } from "./attachments.js";
import { ValidationFailure } from "./errors.js";
import type { AttachmentRef } from "./message.js";
import { attachmentRef, makeTempDir, removeDir } from "./test-support.js";

const ACCOUNT = "tester@example.com";
const NOW = new Date("2024-06-01T00:00:00Z");

let base: string;

beforeEach(() => {
  base = makeTempDir();
});

afterEach(() => {
  removeDir(base);
});

function manager(autoExtract = false): AttachmentManager {
  const now = () => NOW;
  return new AttachmentManager({
    baseDir: base,
    offsetMinutes: 480,
    autoExtract,
    archives: new ArchiveManager({ offsetMinutes: 480, now }),
    now,
  });
}

function zipOf(entries: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, text] of Object.entries(entries)) zip.addFile(name, Buffer.from(text, "utf8"));
  return zip.toBuffer();
}

describe("AttachmentManager.download", () => {
  it("lays files out per account and message and writes the index", async () => {
    const attachments = manager();
    const result = await attachments.download(ACCOUNT, "42", [attachmentRef("report.pdf", "pdf bytes", "application/pdf")]);

    const dir = path.join(base, "tester-example_com", "42");
    expect(result.directory).toBe(dir);
    expect(result.attachments[0]).toMatchObject({
      filename: "report.pdf",
      safeFilename: "report.pdf",
      size: 9,
      localPath: path.join(dir, "report.pdf"),
      status: "success",
      downloadTime: "2024-06-01T08:00:00+08:00",
    });

    const index = await attachments.getAttachmentInfo(ACCOUNT, "42");
    expect(index?.totalAttachments).toBe(1);
    expect(index?.successfulDownloads).toBe(1);
  });

  it("does not write identical bytes twice", async () => {
    const attachments = manager();
    const refs = [attachmentRef("report.pdf", "same bytes")];
    await attachments.download(ACCOUNT, "42", refs);
    const again = await attachments.download(ACCOUNT, "42", refs);

    expect(again.attachments.map((a) => a.status)).toEqual(["skipped_existing"]);
    expect(fs.readdirSync(again.directory).sort()).toEqual(["attachments.json", "report.pdf"]);
  });

  it("numbers a different attachment under a taken name", async () => {
    const attachments = manager();
    await attachments.download(ACCOUNT, "42", [attachmentRef("report.pdf", "first")]);
    const second = await attachments.download(ACCOUNT, "42", [attachmentRef("report.pdf", "second")]);
    expect(second.attachments[0]?.localPath).toBe(path.join(second.directory, "report_1.pdf"));
    expect(second.attachments[0]?.status).toBe("success");

    const third = await attachments.download(ACCOUNT, "42", [
      attachmentRef("report.pdf", "first"),
      attachmentRef("report.pdf", "second"),
    ]);
    expect(third.attachments.map((a) => [path.basename(a.localPath ?? ""), a.status])).toEqual([
      ["report.pdf", "skipped_existing"],
      ["report_1.pdf", "skipped_existing"],
    ]);
  });

  it("records a failed attachment and stores the rest", async () => {
    const broken: AttachmentRef = {
      filename: "broken.bin",
      originalFilename: "broken.bin",
      contentType: "application/octet-stream",
      size: 10,
      payload: {
        bytes: async () => {
          throw new Error("truncated part");
        },
      },
    };
    const result = await manager().download(ACCOUNT, "7", [broken, attachmentRef("ok.txt", "fine")]);
    expect(result.attachments.map((a) => a.status)).toEqual(["failed", "success"]);
    expect(result.attachments[0]).toMatchObject({ localPath: null, size: 10, error: "truncated part" });
  });

  it("extracts archives after a download that wrote new files", async () => {
    const attachments = manager(true);
    const bundle = attachmentRef("bundle.zip", zipOf({ "inner/a.txt": "alpha" }), "application/zip");
    const result = await attachments.download(ACCOUNT, "9", [bundle]);

    expect(result.extraction?.result.totalExtracted).toBe(1);
    expect(result.extraction?.result.rounds[0]?.extracted[0]?.files).toEqual([path.join("inner", "a.txt")]);
    expect(fs.readFileSync(path.join(result.directory, "inner", "a.txt"), "utf8")).toBe("alpha");

    const again = await attachments.download(ACCOUNT, "9", [bundle]);
    expect(again.extraction).toBeUndefined();
  });

  it("never stores an attachment under the index name", async () => {
    const result = await manager().download(ACCOUNT, "8", [attachmentRef("attachments.json", '{"mine":true}')]);
    const dir = path.join(base, "tester-example_com", "8");
    expect(result.attachments[0]?.localPath).toBe(path.join(dir, "attachments_1.json"));
    expect(fs.readFileSync(path.join(dir, "attachments_1.json"), "utf8")).toBe('{"mine":true}');
    expect((await manager().getAttachmentInfo(ACCOUNT, "8"))?.totalAttachments).toBe(1);
  });

  it("describes a message whose directory could not be written", () => {
    const result = manager().failedDownload(ACCOUNT, "5", [attachmentRef("a b.pdf", "data")], new Error("disk full"));
    expect(result).toEqual({
      directory: path.join(base, "tester-example_com", "5"),
      error: "disk full",
      attachments: [
        {
          filename: "a b.pdf",
          originalFilename: "a b.pdf",
          safeFilename: "a b.pdf",
          contentType: "application/octet-stream",
          size: 4,
          localPath: null,
          status: "failed",
          downloadTime: "2024-06-01T08:00:00+08:00",
          error: "disk full",
        },
      ],
    });
  });

  it("rejects an empty message id", async () => {
    await expect(manager().download(ACCOUNT, " ", [])).rejects.toBeInstanceOf(ValidationFailure);
  });
});

describe("AttachmentManager.read", () => {
  it("resolves exact, sanitized, recorded and prefix names", async () => {
    const attachments = manager();
    const encoded: AttachmentRef = {
      ...attachmentRef("summary.txt", "summary text"),
      originalFilename: "=?UTF-8?B?c3VtbWFyeS50eHQ=?=",
    };
    await attachments.download(ACCOUNT, "5", [
      attachmentRef("report.pdf", "pdf"),
      attachmentRef("a:b.txt", "colon"),
      encoded,
    ]);

    expect(path.basename((await attachments.read(ACCOUNT, "5", "report.pdf"))?.path ?? "")).toBe("report.pdf");
    expect((await attachments.read(ACCOUNT, "5", "a:b.txt"))?.data.toString("utf8")).toBe("colon");
    expect(
      path.basename((await attachments.read(ACCOUNT, "5", "=?UTF-8?B?c3VtbWFyeS50eHQ=?="))?.path ?? "")
    ).toBe("summary.txt");
    expect(path.basename((await attachments.read(ACCOUNT, "5", "summary.docx"))?.path ?? "")).toBe("summary.txt");
    expect(await attachments.read(ACCOUNT, "5", "missing.pdf")).toBeNull();
  });

  it("never reads outside the message directory", async () => {
    const attachments = manager();
    await attachments.download(ACCOUNT, "5", [attachmentRef("report.pdf", "pdf")]);
    fs.writeFileSync(path.join(base, "secret.txt"), "secret");
    expect(await attachments.read(ACCOUNT, "5", "../../secret.txt")).toBeNull();
    expect(await attachments.read(ACCOUNT, "5", path.join(base, "secret.txt"))).toBeNull();
  });

  it("returns null for an unknown message", async () => {
    expect(await manager().read(ACCOUNT, "404", "report.pdf")).toBeNull();
    expect(await manager().getAttachmentInfo(ACCOUNT, "404")).toBeNull();
  });
});

describe("AttachmentManager.list", () => {
  it("walks the message directory without its sidecars", async () => {
    const attachments = manager(true);
    await attachments.download(ACCOUNT, "9", [attachmentRef("bundle.zip", zipOf({ "inner/a.txt": "alpha" }))]);
    const listing = await attachments.list(ACCOUNT, "9");

    expect(listing.exists).toBe(true);
    expect(listing.files.map((f) => f.path)).toEqual(["bundle.zip", path.join("inner", "a.txt")]);
    expect(listing.files[1]?.size).toBe(5);
    expect(listing.directories).toEqual(["inner"]);
    expect(listing.structure).toBe("hierarchical");
    expect(listing.extractionLog?.sessions).toHaveLength(1);
  });

  it("reports a missing directory", async () => {
    const listing = await manager().list(ACCOUNT, "404");
    expect(listing.exists).toBe(false);
    expect(listing.structure).toBe("flat");
  });
});

describe("AttachmentManager maintenance", () => {
  it("removes message directories older than the cutoff", async () => {
    const attachments = manager();
    const old = await attachments.download(ACCOUNT, "1", [attachmentRef("a.txt", "a")]);
    const fresh = await attachments.download(ACCOUNT, "2", [attachmentRef("b.txt", "b")]);
    const longAgo = new Date("2024-01-01T00:00:00Z");
    fs.utimesSync(old.directory, longAgo, longAgo);

    expect(await attachments.cleanup(30)).toBe(1);
    expect(fs.existsSync(old.directory)).toBe(false);
    expect(fs.existsSync(fresh.directory)).toBe(true);
    await expect(attachments.cleanup(-1)).rejects.toBeInstanceOf(ValidationFailure);
  });

  it("totals files, accounts and messages", async () => {
    const attachments = manager();
    const first = await attachments.download(ACCOUNT, "1", [attachmentRef("a.txt", "aaaa")]);
    await attachments.download("other@example.com", "2", [attachmentRef("b.txt", "bb")]);

    const indexSize = fs.statSync(path.join(first.directory, "attachments.json")).size;
    const otherIndexSize = fs.statSync(path.join(base, "other-example_com", "2", "attachments.json")).size;
    const stats = await attachments.getStorageStats();
    expect(stats).toMatchObject({
      basePath: path.resolve(base),
      fileCount: 4,
      accountCount: 2,
      messageCount: 2,
      totalSizeBytes: 4 + 2 + indexSize + otherIndexSize,
    });
  });
});

describe("renderAttachmentContent", () => {
  const parse = { parse: true };

  it("returns text, markdown and csv files as UTF-8", () => {
    expect(renderAttachmentContent("/x/notes.txt", Buffer.from("héllo", "utf8"), parse)).toEqual({
      extension: ".txt",
      contentType: "parsed",
      encoding: "utf8",
      content: "héllo",
      parsingStatus: "success",
    });
    expect(renderAttachmentContent("/x/README.MD", Buffer.from("# Notes", "utf8"), parse).content).toBe("# Notes");
    expect(renderAttachmentContent("/x/rows.csv", Buffer.from("a,b\n1,2", "utf8"), parse).content).toBe("a,b\n1,2");
  });

  it("converts HTML to Markdown", () => {
    const html = Buffer.from("<h1>Title</h1><p>Body text here</p>", "utf8");
    expect(renderAttachmentContent("/x/page.html", html, parse)).toMatchObject({
      extension: ".html",
      contentType: "parsed",
      content: "# Title\n\nBody text here",
      parsingStatus: "success",
    });
    const upper = renderAttachmentContent("/x/page.html", html, { parse: true, normalizer: (m) => m.toUpperCase() });
    expect(upper.content).toBe("<H1>TITLE</H1><P>BODY TEXT HERE</P>");
  });

  it("falls back to base64 when a text file is not UTF-8", () => {
    const rendered = renderAttachmentContent("/x/notes.txt", Buffer.from([0xff, 0xfe, 0x41]), parse);
    expect(rendered).toMatchObject({
      contentType: "raw",
      encoding: "base64",
      content: "//5B",
      parsingStatus: "failed",
    });
    expect(typeof rendered.error).toBe("string");
  });

  it("leaves other types and unparsed reads as base64", () => {
    expect(renderAttachmentContent("/x/report.pdf", Buffer.from("hello", "utf8"), parse)).toEqual({
      extension: ".pdf",
      contentType: "raw",
      encoding: "base64",
      content: "aGVsbG8=",
      parsingStatus: "not_applicable",
    });
    expect(renderAttachmentContent("/x/notes.txt", Buffer.from("hello", "utf8"), { parse: false })).toMatchObject({
      encoding: "base64",
      content: "aGVsbG8=",
      parsingStatus: "not_applicable",
    });
  });
});
