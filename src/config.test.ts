import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AccountRegistry, accountFolderName, buildAccountConfig, loadServerConfig, providerDefaults } from "./config.js";
import { ValidationFailure } from "./errors.js";
import { maskAddress } from "./log.js";
import { makeTempDir, removeDir } from "./test-support.js";

describe("loadServerConfig", () => {
  it("fills defaults for an empty environment", () => {
    expect(loadServerConfig({})).toEqual({
      accountsFile: "email_accounts.json",
      attachmentsDir: "attachments",
      autoExtract: true,
      maxExtractDepth: 10,
      timezoneOffsetMinutes: 480,
      maxFetchLimit: 1000,
      logLevel: "info",
    });
  });

  it("reads overrides and falls back on bad values", () => {
    const config = loadServerConfig({
      MAILVAULT_AUTO_EXTRACT: "false",
      MAILVAULT_MAX_EXTRACT_DEPTH: "3",
      MAILVAULT_TZ_OFFSET: "-05:00",
      MAILVAULT_MAX_FETCH_LIMIT: "zero",
      MAILVAULT_LOG_LEVEL: "DEBUG",
    });
    expect(config.autoExtract).toBe(false);
    expect(config.maxExtractDepth).toBe(3);
    expect(config.timezoneOffsetMinutes).toBe(-300);
    expect(config.maxFetchLimit).toBe(1000);
    expect(config.logLevel).toBe("debug");
    expect(loadServerConfig({ MAILVAULT_TZ_OFFSET: "CET" }).timezoneOffsetMinutes).toBe(480);
  });
});

describe("buildAccountConfig", () => {
  it("derives hosts from known providers and the domain", () => {
    expect(providerDefaults("someone@gmail.com").smtp).toBe("smtp.gmail.com");
    const account = buildAccountConfig("me@corp.example", { password: "test-secret" });
    expect(account).toMatchObject({
      protocol: "imap",
      imap: { host: "imap.corp.example", port: 993, secure: true },
      pop3: { host: "pop.corp.example", port: 995, secure: true },
      smtp: { host: "smtp.corp.example", port: 587, startTls: true },
      enabled: true,
      defaultFolder: "INBOX",
      tlsRejectUnauthorized: true,
    });
  });

  it("honours explicit settings", () => {
    const account = buildAccountConfig("me@example.com", {
      password: "test-secret",
      protocol: "pop3",
      pop3_host: "127.0.0.1",
      pop3_port: 1110,
      pop3_use_ssl: false,
      smtp_port: 465,
      smtp_use_tls: false,
      tls_reject_unauthorized: false,
    });
    expect(account.pop3).toEqual({ host: "127.0.0.1", port: 1110, secure: false });
    expect(account.smtp).toEqual({ host: "smtp.example.com", port: 465, startTls: false });
    expect(account.tlsRejectUnauthorized).toBe(false);
  });

  it("rejects a malformed address", () => {
    expect(() => buildAccountConfig("not-an-address", { password: "test-secret" })).toThrow(ValidationFailure);
  });
});

describe("accountFolderName", () => {
  it("maps an address to a stable folder name", () => {
    expect(accountFolderName("john.doe+tag@mail.example.com")).toBe("john_doe_tag-mail_example_com");
  });
});

describe("maskAddress", () => {
  it("keeps the first three characters of the local part", () => {
    expect(maskAddress("tester@example.com")).toBe("tes***@example.com");
    expect(maskAddress("al@example.com")).toBe("al***@example.com");
  });
});

describe("AccountRegistry", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("skips invalid entries and enforces enabled accounts", () => {
    const registry = new AccountRegistry({
      entries: {
        "off@example.com": { password: "test-secret", enabled: false },
        "on@example.com": { password: "test-secret" },
        "broken@example.com": { protocol: "imap" },
      },
    });
    expect(registry.list().map((a) => a.address)).toEqual(["off@example.com", "on@example.com"]);
    expect(registry.defaultAccount()?.address).toBe("on@example.com");
    expect(() => registry.require("off@example.com")).toThrow("Account is disabled: off@example.com");
    expect(() => registry.require("nobody@example.com")).toThrow("Account not configured: nobody@example.com");
    expect(registry.require(" on@example.com ").address).toBe("on@example.com");
  });

  it("creates a missing accounts file and picks up edits on reload", () => {
    const file = path.join(dir, "nested", "email_accounts.json");
    const registry = new AccountRegistry({ file });
    expect(registry.list()).toEqual([]);
    expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual({ accounts: {} });

    fs.writeFileSync(
      file,
      JSON.stringify({ accounts: { "new@example.com": { password: "test-secret", protocol: "smtp" } } })
    );
    expect(registry.reload()).toBe(1);
    expect(registry.get("new@example.com")?.protocol).toBe("smtp");
  });
});
