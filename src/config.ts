/**
 * Configuration for the MCP server and the mail accounts it serves.
 * Server settings come from the environment (see .env.example); accounts
 * come from a JSON file loaded into an explicit AccountRegistry.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ValidationFailure, errorMessage } from "./errors.js";
import { createLogger, normalizeLogLevel, type LogLevel } from "./log.js";
import { parseOffset } from "./time.js";

const log = createLogger("config");

export interface ServerConfig {
  accountsFile: string;
  attachmentsDir: string;
  /** Extract archives in a message directory after a download that wrote new files. */
  autoExtract: boolean;
  maxExtractDepth: number;
  /** Fixed UTC offset for message timestamps and zone-less date inputs, in minutes. */
  timezoneOffsetMinutes: number;
  /** Hard cap for fetch_emails limit. */
  maxFetchLimit: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function envValue(env: Env, name: string, defaultValue: string): string {
  const v = env[name];
  return v == null || v.trim() === "" ? defaultValue : v.trim();
}

function positiveInt(raw: string, fallback: number): number {
  const n = parseInt(raw, 10);
  return Number.isNaN(n) || n < 1 ? fallback : n;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const offset = parseOffset(envValue(env, "MAILVAULT_TZ_OFFSET", "+08:00"));
  if (offset == null) {
    log.warn("Invalid MAILVAULT_TZ_OFFSET, using +08:00", env.MAILVAULT_TZ_OFFSET);
  }
  return {
    accountsFile: envValue(env, "MAILVAULT_ACCOUNTS_FILE", "email_accounts.json"),
    attachmentsDir: envValue(env, "MAILVAULT_ATTACHMENTS_DIR", "attachments"),
    autoExtract: envValue(env, "MAILVAULT_AUTO_EXTRACT", "true").toLowerCase() !== "false",
    maxExtractDepth: positiveInt(envValue(env, "MAILVAULT_MAX_EXTRACT_DEPTH", "10"), 10),
    timezoneOffsetMinutes: offset ?? 8 * 60,
    maxFetchLimit: positiveInt(envValue(env, "MAILVAULT_MAX_FETCH_LIMIT", "1000"), 1000),
    logLevel: normalizeLogLevel(envValue(env, "MAILVAULT_LOG_LEVEL", "info")),
  };
}

// ---------------------------------------------------------------------------
// Accounts
// ---------------------------------------------------------------------------

export type StoreProtocol = "imap" | "pop3" | "smtp";

export interface EndpointConfig {
  host: string;
  port: number;
  /** Implicit TLS on connect. */
  secure: boolean;
}

export interface SmtpEndpointConfig {
  host: string;
  port: number;
  /** STARTTLS upgrade on a plain connection; false means implicit TLS. */
  startTls: boolean;
}

export interface AccountConfig {
  address: string;
  password: string;
  displayName: string;
  protocol: StoreProtocol;
  imap: EndpointConfig;
  pop3: EndpointConfig;
  smtp: SmtpEndpointConfig;
  enabled: boolean;
  defaultFolder: string;
  /** Self-signed servers (local bridges) need this off. */
  tlsRejectUnauthorized: boolean;
}

interface ProviderDefaults {
  imap: string;
  pop3: string;
  smtp: string;
}

const KNOWN_PROVIDERS: Record<string, ProviderDefaults> = {
  "gmail.com": { imap: "imap.gmail.com", pop3: "pop.gmail.com", smtp: "smtp.gmail.com" },
  "outlook.com": { imap: "outlook.office365.com", pop3: "outlook.office365.com", smtp: "smtp-mail.outlook.com" },
  "hotmail.com": { imap: "outlook.office365.com", pop3: "outlook.office365.com", smtp: "smtp-mail.outlook.com" },
  "yahoo.com": { imap: "imap.mail.yahoo.com", pop3: "pop.mail.yahoo.com", smtp: "smtp.mail.yahoo.com" },
  "icloud.com": { imap: "imap.mail.me.com", pop3: "pop.mail.me.com", smtp: "smtp.mail.me.com" },
  "163.com": { imap: "imap.163.com", pop3: "pop.163.com", smtp: "smtp.163.com" },
  "126.com": { imap: "imap.126.com", pop3: "pop.126.com", smtp: "smtp.126.com" },
  "qq.com": { imap: "imap.qq.com", pop3: "pop.qq.com", smtp: "smtp.qq.com" },
};

export function providerDefaults(address: string): ProviderDefaults {
  const domain = (address.split("@")[1] ?? "").toLowerCase();
  return (
    KNOWN_PROVIDERS[domain] ?? {
      imap: `imap.${domain}`,
      pop3: `pop.${domain}`,
      smtp: `smtp.${domain}`,
    }
  );
}

const accountEntrySchema = z.object({
  password: z.string(),
  display_name: z.string().optional(),
  protocol: z.enum(["imap", "pop3", "smtp"]).default("imap"),
  imap_host: z.string().optional(),
  imap_port: z.number().int().positive().optional(),
  imap_use_ssl: z.boolean().optional(),
  pop3_host: z.string().optional(),
  pop3_port: z.number().int().positive().optional(),
  pop3_use_ssl: z.boolean().optional(),
  smtp_host: z.string().optional(),
  smtp_port: z.number().int().positive().optional(),
  smtp_use_tls: z.boolean().optional(),
  enabled: z.boolean().default(true),
  default_folder: z.string().optional(),
  tls_reject_unauthorized: z.boolean().optional(),
});

const accountsFileSchema = z.object({
  accounts: z.record(z.string(), z.unknown()).default({}),
});

export function buildAccountConfig(address: string, raw: unknown): AccountConfig {
  if (!/^[^@\s]+@[^@\s]+$/.test(address)) {
    throw new ValidationFailure(`Invalid account address: ${address}`);
  }
  const entry = accountEntrySchema.parse(raw);
  const defaults = providerDefaults(address);
  return {
    address,
    password: entry.password,
    displayName: entry.display_name ?? "",
    protocol: entry.protocol,
    imap: {
      host: entry.imap_host || defaults.imap,
      port: entry.imap_port ?? 993,
      secure: entry.imap_use_ssl ?? true,
    },
    pop3: {
      host: entry.pop3_host || defaults.pop3,
      port: entry.pop3_port ?? 995,
      secure: entry.pop3_use_ssl ?? true,
    },
    smtp: {
      host: entry.smtp_host || defaults.smtp,
      port: entry.smtp_port ?? 587,
      startTls: entry.smtp_use_tls ?? true,
    },
    enabled: entry.enabled,
    defaultFolder: entry.default_folder || "INBOX",
    tlsRejectUnauthorized: entry.tls_reject_unauthorized ?? true,
  };
}

/**
 * Deterministic per-account storage folder: `@` becomes `-`, `.` becomes `_`,
 * anything else outside [A-Za-z0-9_-] becomes `_`.
 */
export function accountFolderName(address: string): string {
  return address
    .trim()
    .replace(/@/g, "-")
    .replace(/\./g, "_")
    .replace(/[^A-Za-z0-9_-]/g, "_");
}

export interface AccountSummary {
  address: string;
  displayName: string;
  protocol: StoreProtocol;
  enabled: boolean;
}

export type AccountSource = { file: string } | { entries: Record<string, unknown> };

function readAccountsFile(file: string): Record<string, unknown> {
  if (!fs.existsSync(file)) {
    log.info(`Accounts file ${file} not found, creating an empty one`);
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ accounts: {} }, null, 2) + "\n", "utf8");
    return {};
  }
  return accountsFileSchema.parse(JSON.parse(fs.readFileSync(file, "utf8"))).accounts;
}

/**
 * Accounts loaded from a JSON file (or given inline). Constructed explicitly
 * and passed down; `reload()` re-reads the source and replaces the whole set.
 */
export class AccountRegistry {
  private accounts = new Map<string, AccountConfig>();

  constructor(private readonly source: AccountSource) {
    this.reload();
  }

  reload(): number {
    const raw = "file" in this.source ? readAccountsFile(this.source.file) : this.source.entries;
    const next = new Map<string, AccountConfig>();
    for (const [address, entry] of Object.entries(raw)) {
      try {
        next.set(address, buildAccountConfig(address, entry));
      } catch (err) {
        log.error(`Skipping account ${address}`, errorMessage(err));
      }
    }
    this.accounts = next;
    log.info(`Loaded ${next.size} account(s)`);
    return next.size;
  }

  get(address: string): AccountConfig | undefined {
    return this.accounts.get(address.trim());
  }

  /** Absent or disabled accounts are a precondition failure for every operation. */
  require(address: string): AccountConfig {
    const account = this.get(address);
    if (!account) throw new ValidationFailure(`Account not configured: ${address}`);
    if (!account.enabled) throw new ValidationFailure(`Account is disabled: ${address}`);
    return account;
  }

  list(): AccountSummary[] {
    return Array.from(this.accounts.values()).map((a) => ({
      address: a.address,
      displayName: a.displayName,
      protocol: a.protocol,
      enabled: a.enabled,
    }));
  }

  enabled(): AccountConfig[] {
    return Array.from(this.accounts.values()).filter((a) => a.enabled);
  }

  defaultAccount(): AccountConfig | undefined {
    return this.enabled()[0];
  }
}
