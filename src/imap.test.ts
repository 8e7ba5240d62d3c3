import { describe, expect, it } from "vitest";
import { ConnectionFailure } from "./errors.js";
import { ImapStore, imapDayBounds } from "./imap.js";
import { buildDateRange, parseDateInput } from "./time.js";
import { FakeImapClient, FakeTransport, buildRawMessage, testAccount, type FakeImapMessage } from "./test-support.js";

const CST = 8 * 60;
const OPEN = buildDateRange(undefined, undefined);

function numbered(count: number): FakeImapMessage[] {
  return Array.from({ length: count }, (_, i) => ({
    uid: i + 1,
    internalDate: new Date(Date.UTC(2024, 4, 1 + i, 4)),
    raw: buildRawMessage({ subject: `Message ${i + 1}`, text: `body ${i + 1}` }),
  }));
}

function storeWith(client: FakeImapClient, transport = new FakeTransport()): ImapStore {
  return new ImapStore(testAccount("imap"), {
    offsetMinutes: CST,
    imapClientFactory: () => client,
    transportFactory: () => transport,
  });
}

describe("imapDayBounds", () => {
  it("turns a date-only range into whole calendar days at the offset", () => {
    const range = buildDateRange(parseDateInput("2024-05-01", CST), parseDateInput("2024-05-03", CST));
    const bounds = imapDayBounds(range, CST);
    expect(bounds.since?.toISOString()).toBe("2024-05-01T00:00:00.000Z");
    expect(bounds.before?.toISOString()).toBe("2024-05-04T00:00:00.000Z");
  });

  it("moves a timed end to the following day", () => {
    const range = buildDateRange(undefined, parseDateInput("2024-05-03 12:00", CST));
    expect(imapDayBounds(range, CST).before?.toISOString()).toBe("2024-05-04T00:00:00.000Z");
  });
});

describe("ImapStore.fetch", () => {
  it("pages newest first and resumes after start id", async () => {
    const store = storeWith(new FakeImapClient(numbered(10)));
    const first = await store.fetch({ folder: "INBOX", range: OPEN, limit: 5, reverse: true });
    expect(first.messages.map((m) => m.id)).toEqual(["10", "9", "8", "7", "6"]);

    const second = await store.fetch({ folder: "INBOX", range: OPEN, limit: 5, reverse: true, startId: "6" });
    expect(second.messages.map((m) => m.id)).toEqual(["5", "4", "3", "2", "1"]);
    await store.disconnect();
  });

  it("returns oldest first by default and ignores an unknown start id", async () => {
    const store = storeWith(new FakeImapClient(numbered(4)));
    const batch = await store.fetch({ folder: "INBOX", range: OPEN, limit: 3, reverse: false, startId: "99" });
    expect(batch.messages.map((m) => m.id)).toEqual(["1", "2", "3"]);
    expect(batch.messages[0]?.subject).toBe("Message 1");
  });

  it("includes both boundary days of a date-only range", async () => {
    const raw = buildRawMessage({ text: "x" });
    const client = new FakeImapClient([
      { uid: 1, internalDate: new Date("2024-04-30T12:00:00Z"), raw },
      { uid: 2, internalDate: new Date("2024-05-01T00:00:00Z"), raw },
      { uid: 3, internalDate: new Date("2024-05-03T23:59:59Z"), raw },
      { uid: 4, internalDate: new Date("2024-05-04T00:00:00Z"), raw },
    ]);
    const range = buildDateRange(parseDateInput("2024-05-01", CST), parseDateInput("2024-05-03", CST));
    const batch = await storeWith(client).fetch({ folder: "INBOX", range, limit: 10, reverse: false });
    expect(batch.messages.map((m) => m.id)).toEqual(["2", "3"]);
  });

  it("records a message without source and keeps going", async () => {
    class MissingSource extends FakeImapClient {
      override async fetchOne(range: string): Promise<{ uid?: number; source?: Buffer } | false> {
        if (range === "3") return { uid: 3 };
        return super.fetchOne(range);
      }
    }
    const store = storeWith(new MissingSource(numbered(4)));
    const batch = await store.fetch({ folder: "INBOX", range: OPEN, limit: 10, reverse: false });
    expect(batch.messages.map((m) => m.id)).toEqual(["1", "2", "4"]);
    expect(batch.failures).toEqual([{ id: "3", error: "Message UID 3 has no source" }]);
  });

  it("opens the folder read-only once per session", async () => {
    const client = new FakeImapClient(numbered(2));
    const store = storeWith(client);
    await store.fetch({ folder: "Archive", range: OPEN, limit: 1, reverse: false });
    await store.fetch({ folder: "Archive", range: OPEN, limit: 1, reverse: false });
    expect(client.opened).toEqual(["Archive"]);
  });
});

describe("ImapStore session", () => {
  it("moves through disconnected, connected and folder-selected", async () => {
    const client = new FakeImapClient(numbered(1));
    const store = storeWith(client);
    expect(store.state).toBe("disconnected");
    await store.connect();
    expect(store.state).toBe("connected");
    await store.fetch({ folder: "INBOX", range: OPEN, limit: 1, reverse: false });
    expect(store.state).toBe("folder-selected");
    await store.disconnect();
    await store.disconnect();
    expect(store.state).toBe("disconnected");
    expect(client.logoutCalls).toBe(1);
  });

  it("reports a failed login as a connection failure", async () => {
    const client = new FakeImapClient([]);
    client.failConnect = new Error("Invalid credentials");
    const store = storeWith(client);
    const err = await store.connect().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConnectionFailure);
    expect(err instanceof Error ? err.message : "").toBe(
      "IMAP connection to imap.example.com:993 failed: Invalid credentials"
    );
    expect(store.state).toBe("disconnected");
  });
});

describe("ImapStore.search", () => {
  it("scans newest first and hands back the last scanned uid", async () => {
    const messages = numbered(6).map((m) => ({
      ...m,
      raw: buildRawMessage({ subject: m.uid % 2 === 0 ? `Invoice ${m.uid}` : `Note ${m.uid}`, text: "x" }),
    }));
    const store = storeWith(new FakeImapClient(messages));
    const page = await store.search({ keywords: "invoice", field: "subject", pageSize: 2, folder: "INBOX" });
    expect(page.messages.map((m) => m.id)).toEqual(["6", "4"]);
    expect(page.lastId).toBe("4");
    expect(page.scannedCount).toBe(3);
    expect(page.hasMore).toBe(true);

    const next = await store.search({
      keywords: "invoice",
      field: "subject",
      pageSize: 2,
      folder: "INBOX",
      afterId: page.lastId,
    });
    expect(next.messages.map((m) => m.id)).toEqual(["2"]);
    expect(next.hasMore).toBe(false);
  });
});

describe("ImapStore.send", () => {
  it("delegates to the SMTP transport", async () => {
    const transport = new FakeTransport();
    const store = storeWith(new FakeImapClient([]), transport);
    const receipt = await store.send({ to: ["friend@example.com"], subject: "Hi", body: "Hello" });
    expect(receipt.recipients).toEqual(["friend@example.com"]);
    expect(transport.sent).toHaveLength(1);
    await store.disconnect();
    expect(transport.closed).toBe(1);
  });
});
