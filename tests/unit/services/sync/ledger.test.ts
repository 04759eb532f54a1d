import { describe, it, expect, vi, beforeEach } from "vitest";

import { StoreUnavailableError } from "../../../../src/errors.js";
import { ImportLedger } from "../../../../src/services/sync/ledger.js";
import { InMemoryIntelStore } from "../../../helpers/in-memory-store.js";

describe("services/sync/ledger", () => {
  const now = new Date("2026-06-15T12:00:00.000Z");
  let store: InMemoryIntelStore;
  let ledger: ImportLedger;

  beforeEach(() => {
    store = new InMemoryIntelStore();
    ledger = new ImportLedger(store, () => now);
  });

  it("should report a collection without a ticket as not imported", async () => {
    await expect(ledger.hasImported("p1")).resolves.toBe(false);
  });

  it("should attach a ticket numbered after the collection", async () => {
    const eventId = await store.createEvent({
      title: "t",
      description: "d",
      reference: "r",
      tags: [],
      sourceCollectionId: "p1",
    });

    await ledger.recordImported("p1", eventId);

    expect(store.tickets.get("p1")).toEqual({ eventId, date: now });
    await expect(ledger.hasImported("p1")).resolves.toBe(true);
  });

  it("should find tickets written by someone else", async () => {
    await store.attachTicket("9", { ticketNumber: "p2", date: now });
    await expect(ledger.hasImported("p2")).resolves.toBe(true);
  });

  it("should cache positive answers", async () => {
    await store.attachTicket("9", { ticketNumber: "p2", date: now });
    const spy = vi.spyOn(store, "ticketExists");

    await ledger.hasImported("p2");
    await ledger.hasImported("p2");

    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("should not cache negative answers", async () => {
    const spy = vi.spyOn(store, "ticketExists");

    await ledger.hasImported("p3");
    await ledger.hasImported("p3");

    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("should propagate store failures instead of answering false", async () => {
    vi.spyOn(store, "ticketExists").mockRejectedValue(
      new StoreUnavailableError("ticketExists", "connection refused")
    );

    await expect(ledger.hasImported("p1")).rejects.toBeInstanceOf(
      StoreUnavailableError
    );
  });

  it("should not mark a collection imported when the ticket write fails", async () => {
    vi.spyOn(store, "attachTicket").mockRejectedValueOnce(
      new StoreUnavailableError("attachTicket", "connection reset")
    );

    await expect(ledger.recordImported("p1", "1")).rejects.toThrow(
      "connection reset"
    );
    await expect(ledger.hasImported("p1")).resolves.toBe(false);
  });
});
