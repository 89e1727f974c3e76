// backend/services/timetracker/test/memoryStore.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import { MemoryStoreProvider } from "../src/store/memoryStore";
import {
  ReferentialIntegrityError,
  UNASSIGNED_ID,
  type TimeEntryRecord,
} from "../src/store/RecordStore";

const day = (iso: string) => new Date(`${iso}T00:00:00.000Z`);

function entry(
  userId: number,
  projectId: number,
  date: string,
  hours = 1
): TimeEntryRecord {
  return {
    id: UNASSIGNED_ID,
    userId,
    projectId,
    entryDate: day(date),
    hours,
    hourRate: 20,
    description: `work on ${date}`,
  };
}

describe("MemoryStoreProvider", () => {
  let provider: MemoryStoreProvider;

  beforeEach(() => {
    provider = new MemoryStoreProvider();
  });

  it("makes staged adds visible only after commit and assigns ids", async () => {
    const store = provider.open();
    const ann = { id: UNASSIGNED_ID, name: "Ann", hourRate: 25 };
    store.users.add(ann);
    expect(await store.users.count()).toBe(0);

    await store.commit();
    expect(ann.id).toBe(1);
    expect(await provider.open().users.find(1)).toEqual({
      id: 1,
      name: "Ann",
      hourRate: 25,
    });
  });

  it("hands out copies, not the stored records", async () => {
    const store = provider.open();
    store.clients.add({ id: UNASSIGNED_ID, name: "Acme" });
    await store.commit();

    const copy = await store.clients.find(1);
    expect(copy).not.toBeNull();
    if (copy) copy.name = "changed";
    expect((await store.clients.find(1))?.name).toBe("Acme");
  });

  it("lists in id order within the requested window", async () => {
    const store = provider.open();
    for (const name of ["a", "b", "c", "d"]) {
      store.clients.add({ id: UNASSIGNED_ID, name });
    }
    await store.commit();
    expect((await store.clients.list(1, 2)).map((c) => c.name)).toEqual([
      "b",
      "c",
    ]);
    expect(await store.clients.list(10, 5)).toEqual([]);
  });

  it("rejects a commit with a dangling reference and changes nothing", async () => {
    const store = provider.open();
    const orphan = { id: UNASSIGNED_ID, name: "Orphan", clientId: 99 };
    store.projects.add(orphan);
    await expect(store.commit()).rejects.toBeInstanceOf(
      ReferentialIntegrityError
    );
    expect(orphan.id).toBe(UNASSIGNED_ID);
    expect(await store.projects.count()).toBe(0);
  });

  describe("cascading removes", () => {
    beforeEach(async () => {
      const store = provider.open();
      store.users.add({ id: UNASSIGNED_ID, name: "Ann", hourRate: 25 });
      store.clients.add({ id: UNASSIGNED_ID, name: "Acme" });
      store.clients.add({ id: UNASSIGNED_ID, name: "Globex" });
      await store.commit();
      store.projects.add({ id: UNASSIGNED_ID, name: "P1", clientId: 1 });
      store.projects.add({ id: UNASSIGNED_ID, name: "P2", clientId: 2 });
      await store.commit();
      store.timeEntries.add(entry(1, 1, "2024-03-01"));
      store.timeEntries.add(entry(1, 2, "2024-03-02"));
      await store.commit();
    });

    it("removing a client removes its projects and their entries", async () => {
      const store = provider.open();
      const acme = await store.clients.find(1);
      if (!acme) throw new Error("seed missing");
      store.clients.remove(acme);
      await store.commit();

      expect((await store.projects.list(0, 10)).map((p) => p.name)).toEqual([
        "P2",
      ]);
      expect((await store.timeEntries.list(0, 10)).map((e) => e.id)).toEqual([
        2,
      ]);
    });

    it("removing a user removes its entries", async () => {
      const store = provider.open();
      const ann = await store.users.find(1);
      if (!ann) throw new Error("seed missing");
      store.users.remove(ann);
      await store.commit();
      expect(await store.timeEntries.count()).toBe(0);
      expect(await store.projects.count()).toBe(2);
    });
  });

  it("forUserBetween filters a half-open window and orders by date", async () => {
    const store = provider.open();
    store.users.add({ id: UNASSIGNED_ID, name: "Ann", hourRate: 25 });
    store.users.add({ id: UNASSIGNED_ID, name: "Bob", hourRate: 30 });
    store.clients.add({ id: UNASSIGNED_ID, name: "Acme" });
    await store.commit();
    store.projects.add({ id: UNASSIGNED_ID, name: "P1", clientId: 1 });
    await store.commit();
    store.timeEntries.add(entry(1, 1, "2024-03-20")); // 1
    store.timeEntries.add(entry(1, 1, "2024-03-01")); // 2
    store.timeEntries.add(entry(1, 1, "2024-04-01")); // 3, next month
    store.timeEntries.add(entry(2, 1, "2024-03-05")); // 4, other user
    store.timeEntries.add(entry(1, 1, "2024-02-29")); // 5, previous month
    await store.commit();

    const march = await store.timeEntries.forUserBetween(
      1,
      day("2024-03-01"),
      day("2024-04-01")
    );
    expect(march.map((e) => e.id)).toEqual([2, 1]);
  });
});
