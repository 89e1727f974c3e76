// backend/services/timetracker/test/timeEntries.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import { buildHarness, type Harness } from "./helpers/harness";
import { expectCreated, expectOK, expectStatus, problemOf } from "./helpers/http";
import { monthWindow } from "../src/services/timeEntries";

const entry = (over: Record<string, unknown> = {}) => ({
  userId: 1,
  projectId: 1,
  entryDate: "2024-03-10",
  hours: 3,
  description: "pairing",
  ...over,
});

describe("time entries API", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await buildHarness({ seed: true });
  });

  const post = (body: Record<string, unknown>) =>
    request(h.app)
      .post("/api/time-entries")
      .set("Authorization", h.admin)
      .send(body);

  it("flattens user, project and client into the view", async () => {
    const res = await expectOK(
      request(h.app).get("/api/time-entries/1").set("Authorization", h.reader)
    );
    expect(res.body).toEqual({
      id: 1,
      userId: 1,
      userName: "John Doe",
      projectId: 1,
      projectName: "Project 1",
      clientId: 1,
      clientName: "Client 1",
      entryDate: "2019-07-01",
      hours: 5,
      hourRate: 25,
      description: "Time entry description 1",
    });
  });

  it("copies the user's current rate on create", async () => {
    const res = await expectCreated(
      post(entry({ userId: 2, description: "  pairing  " }))
    );
    expect(res.headers["location"]).toBe("/api/time-entries/5");
    expect(res.body).toMatchObject({
      id: 5,
      userId: 2,
      userName: "Joan Doe",
      hourRate: 30,
      entryDate: "2024-03-10",
      description: "pairing",
    });
  });

  it("drops the time part of a date-time", async () => {
    const res = await expectCreated(
      post(entry({ entryDate: "2024-03-10T17:45:00Z" }))
    );
    expect(res.body.entryDate).toBe("2024-03-10");
  });

  it.each([
    ["userId", 99, "User 99 not found"],
    ["projectId", 99, "Project 99 not found"],
  ])("refuses a missing %s", async (field, value, detail) => {
    const res = await expectStatus(post(entry({ [field]: value })), 404);
    expect(problemOf(res).detail).toBe(detail);

    const page = await expectOK(
      request(h.app).get("/api/time-entries").set("Authorization", h.reader)
    );
    expect(page.body.totalCount).toBe(4);
  });

  it.each([
    ["the lower bound", { entryDate: "2019-01-01" }, "entryDate"],
    ["the upper bound", { entryDate: "2100-01-01" }, "entryDate"],
    ["an impossible date", { entryDate: "2024-02-30" }, "entryDate"],
    ["zero hours", { hours: 0 }, "hours"],
    ["25 hours", { hours: 25 }, "hours"],
    ["fractional hours", { hours: 1.5 }, "hours"],
    ["a blank description", { description: "  " }, "description"],
    [
      "a description over 10000 characters",
      { description: "x".repeat(10_001) },
      "description",
    ],
  ])("rejects %s", async (_label, over, path) => {
    const res = await expectStatus(post(entry(over)), 400);
    expect(problemOf(res).errors?.map((e) => e.path)).toEqual([path]);
  });

  it("accepts the first day after the lower bound", async () => {
    await expectCreated(post(entry({ entryDate: "2019-01-02" })));
  });

  it("accepts a description of exactly 10000 characters", async () => {
    const res = await expectCreated(post(entry({ description: "x".repeat(10_000) })));
    expect(res.body.description).toHaveLength(10_000);
  });

  it("updates date, hours and description only", async () => {
    const res = await expectOK(
      request(h.app)
        .put("/api/time-entries/1")
        .set("Authorization", h.admin)
        .send(
          entry({
            userId: 2,
            projectId: 3,
            entryDate: "2019-07-02",
            hours: 6,
            description: "reworked",
          })
        )
    );
    expect(res.body).toEqual({
      id: 1,
      userId: 1,
      userName: "John Doe",
      projectId: 1,
      projectName: "Project 1",
      clientId: 1,
      clientName: "Client 1",
      entryDate: "2019-07-02",
      hours: 6,
      hourRate: 25,
      description: "reworked",
    });
  });

  it("leaves user, project and rate alone across repeated updates", async () => {
    const body = entry({
      userId: 2,
      projectId: 3,
      entryDate: "2019-07-01",
      hours: 5,
      description: "same again",
    });
    for (let i = 0; i < 2; i++) {
      await expectOK(
        request(h.app)
          .put("/api/time-entries/1")
          .set("Authorization", h.admin)
          .send(body)
      );
    }

    const res = await expectOK(
      request(h.app).get("/api/time-entries/1").set("Authorization", h.reader)
    );
    expect(res.body).toMatchObject({
      userId: 1,
      projectId: 1,
      hourRate: 25,
      entryDate: "2019-07-01",
      hours: 5,
      description: "same again",
    });
  });

  it("still requires the references of an update to exist", async () => {
    const res = await expectStatus(
      request(h.app)
        .put("/api/time-entries/1")
        .set("Authorization", h.admin)
        .send(entry({ projectId: 77 })),
      404
    );
    expect(problemOf(res).detail).toBe("Project 77 not found");
  });

  it("keeps the booked rate when the user's rate changes", async () => {
    await expectOK(
      request(h.app)
        .put("/api/users/1")
        .set("Authorization", h.admin)
        .send({ name: "John Doe", hourRate: 99 })
    );
    const res = await expectOK(
      request(h.app).get("/api/time-entries/1").set("Authorization", h.reader)
    );
    expect(res.body.hourRate).toBe(25);
  });

  describe("month listing", () => {
    const month = (path: string) =>
      request(h.app)
        .get(`/api/time-entries/user/${path}`)
        .set("Authorization", h.reader);

    it("lists one user's month ordered by date", async () => {
      await expectCreated(post(entry({ entryDate: "2024-03-20", hours: 1 })));
      await expectCreated(post(entry({ entryDate: "2024-03-01", hours: 2 })));
      await expectCreated(post(entry({ entryDate: "2024-04-01", hours: 3 })));
      await expectCreated(post(entry({ entryDate: "2024-02-29", hours: 4 })));
      await expectCreated(
        post(entry({ userId: 2, entryDate: "2024-03-05", hours: 5 }))
      );

      const res = await expectOK(month("1/2024/3"));
      expect(
        res.body.map((e: { entryDate: string; hours: number }) => [
          e.entryDate,
          e.hours,
        ])
      ).toEqual([
        ["2024-03-01", 2],
        ["2024-03-20", 1],
      ]);
    });

    it("breaks date ties by id", async () => {
      const res = await expectOK(month("1/2019/7"));
      expect(res.body.map((e: { id: number }) => e.id)).toEqual([1, 2, 3]);
    });

    it("returns an empty list for an unknown user", async () => {
      const res = await expectOK(month("99/2019/7"));
      expect(res.body).toEqual([]);
    });

    it.each(["1/2024/13", "1/2024/0", "1/0/5", "x/2024/3", "1/2024/may"])(
      "rejects %s",
      async (path) => {
        const res = await expectStatus(month(path), 400);
        expect(problemOf(res).status).toBe(400);
      }
    );
  });
});

describe("monthWindow", () => {
  it("spans the first of the month to the first of the next", () => {
    const [from, to] = monthWindow(2024, 12);
    expect(from.toISOString()).toBe("2024-12-01T00:00:00.000Z");
    expect(to.toISOString()).toBe("2025-01-01T00:00:00.000Z");
  });

  it("keeps two-digit years as written", () => {
    const [from] = monthWindow(45, 6);
    expect(from.getUTCFullYear()).toBe(45);
  });
});
