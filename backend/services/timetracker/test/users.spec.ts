// backend/services/timetracker/test/users.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import { buildHarness, type Harness } from "./helpers/harness";
import { expectCreated, expectOK, expectStatus, problemOf } from "./helpers/http";

describe("users API", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await buildHarness();
  });

  it("creates, reads and deletes a user; readers cannot delete", async () => {
    const created = await expectCreated(
      request(h.app)
        .post("/api/users")
        .set("Authorization", h.admin)
        .send({ name: "Ann", hourRate: 25 })
    );
    expect(created.body).toEqual({ id: 1, name: "Ann", hourRate: 25 });
    expect(created.headers["location"]).toBe("/api/users/1");

    const read = await expectOK(
      request(h.app).get("/api/users/1").set("Authorization", h.reader)
    );
    expect(read.body).toEqual({ id: 1, name: "Ann", hourRate: 25 });

    const denied = await expectStatus(
      request(h.app).delete("/api/users/1").set("Authorization", h.reader),
      403
    );
    expect(problemOf(denied)).toMatchObject({
      type: "https://timetracker.test/errors/forbidden",
      title: "Forbidden",
      status: 403,
      detail: "Admin role required",
    });
    await expectOK(
      request(h.app).get("/api/users/1").set("Authorization", h.reader)
    );

    const removed = await expectOK(
      request(h.app).delete("/api/users/1").set("Authorization", h.admin)
    );
    expect(removed.text).toBe("");

    const gone = await expectStatus(
      request(h.app).get("/api/users/1").set("Authorization", h.admin),
      404
    );
    expect(problemOf(gone).detail).toBe("User 1 not found");
  });

  it("keeps the real totals on a page past the end", async () => {
    for (const name of ["A", "B", "C"]) {
      await expectCreated(
        request(h.app)
          .post("/api/users")
          .set("Authorization", h.admin)
          .send({ name, hourRate: 10 })
      );
    }
    const res = await expectOK(
      request(h.app)
        .get("/api/users")
        .query({ page: 2, size: 10 })
        .set("Authorization", h.reader)
    );
    expect(res.body).toEqual({
      items: [],
      page: 2,
      pageSize: 10,
      totalCount: 3,
      totalPages: 1,
    });
  });

  it("pages with the default size", async () => {
    for (let i = 1; i <= 7; i++) {
      await expectCreated(
        request(h.app)
          .post("/api/users")
          .set("Authorization", h.admin)
          .send({ name: `user ${i}`, hourRate: i })
      );
    }
    const res = await expectOK(
      request(h.app).get("/api/users?page=2").set("Authorization", h.reader)
    );
    expect(res.body.items.map((u: { id: number }) => u.id)).toEqual([6, 7]);
    expect(res.body.pageSize).toBe(5);
    expect(res.body.totalPages).toBe(2);
  });

  it.each([
    ["page=0"],
    ["size=0"],
    ["size=101"],
    ["page=abc"],
  ])("rejects the page query %s", async (query) => {
    const res = await expectStatus(
      request(h.app).get(`/api/users?${query}`).set("Authorization", h.reader),
      400
    );
    expect(problemOf(res).type).toBe(
      "https://timetracker.test/errors/validation-failed"
    );
  });

  it("reports every invalid field", async () => {
    const res = await expectStatus(
      request(h.app)
        .post("/api/users")
        .set("Authorization", h.admin)
        .send({ name: "   ", hourRate: 1000 }),
      400
    );
    const problem = problemOf(res);
    expect(problem.detail).toBe("Validation failed");
    expect(problem.errors).toEqual([
      { path: "name", code: "too_small", message: "must not be empty" },
      {
        path: "hourRate",
        code: "too_big",
        message: "must be less than 1000",
      },
    ]);
  });

  it("rejects a rate of 0 and accepts a small positive one", async () => {
    const zero = await expectStatus(
      request(h.app)
        .post("/api/users")
        .set("Authorization", h.admin)
        .send({ name: "Free", hourRate: 0 }),
      400
    );
    expect(problemOf(zero).errors).toEqual([
      { path: "hourRate", code: "too_small", message: "must be greater than 0" },
    ]);

    const cheap = await expectCreated(
      request(h.app)
        .post("/api/users")
        .set("Authorization", h.admin)
        .send({ name: "Cheap", hourRate: 0.01 })
    );
    expect(cheap.body).toEqual({ id: 1, name: "Cheap", hourRate: 0.01 });
  });

  it("checks the role before the body", async () => {
    await expectStatus(
      request(h.app)
        .post("/api/users")
        .set("Authorization", h.reader)
        .send({ name: "" }),
      403
    );
  });

  it("updates name and rate", async () => {
    await expectCreated(
      request(h.app)
        .post("/api/users")
        .set("Authorization", h.admin)
        .send({ name: "Ann", hourRate: 25 })
    );
    const res = await expectOK(
      request(h.app)
        .put("/api/users/1")
        .set("Authorization", h.admin)
        .send({ name: " Ann B ", hourRate: 40.5 })
    );
    expect(res.body).toEqual({ id: 1, name: "Ann B", hourRate: 40.5 });
  });

  it("answers 404 for id 0 and 400 for a non-numeric id", async () => {
    const zero = await expectStatus(
      request(h.app).get("/api/users/0").set("Authorization", h.reader),
      404
    );
    expect(problemOf(zero).detail).toBe("User 0 not found");

    const bad = await expectStatus(
      request(h.app).get("/api/users/abc").set("Authorization", h.reader),
      400
    );
    expect(problemOf(bad).errors?.[0]?.path).toBe("id");

    await expectStatus(
      request(h.app)
        .put("/api/users/42")
        .set("Authorization", h.admin)
        .send({ name: "Nobody", hourRate: 1 }),
      404
    );
    await expectStatus(
      request(h.app).delete("/api/users/42").set("Authorization", h.admin),
      404
    );
  });
});
