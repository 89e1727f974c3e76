// backend/services/timetracker/test/projects.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import { buildHarness, type Harness } from "./helpers/harness";
import { expectCreated, expectOK, expectStatus, problemOf } from "./helpers/http";

describe("projects API", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await buildHarness({ seed: true });
  });

  const total = async (path: string) => {
    const res = await expectOK(
      request(h.app).get(path).set("Authorization", h.reader)
    );
    return res.body.totalCount;
  };

  it("shows the owning client's name", async () => {
    const res = await expectOK(
      request(h.app).get("/api/projects/3").set("Authorization", h.reader)
    );
    expect(res.body).toEqual({
      id: 3,
      name: "Project 3",
      clientId: 2,
      clientName: "Client 2",
    });
  });

  it("refuses a missing client and stores nothing", async () => {
    const res = await expectStatus(
      request(h.app)
        .post("/api/projects")
        .set("Authorization", h.admin)
        .send({ name: "Lost", clientId: 99 }),
      404
    );
    expect(problemOf(res)).toMatchObject({
      type: "https://timetracker.test/errors/not-found",
      title: "Not Found",
      detail: "Client 99 not found",
    });
    expect(await total("/api/projects")).toBe(3);
  });

  it("treats clientId 0 as unset", async () => {
    const res = await expectStatus(
      request(h.app)
        .post("/api/projects")
        .set("Authorization", h.admin)
        .send({ name: "Zero", clientId: 0 }),
      400
    );
    expect(problemOf(res).errors).toEqual([
      { path: "clientId", code: "custom", message: "must not be 0" },
    ]);
  });

  it("creates under an existing client", async () => {
    const res = await expectCreated(
      request(h.app)
        .post("/api/projects")
        .set("Authorization", h.admin)
        .send({ name: "Project 4", clientId: 2 })
    );
    expect(res.body).toEqual({
      id: 4,
      name: "Project 4",
      clientId: 2,
      clientName: "Client 2",
    });
  });

  it("moves a project to another client", async () => {
    const res = await expectOK(
      request(h.app)
        .put("/api/projects/1")
        .set("Authorization", h.admin)
        .send({ name: "Moved", clientId: 2 })
    );
    expect(res.body).toEqual({
      id: 1,
      name: "Moved",
      clientId: 2,
      clientName: "Client 2",
    });
  });

  it("removing a client removes its projects and their entries", async () => {
    await expectOK(
      request(h.app).delete("/api/clients/1").set("Authorization", h.admin)
    );
    expect(await total("/api/projects")).toBe(1);
    expect(await total("/api/time-entries")).toBe(2);
  });

  it("removing a project removes its entries", async () => {
    await expectOK(
      request(h.app).delete("/api/projects/3").set("Authorization", h.admin)
    );
    expect(await total("/api/time-entries")).toBe(2);
    await expectStatus(
      request(h.app).get("/api/time-entries/4").set("Authorization", h.reader),
      404
    );
  });
});
