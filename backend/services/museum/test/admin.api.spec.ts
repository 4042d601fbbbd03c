// backend/services/museum/test/admin.api.spec.ts
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { zProblem } from "@shared/contracts/common";
import { png } from "./helpers/images";
import {
  ADMIN,
  adminAuth,
  buildTestApp,
  seedCategory,
  seedEvent,
  seedExhibit,
  type TestContext,
} from "./helpers/app";

let ctx: TestContext;
let auth: { Authorization: string };

beforeEach(async () => {
  ctx = await buildTestApp();
  auth = await adminAuth(ctx);
});

afterEach(async () => {
  await ctx.cleanup();
});

describe("Admin API – authentication", () => {
  it("rejects requests without a token", async () => {
    const r = await request(ctx.app).get("/admin/api/events").expect(401);
    const prob = zProblem.parse(r.body);
    expect(prob.code).toBe("UNAUTHORIZED");
    expect(prob.detail).toBe("Missing or malformed Authorization header");
  });

  it("rejects a token signed with another key", async () => {
    const r = await request(ctx.app)
      .get("/admin/api/events")
      .set("Authorization", "Bearer not.a.jwt")
      .expect(401);
    expect(zProblem.parse(r.body).detail).toBe("Invalid or expired token");
  });

  it("rejects a wrong password", async () => {
    const r = await request(ctx.app)
      .post("/admin/api/login")
      .send({ username: ADMIN.username, password: "wrong-password" })
      .expect(401);
    const prob = zProblem.parse(r.body);
    expect(prob.code).toBe("INVALID_CREDENTIALS");
    expect(prob.detail).toBe("Invalid username or password");
  });

  it("validates the login body", async () => {
    const r = await request(ctx.app).post("/admin/api/login").send({ username: "" }).expect(400);
    expect(zProblem.parse(r.body).code).toBe("VALIDATION_ERROR");
  });

  it("returns the token lifetime with the token", async () => {
    const r = await request(ctx.app)
      .post("/admin/api/login")
      .send({ username: ADMIN.username, password: ADMIN.password })
      .expect(200);
    expect(r.body.expiresIn).toBe(28800);
    expect(typeof r.body.token).toBe("string");
  });
});

describe("Admin API – index", () => {
  it("describes the registered resources", async () => {
    const r = await request(ctx.app).get("/admin/api").set(auth).expect(200);
    const names = r.body.resources.map((m: { name: string }) => m.name);
    expect(names).toEqual(["events", "categories", "exhibits"]);
  });

  it("404s on an unknown resource", async () => {
    const r = await request(ctx.app).get("/admin/api/visitors").set(auth).expect(404);
    expect(zProblem.parse(r.body).detail).toBe("Unknown admin resource: visitors");
  });
});

describe("Admin API – categories", () => {
  it("creates from multipart with a derived slug and a normalized image", async () => {
    const r = await request(ctx.app)
      .post("/admin/api/categories")
      .set(auth)
      .field("title", "Natural History")
      .field("order", "3")
      .attach("image", await png(300, 300), "hall.png")
      .expect(201);

    expect(r.body).toMatchObject({
      title: "Natural History",
      slug: "natural-history",
      order: 3,
      exhibitCount: 0,
      description: "",
    });
    expect(r.body.image).toMatch(/^\/media\/category\/hall-[0-9a-f]{8}\.jpg$/);
  });

  it("requires an image on create", async () => {
    const r = await request(ctx.app)
      .post("/admin/api/categories")
      .set(auth)
      .field("title", "Maps")
      .expect(400);
    expect(zProblem.parse(r.body).code).toBe("IMAGE_REQUIRED");
  });

  it("409s on a duplicate title", async () => {
    await seedCategory(ctx, "Maps");
    const r = await request(ctx.app)
      .post("/admin/api/categories")
      .set(auth)
      .field("title", "Maps")
      .attach("image", await png(20, 20), "m.png")
      .expect(409);
    expect(zProblem.parse(r.body).code).toBe("DUPLICATE_TITLE");
  });

  it("rejects exhibitCount as a writable field", async () => {
    const c = await seedCategory(ctx, "Maps");
    const r = await request(ctx.app)
      .patch(`/admin/api/categories/${c.id}`)
      .set(auth)
      .send({ exhibitCount: 99 })
      .expect(400);
    expect(zProblem.parse(r.body).code).toBe("VALIDATION_ERROR");
  });

  it("delete cascades to exhibits", async () => {
    const c = await seedCategory(ctx, "Maps");
    const x = await seedExhibit(ctx, c.id, "Atlas");
    await request(ctx.app).delete(`/admin/api/categories/${c.id}`).set(auth).expect(204);
    expect(await ctx.repos.exhibits.findById(x.id)).toBeNull();
  });
});

describe("Admin API – exhibits", () => {
  it("creates with image and audio, bumping the category count", async () => {
    const c = await seedCategory(ctx, "Art");
    const r = await request(ctx.app)
      .post("/admin/api/exhibits")
      .set(auth)
      .field("title", "Vase")
      .field("description", "Blue glaze")
      .field("categoryId", c.id)
      .field("isFeatured", "on")
      .attach("image", await png(50, 50), "vase.png")
      .attach("audio", Buffer.from("fake mp3 bytes"), "vase guide.mp3")
      .expect(201);

    expect(r.body).toMatchObject({
      title: "Vase",
      isFeatured: true,
      viewCount: 0,
      hasAudio: true,
      categoryId: c.id,
    });
    expect(r.body.audio).toMatch(/^\/media\/exhibit_audio\/vase-guide-[0-9a-f]{8}\.mp3$/);
    expect((await ctx.repos.categories.findById(c.id))?.exhibitCount).toBe(1);
  });

  it("refuses to set viewCount", async () => {
    const c = await seedCategory(ctx, "Art");
    const x = await seedExhibit(ctx, c.id, "Vase");
    await request(ctx.app)
      .patch(`/admin/api/exhibits/${x.id}`)
      .set(auth)
      .send({ viewCount: 1000 })
      .expect(400);
    expect((await ctx.repos.exhibits.findById(x.id))?.viewCount).toBe(0);
  });

  it("rejects an unknown category", async () => {
    const r = await request(ctx.app)
      .post("/admin/api/exhibits")
      .set(auth)
      .field("title", "Vase")
      .field("description", "Blue glaze")
      .field("categoryId", "0123456789abcdef01234567")
      .attach("image", await png(20, 20), "vase.png")
      .expect(400);
    expect(zProblem.parse(r.body).code).toBe("UNKNOWN_CATEGORY");
  });

  it("filters by category and featured flag, searches and pages", async () => {
    const art = await seedCategory(ctx, "Art");
    const history = await seedCategory(ctx, "History");
    await seedExhibit(ctx, art.id, "Blue vase", { isFeatured: true });
    await seedExhibit(ctx, art.id, "Red vase");
    await seedExhibit(ctx, history.id, "Sword");

    const byCategory = await request(ctx.app)
      .get("/admin/api/exhibits")
      .query({ categoryId: art.id })
      .set(auth)
      .expect(200);
    expect(byCategory.body.total).toBe(2);
    expect(byCategory.body.items.map((i: { title: string }) => i.title)).toEqual([
      "Red vase",
      "Blue vase",
    ]);

    const featured = await request(ctx.app)
      .get("/admin/api/exhibits")
      .query({ isFeatured: "true" })
      .set(auth)
      .expect(200);
    expect(featured.body.items.map((i: { title: string }) => i.title)).toEqual(["Blue vase"]);

    const search = await request(ctx.app)
      .get("/admin/api/exhibits")
      .query({ q: "VASE", limit: 1, offset: 1 })
      .set(auth)
      .expect(200);
    expect(search.body).toMatchObject({ total: 2, limit: 1, offset: 1 });
    expect(search.body.items).toHaveLength(1);
    expect(search.body.items[0].title).toBe("Blue vase");
  });

  it("list items carry only the list columns", async () => {
    const art = await seedCategory(ctx, "Art");
    await seedExhibit(ctx, art.id, "Vase");
    const r = await request(ctx.app).get("/admin/api/exhibits").set(auth).expect(200);
    expect(Object.keys(r.body.items[0]).sort()).toEqual(
      ["id", "title", "categoryId", "isFeatured", "viewCount", "hasAudio", "createdAt", "image"].sort()
    );
  });

  it("answers 413 when an upload exceeds UPLOAD_MAX_MB", async () => {
    const c = await seedCategory(ctx, "Art");
    const tooBig = Buffer.alloc(ctx.config.uploadMaxBytes + 1, 1);
    const r = await request(ctx.app)
      .post("/admin/api/exhibits")
      .set(auth)
      .field("title", "Vase")
      .field("description", "Blue glaze")
      .field("categoryId", c.id)
      .attach("image", tooBig, "huge.png")
      .expect(413);
    expect(zProblem.parse(r.body).code).toBe("LIMIT_FILE_SIZE");
  });

  it("rejects a file on a field the resource does not take", async () => {
    const r = await request(ctx.app)
      .post("/admin/api/events")
      .set(auth)
      .field("title", "Gala")
      .attach("image", await png(20, 20), "gala.png")
      .attach("audio", Buffer.from("x"), "gala.mp3")
      .expect(400);
    expect(zProblem.parse(r.body).code).toBe("UNEXPECTED_FILE");
  });
});

describe("Admin API – events", () => {
  it("updates with a JSON body and filters by isActive", async () => {
    const e = await seedEvent(ctx, "Gala");
    await seedEvent(ctx, "Talk");

    const r = await request(ctx.app)
      .patch(`/admin/api/events/${e.id}`)
      .set(auth)
      .send({ isActive: false })
      .expect(200);
    expect(r.body.isActive).toBe(false);

    const inactive = await request(ctx.app)
      .get("/admin/api/events")
      .query({ isActive: "false" })
      .set(auth)
      .expect(200);
    expect(inactive.body.items.map((i: { title: string }) => i.title)).toEqual(["Gala"]);
  });

  it("404s on a missing id", async () => {
    const r = await request(ctx.app)
      .get("/admin/api/events/0123456789abcdef01234567")
      .set(auth)
      .expect(404);
    const prob = zProblem.parse(r.body);
    expect(prob.code).toBe("NOT_FOUND");
    expect(prob.detail).toBe("Event not found");
  });

  it("deletes", async () => {
    const e = await seedEvent(ctx, "Gala");
    await request(ctx.app).delete(`/admin/api/events/${e.id}`).set(auth).expect(204);
    expect(await ctx.repos.events.findById(e.id)).toBeNull();
  });
});
