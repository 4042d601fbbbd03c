// backend/services/museum/test/services.spec.ts
import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { dimensions, NOT_AN_IMAGE, png } from "./helpers/images";
import {
  buildTestApp,
  imageUpload,
  seedCategory,
  seedExhibit,
  type TestContext,
} from "./helpers/app";
import { newId } from "./helpers/memoryRepos";

let ctx: TestContext;

beforeEach(async () => {
  ctx = await buildTestApp();
});

afterEach(async () => {
  await ctx.cleanup();
});

async function fileExists(rel: string | null): Promise<boolean> {
  if (!rel) return false;
  try {
    await fs.access(path.join(ctx.mediaRoot, rel));
    return true;
  } catch {
    return false;
  }
}

async function countOf(categoryId: string): Promise<number | undefined> {
  return (await ctx.repos.categories.findById(categoryId))?.exhibitCount;
}

describe("CategoryService – slugs and uniqueness", () => {
  it("derives the slug from the title", async () => {
    const c = await seedCategory(ctx, "Ancient Egypt");
    expect(c.slug).toBe("ancient-egypt");
  });

  it("suffixes a derived slug that is already taken", async () => {
    await seedCategory(ctx, "Ancient Egypt");
    const second = await seedCategory(ctx, "Ancient Egypt!");
    const third = await seedCategory(ctx, "ancient egypt");
    expect(second.slug).toBe("ancient-egypt-2");
    expect(third.slug).toBe("ancient-egypt-3");
  });

  it("keeps an explicit slug", async () => {
    const c = await ctx.services.categories.create(
      { title: "Modern Art", slug: "modern", description: "", order: 1 },
      { image: await imageUpload() }
    );
    expect(c.slug).toBe("modern");
  });

  it("rejects a duplicate title with 409", async () => {
    await seedCategory(ctx, "Fossils");
    await expect(seedCategory(ctx, "Fossils")).rejects.toMatchObject({
      status: 409,
      code: "DUPLICATE_TITLE",
    });
  });

  it("rejects an explicit slug that is already in use with 409", async () => {
    await seedCategory(ctx, "Fossils");
    await expect(
      ctx.services.categories.create(
        { title: "Bones", slug: "fossils", description: "", order: 0 },
        { image: await imageUpload() }
      )
    ).rejects.toMatchObject({ status: 409, code: "DUPLICATE_SLUG" });
  });

  it("leaves the slug alone when the title changes", async () => {
    const c = await seedCategory(ctx, "Fossils");
    const updated = await ctx.services.categories.update(c.id, { title: "Old Bones" }, {});
    expect(updated.title).toBe("Old Bones");
    expect(updated.slug).toBe("fossils");
  });

  it("requires an image on create", async () => {
    await expect(
      ctx.services.categories.create({ title: "Maps", description: "", order: 0 }, {})
    ).rejects.toMatchObject({ status: 400, code: "IMAGE_REQUIRED" });
  });
});

describe("Media ingestion", () => {
  it("stores a normalized JPEG, bounded by MAX_IMAGE_WIDTH/HEIGHT", async () => {
    const c = await ctx.services.categories.create(
      { title: "Maps", description: "", order: 0 },
      { image: { originalname: "Big Map.PNG", buffer: await png(400, 300) } }
    );
    expect(c.image).toMatch(/^category\/big-map-[0-9a-f]{8}\.jpg$/);
    const bytes = await fs.readFile(path.join(ctx.mediaRoot, c.image));
    expect(await dimensions(bytes)).toMatchObject({ width: 200, height: 150, format: "jpeg" });
  });

  it("stores a file that is not an image exactly as uploaded", async () => {
    const e = await ctx.services.events.create(
      { title: "Night tour", description: "", isActive: true },
      { image: { originalname: "poster.txt", buffer: NOT_AN_IMAGE } }
    );
    expect(e.image).toMatch(/^event\/poster-[0-9a-f]{8}\.txt$/);
    const bytes = await fs.readFile(path.join(ctx.mediaRoot, e.image));
    expect(bytes.equals(NOT_AN_IMAGE)).toBe(true);
  });

  it("replacing an image deletes the previous file", async () => {
    const e = await ctx.services.events.create(
      { title: "Night tour", description: "", isActive: true },
      { image: await imageUpload("first.png") }
    );
    const updated = await ctx.services.events.update(e.id, {}, { image: await imageUpload("second.png") });
    expect(updated.image).not.toBe(e.image);
    expect(await fileExists(e.image)).toBe(false);
    expect(await fileExists(updated.image)).toBe(true);
  });

  it("an edit without a new upload keeps the stored file as is", async () => {
    const e = await ctx.services.events.create(
      { title: "Night tour", description: "", isActive: true },
      { image: await imageUpload() }
    );
    const before = await fs.readFile(path.join(ctx.mediaRoot, e.image));
    const updated = await ctx.services.events.update(e.id, { title: "Late tour" }, {});
    expect(updated.image).toBe(e.image);
    expect((await fs.readFile(path.join(ctx.mediaRoot, e.image))).equals(before)).toBe(true);
  });
});

describe("ExhibitService – category integrity", () => {
  it("rejects an unknown category with 400", async () => {
    await expect(seedExhibit(ctx, newId(), "Orphan")).rejects.toMatchObject({
      status: 400,
      code: "UNKNOWN_CATEGORY",
    });
  });

  it("keeps exhibitCount equal to the number of exhibits", async () => {
    const a = await seedCategory(ctx, "Art");
    const b = await seedCategory(ctx, "History");
    const x1 = await seedExhibit(ctx, a.id, "Vase");
    await seedExhibit(ctx, a.id, "Mask");
    expect(await countOf(a.id)).toBe(2);

    await ctx.services.exhibits.update(x1.id, { categoryId: b.id }, {});
    expect(await countOf(a.id)).toBe(1);
    expect(await countOf(b.id)).toBe(1);

    await ctx.services.exhibits.remove(x1.id);
    expect(await countOf(b.id)).toBe(0);
  });

  it("counts a move once when the same edit arrives twice at the same time", async () => {
    const a = await seedCategory(ctx, "Art");
    const b = await seedCategory(ctx, "History");
    const x = await seedExhibit(ctx, a.id, "Vase");

    await Promise.all([
      ctx.services.exhibits.update(x.id, { categoryId: b.id }, {}),
      ctx.services.exhibits.update(x.id, { categoryId: b.id }, {}),
    ]);

    expect((await ctx.repos.exhibits.findById(x.id))?.categoryId).toBe(b.id);
    expect(await countOf(a.id)).toBe(0);
    expect(await countOf(b.id)).toBe(1);
  });

  it("racing moves to different categories leave one count where the exhibit ended up", async () => {
    const a = await seedCategory(ctx, "Art");
    const b = await seedCategory(ctx, "History");
    const c = await seedCategory(ctx, "Science");
    const x = await seedExhibit(ctx, a.id, "Vase");

    await Promise.all([
      ctx.services.exhibits.update(x.id, { categoryId: b.id }, {}),
      ctx.services.exhibits.update(x.id, { categoryId: c.id }, {}),
    ]);

    const landed = (await ctx.repos.exhibits.findById(x.id))?.categoryId;
    for (const cat of [a, b, c]) {
      expect(await countOf(cat.id)).toBe(cat.id === landed ? 1 : 0);
    }
  });

  it("stores audio under exhibit_audio and can clear it", async () => {
    const a = await seedCategory(ctx, "Art");
    const x = await seedExhibit(ctx, a.id, "Vase", { audio: true });
    expect(x.audio).toMatch(/^exhibit_audio\/guide-[0-9a-f]{8}\.mp3$/);
    expect(await ctx.services.exhibits.countWithAudio(a.id)).toBe(1);

    const cleared = await ctx.services.exhibits.update(x.id, { clearAudio: true }, {});
    expect(cleared.audio).toBeNull();
    expect(await fileExists(x.audio)).toBe(false);
    expect(await ctx.services.exhibits.countWithAudio(a.id)).toBe(0);
  });

  it("recordView adds exactly one view", async () => {
    const a = await seedCategory(ctx, "Art");
    const x = await seedExhibit(ctx, a.id, "Vase");
    expect((await ctx.services.exhibits.recordView(x.id)).viewCount).toBe(1);
    expect((await ctx.services.exhibits.recordView(x.id)).viewCount).toBe(2);
  });

  it("recordView on a missing exhibit is a 404", async () => {
    await expect(ctx.services.exhibits.recordView(newId())).rejects.toMatchObject({
      status: 404,
      code: "NOT_FOUND",
    });
  });
});

describe("CategoryService – cascade delete", () => {
  it("removes the exhibits and every file they referenced", async () => {
    const art = await seedCategory(ctx, "Art");
    const other = await seedCategory(ctx, "Other");
    const x1 = await seedExhibit(ctx, art.id, "Vase", { audio: true });
    const x2 = await seedExhibit(ctx, art.id, "Mask");
    const keep = await seedExhibit(ctx, other.id, "Coin");

    const result = await ctx.services.categories.remove(art.id);

    expect(result).toEqual({ exhibitsRemoved: 2 });
    expect(await ctx.repos.categories.findById(art.id)).toBeNull();
    expect(await ctx.repos.exhibits.findById(x1.id)).toBeNull();
    expect(await ctx.repos.exhibits.findById(x2.id)).toBeNull();
    expect(await ctx.repos.exhibits.findById(keep.id)).not.toBeNull();
    for (const rel of [art.image, x1.image, x1.audio, x2.image]) {
      expect(await fileExists(rel)).toBe(false);
    }
    expect(await fileExists(keep.image)).toBe(true);
  });
});
