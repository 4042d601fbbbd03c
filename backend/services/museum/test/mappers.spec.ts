// backend/services/museum/test/mappers.spec.ts
import { Types } from "mongoose";
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { categoryFromDb } from "../src/mappers/museum.mapper";
import type { CategoryDoc } from "../src/models/Category";

const stamp = new Date("2024-01-01T00:00:00.000Z");

function categoryDoc(overrides: Partial<CategoryDoc> = {}): CategoryDoc {
  return {
    _id: new Types.ObjectId("65a000000000000000000001"),
    title: "Art",
    slug: "art",
    description: "",
    image: "category/art.jpg",
    order: 0,
    exhibitCount: 2,
    createdAt: stamp,
    updatedAt: stamp,
    ...overrides,
  };
}

describe("museum.mapper – categoryFromDb", () => {
  it("maps a stored category to its contract", () => {
    expect(categoryFromDb(categoryDoc())).toEqual({
      id: "65a000000000000000000001",
      title: "Art",
      slug: "art",
      description: "",
      image: "category/art.jpg",
      order: 0,
      exhibitCount: 2,
      createdAt: stamp,
      updatedAt: stamp,
    });
  });

  it("a row that breaks the contract raises a plain Error naming the fields", () => {
    const load = () => categoryFromDb(categoryDoc({ exhibitCount: -1 }));
    expect(load).toThrow("Stored category failed its contract (exhibitCount)");
    expect(load).not.toThrow(ZodError);
  });
});
