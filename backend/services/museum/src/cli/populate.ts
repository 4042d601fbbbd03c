// backend/services/museum/src/cli/populate.ts
import sharp from "sharp";
import { logger } from "@shared/utils/logger";
import type { Category } from "../contracts/museum.contract";
import type { UploadedFile } from "../media/uploads";
import type { MuseumServices } from "../services";

const CATEGORY_TITLES = ["Art", "History", "Science", "Nature", "Technology"];
const EVENT_TITLES = [
  "Opening night",
  "Guided tour",
  "Lecture evening",
  "Family day",
  "Restoration workshop",
];
const EXHIBIT_TITLES = [
  "Dinosaur Fossil",
  "Ancient Sculpture",
  "Space Shuttle Model",
  "Impressionist Painting",
  "Medieval Armor",
];

export type PopulateOptions = {
  /** Integer in [0, n). */
  randomInt?: (n: number) => number;
};

export type PopulateReport = { categories: number; events: number; exhibits: number };

const defaultRandomInt = (n: number) => Math.floor(Math.random() * n);

/** Solid-colour PNG, uploaded through the same path the admin uses. */
export async function dummyImage(
  name: string,
  width: number,
  height: number,
  randomInt: (n: number) => number
): Promise<UploadedFile> {
  const buffer = await sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: randomInt(256), g: randomInt(256), b: randomInt(256) },
    },
  })
    .png()
    .toBuffer();
  return { originalname: `${name}.png`, buffer, mimetype: "image/png" };
}

/**
 * Demo content: five categories, five events, five exhibits spread over the
 * categories at random. Categories that already exist by title are reused.
 */
export async function populateDemoData(
  services: MuseumServices,
  opts: PopulateOptions = {}
): Promise<PopulateReport> {
  const randomInt = opts.randomInt ?? defaultRandomInt;
  const existing = await services.categories.listOrdered();

  const categories: Category[] = [];
  let createdCategories = 0;
  for (const title of CATEGORY_TITLES) {
    const found = existing.find((c) => c.title === title);
    if (found) {
      categories.push(found);
      continue;
    }
    categories.push(
      await services.categories.create(
        { title, description: "", order: categories.length },
        { image: await dummyImage("category", 400, 300, randomInt) }
      )
    );
    createdCategories++;
  }

  for (const title of EVENT_TITLES) {
    await services.events.create(
      { title, description: "", isActive: true },
      { image: await dummyImage("event", 600, 400, randomInt) }
    );
  }

  for (const title of EXHIBIT_TITLES) {
    const category = categories[randomInt(categories.length)];
    await services.exhibits.create(
      {
        title,
        description: `Description for ${title}`,
        categoryId: category.id,
        isFeatured: false,
      },
      { image: await dummyImage("exhibit", 800, 600, randomInt) }
    );
  }

  const report = {
    categories: createdCategories,
    events: EVENT_TITLES.length,
    exhibits: EXHIBIT_TITLES.length,
  };
  logger.info(report, "demo data populated");
  return report;
}
