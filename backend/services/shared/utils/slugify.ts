// backend/services/shared/utils/slugify.ts
import { remove as removeDiacritics } from "diacritics";

/**
 * URL slug from a display title.
 *
 * Steps:
 *  1. Lowercase and strip Latin diacritics (Café → cafe).
 *  2. Replace anything that is not a letter or digit with a hyphen
 *     (letters of any script survive: "Зал Египта" → "зал-египта").
 *  3. Collapse hyphen runs and trim them from both ends.
 *  4. Cut to `maxLength` without leaving a trailing hyphen.
 */
export function slugify(input: string, maxLength = 100): string {
  if (!input) return "";

  let s = removeDiacritics(input.normalize("NFC").toLowerCase());
  s = s.replace(/[^\p{L}\p{N}]+/gu, "-");
  s = s.replace(/-+/g, "-").replace(/^-|-$/g, "");

  if (s.length > maxLength) {
    s = s.slice(0, maxLength).replace(/-+$/, "");
  }
  return s;
}

/** `base`, then `base-2`, `base-3`, … until `taken` says no. */
export async function uniqueSlug(
  base: string,
  taken: (candidate: string) => Promise<boolean>,
  maxLength = 100
): Promise<string> {
  if (!(await taken(base))) return base;
  for (let n = 2; ; n++) {
    const suffix = `-${n}`;
    const candidate = `${base.slice(0, maxLength - suffix.length).replace(/-+$/, "")}${suffix}`;
    if (!(await taken(candidate))) return candidate;
  }
}
