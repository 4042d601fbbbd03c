// backend/services/museum/src/views/html.ts

/**
 * Tagged template literals for safe HTML generation.
 * Interpolated values are escaped unless they are already SafeHtml.
 */

export class SafeHtml {
  constructor(readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

/** Escape HTML entities. */
export function escape(value: unknown): string {
  if (value instanceof SafeHtml) return value.content;
  if (Array.isArray(value)) return value.map(escape).join("");

  return String(value ?? "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * @example
 * html`<h2>${exhibit.title}</h2>`  // title is escaped
 */
export function html(strings: TemplateStringsArray, ...values: unknown[]): SafeHtml {
  let out = "";
  for (let i = 0; i < strings.length; i++) {
    out += strings[i];
    if (i < values.length) out += escape(values[i]);
  }
  return new SafeHtml(out);
}

export function when(condition: boolean, render: () => SafeHtml): SafeHtml {
  return condition ? render() : new SafeHtml("");
}

export function each<T>(
  items: readonly T[],
  render: (item: T, index: number) => SafeHtml
): SafeHtml {
  return new SafeHtml(items.map((item, i) => render(item, i).content).join(""));
}
