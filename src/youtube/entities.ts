const NAMED: Record<string, string> = {
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

const fromCodePoint = (ref: string, code: number): string =>
  Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : ref;

/**
 * Decode HTML character references in caption text.
 *
 * `&amp;` goes first: timedtext escapes twice (`I&amp;#39;m`), so the inner
 * reference only becomes decodable once the outer one is gone.
 */
export function decodeEntities(s: string): string {
  return s
    .replace(/&amp;/g, "&")
    .replace(/&#x([0-9a-f]+);/gi, (ref, hex: string) => fromCodePoint(ref, Number.parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (ref, dec: string) => fromCodePoint(ref, Number(dec)))
    .replace(/&(lt|gt|quot|apos|nbsp);/g, (ref, name: string) => NAMED[name] ?? ref);
}

/** Plain caption text: tags stripped before decoding and again after, since escaped markup only shows up once decoded. */
export function captionText(s: string): string {
  return decodeEntities(s.replace(/<[^>]+>/g, "")).replace(/<[^>]+>/g, "");
}
