/**
 * HTML Extractor
 *
 * Regex-based tag stripping. Script and style bodies and comments are
 * removed, remaining tags become spaces and common entities are decoded.
 */

const MAX_CODE_POINT = 0x10ffff;

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  nbsp: ' ',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  amp: '&',
};

/**
 * Decode named (&amp; &lt; &gt; &quot; &apos; &nbsp;) and numeric entities.
 * Unknown named entities are left as written.
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body.startsWith('#')) {
      const hex = body[1] === 'x' || body[1] === 'X';
      const code = parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
      return code <= MAX_CODE_POINT ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

/**
 * Reduce an HTML document or fragment to its visible text.
 */
export function stripHtml(html: string): string {
  const withoutTags = html
    .replace(/<script\b[^>]*>[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style\b[^>]*>[\s\S]*?<\/style>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<[^>]+>/g, ' ');
  return decodeEntities(withoutTags);
}

/**
 * Contents of the first `<title>` element, if any.
 */
export function extractHtmlTitle(html: string): string | undefined {
  const raw = /<title\b[^>]*>([\s\S]*?)<\/title>/i.exec(html)?.[1];
  const title = raw !== undefined ? decodeEntities(raw).replace(/\s+/g, ' ').trim() : '';
  return title || undefined;
}

/**
 * Extract visible text from HTML. `<head>` and `<title>` are dropped from the
 * text; the title is returned separately.
 */
export function extractHtmlText(html: string): { text: string; title?: string } {
  const title = extractHtmlTitle(html);
  const body = html
    .replace(/<head\b[^>]*>[\s\S]*?<\/head>/i, ' ')
    .replace(/<title\b[^>]*>[\s\S]*?<\/title>/gi, ' ');
  return { text: stripHtml(body), title };
}
