export interface FrontMatter {
  readonly fields: Readonly<Record<string, string>>;
  readonly body: string;
}

export interface ImageEmbed {
  readonly alt: string;
  readonly path: string;
}

const FRONT_MATTER_DELIMITER = '---';
const IMAGE_EMBED = /!\[([^\]]*)\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g;

/**
 * Reads a leading `---` delimited block of `key: value` lines.
 * Returns null when the article does not open with a complete block.
 */
export function parseFrontMatter(markdown: string): FrontMatter | null {
  const lines = markdown.replace(/^\uFEFF/, '').split('\n');
  if (lines[0]?.trim() !== FRONT_MATTER_DELIMITER) return null;

  const closing = lines.findIndex((line, index) => index > 0 && line.trim() === FRONT_MATTER_DELIMITER);
  if (closing === -1) return null;

  const fields: Record<string, string> = {};
  for (const line of lines.slice(1, closing)) {
    const match = /^([A-Za-z_][\w-]*):\s*(.*)$/.exec(line);
    if (!match) continue;
    fields[match[1]] = unquote(match[2].trim());
  }

  return { fields, body: lines.slice(closing + 1).join('\n').trim() };
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(["\\])/g, '$1');
  }
  return value;
}

/**
 * Builds a front matter block. String values are JSON-quoted so titles with
 * colons stay valid YAML.
 */
export function buildFrontMatter(fields: Readonly<Record<string, string>>): string {
  const lines = Object.entries(fields).map(([key, value]) => `${key}: ${JSON.stringify(value)}`);
  return [FRONT_MATTER_DELIMITER, ...lines, FRONT_MATTER_DELIMITER].join('\n');
}

/**
 * Front matter plus body, ending in a single newline.
 */
export function renderArticle(fields: Readonly<Record<string, string>>, body: string): string {
  return `${buildFrontMatter(fields)}\n\n${body.trim()}\n`;
}

/**
 * The article without its front matter.
 */
export function getArticleBody(markdown: string): string {
  return parseFrontMatter(markdown)?.body ?? markdown.trim();
}

/**
 * Prose paragraphs: blank-line separated blocks, skipping headings and
 * image-only lines.
 */
export function splitParagraphs(body: string): string[] {
  return body
    .split(/\n\s*\n/)
    .map((block) => block.trim())
    .filter((block) => block.length > 0 && !block.startsWith('#') && !/^!\[[^\]]*\]\([^)]*\)$/.test(block));
}

export function splitSentences(text: string): string[] {
  return text
    .replace(/\s+/g, ' ')
    .split(/(?<=[.!?])\s+(?=[A-Z"'(\d])/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function findImageEmbeds(markdown: string): ImageEmbed[] {
  return [...markdown.matchAll(IMAGE_EMBED)].map((match) => ({ alt: match[1], path: match[2] }));
}

/**
 * True when the article embeds an image whose path ends in `fileName`.
 */
export function embedsImage(markdown: string, fileName: string): boolean {
  return findImageEmbeds(markdown).some((embed) => embed.path === fileName || embed.path.endsWith(`/${fileName}`));
}
