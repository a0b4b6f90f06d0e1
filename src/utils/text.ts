export function normalizeWhitespace(value: string): string {
  return value
    .replace(/\r\n?/g, "\n")
    .replace(/\t/g, " ")
    .replace(/ {2,}/g, " ")
    .trim();
}

export function splitIntoParagraphs(text: string): string[] {
  return normalizeWhitespace(text)
    .split(/\n{2,}/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

export function splitIntoSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function chunkArray<T>(items: T[], size: number): T[][] {
  if (size <= 0) {
    throw new Error("Chunk size must be positive.");
  }

  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

/**
 * Packs paragraphs into chunks of at most `maxChars` characters. Paragraphs
 * longer than the limit are split on sentence boundaries, and sentences
 * longer than the limit are cut at `maxChars`.
 */
export function chunkText(text: string, maxChars: number): string[] {
  if (maxChars <= 0) {
    throw new Error("Chunk size must be positive.");
  }

  const pieces = splitIntoParagraphs(text).flatMap((paragraph) =>
    paragraph.length <= maxChars ? [paragraph] : splitOversized(paragraph, maxChars)
  );

  const chunks: string[] = [];
  let current = "";
  for (const piece of pieces) {
    if (!current) {
      current = piece;
    } else if (current.length + 2 + piece.length <= maxChars) {
      current = `${current}\n\n${piece}`;
    } else {
      chunks.push(current);
      current = piece;
    }
  }

  if (current) {
    chunks.push(current);
  }
  return chunks;
}

function splitOversized(paragraph: string, maxChars: number): string[] {
  const parts: string[] = [];
  let current = "";

  for (const sentence of splitIntoSentences(paragraph)) {
    for (let start = 0; start < sentence.length; start += maxChars) {
      const slice = sentence.slice(start, start + maxChars);
      if (!current) {
        current = slice;
      } else if (current.length + 1 + slice.length <= maxChars) {
        current = `${current} ${slice}`;
      } else {
        parts.push(current);
        current = slice;
      }
    }
  }

  if (current) {
    parts.push(current);
  }
  return parts;
}

export function sentenceCase(value: string): string {
  if (!value) {
    return value;
  }

  return `${value.charAt(0).toUpperCase()}${value.slice(1)}`;
}

export function titleFromSlug(slug: string): string {
  return sentenceCase(slug.replace(/[-_]+/g, " ").trim());
}

export function summarizeParagraphs(paragraphs: string[], maxSentences = 2): string {
  const text = normalizeWhitespace(paragraphs.join(" ")).replace(/\n/g, " ");
  if (!text) {
    return "";
  }

  const sentences = splitIntoSentences(text).slice(0, maxSentences);
  if (sentences.length === 0) {
    return text.slice(0, 220);
  }

  return sentences.join(" ");
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/--+/g, "-");
}

export function createId(prefix: string, seed: string): string {
  const slug = slugify(seed) || "item";
  return `${prefix}-${slug}`;
}
