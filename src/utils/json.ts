export function parseJsonFromModelText(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error("Model returned an empty response.");
  }

  const candidates = [
    extractFencedJson(trimmed),
    trimmed,
    extractDelimitedJson(trimmed, "{", "}"),
    extractDelimitedJson(trimmed, "[", "]")
  ].filter((candidate): candidate is string => candidate !== null);

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed.ok) {
      return parsed.value;
    }
  }

  throw new Error("Model response did not contain valid JSON.");
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { ok: false };
    }
    throw error;
  }
}

function extractFencedJson(text: string): string | null {
  const match = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return match?.[1]?.trim() ?? null;
}

function extractDelimitedJson(text: string, start: string, end: string): string | null {
  const startIndex = text.indexOf(start);
  const endIndex = text.lastIndexOf(end);

  if (startIndex === -1 || endIndex === -1 || endIndex <= startIndex) {
    return null;
  }

  return text.slice(startIndex, endIndex + 1).trim();
}
