import { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { RankedPassage, SectionKind } from "../../domain/models.js";
import { escapeLatex } from "../../utils/latex.js";
import { summarizeParagraphs } from "../../utils/text.js";
import { RenderedPrompt } from "./promptLibrary.js";

export interface ContentPrompt extends RenderedPrompt {
  sectionId: string;
  kind: SectionKind;
  title: string;
}

export interface ContentWriter {
  complete(prompt: ContentPrompt, passages: RankedPassage[]): Promise<string>;
}

const MAX_DIGEST_ITEMS = 4;

export function formatPassages(passages: RankedPassage[]): string {
  return passages
    .map(
      (passage, index) =>
        `[${index + 1}] ${passage.metadata.lessonName} / ${passage.metadata.itemName}\n${passage.text}`
    )
    .join("\n\n");
}

export class RuntimeContentWriter implements ContentWriter {
  constructor(private readonly runtime: AgentRuntime) {}

  async complete(prompt: ContentPrompt, passages: RankedPassage[]): Promise<string> {
    const result = await this.runtime.runText({
      stage: "call",
      agentName: `section:${prompt.sectionId}`,
      systemPrompt: prompt.system,
      userPrompt: `${prompt.user}\n\n=== Transcript context ===\n${formatPassages(passages) || "(no passages retrieved)"}`,
      mockResponse: () => buildDigest(passages)
    });
    return result.data;
  }
}

/**
 * Deterministic LaTeX body built from the retrieved passages: a short lead
 * paragraph and one bullet per distinct transcript item.
 */
export function buildDigest(passages: RankedPassage[]): string {
  if (passages.length === 0) {
    return "No transcript material matched this section.";
  }

  const lead = escapeLatex(summarizeParagraphs(passages.map((passage) => passage.text), 2));

  const seen = new Set<string>();
  const bullets: string[] = [];
  for (const passage of passages) {
    if (seen.has(passage.metadata.itemSlug) || bullets.length >= MAX_DIGEST_ITEMS) {
      continue;
    }
    seen.add(passage.metadata.itemSlug);
    bullets.push(
      `\\item \\textbf{${escapeLatex(passage.metadata.itemName)}}: ${escapeLatex(summarizeParagraphs([passage.text], 1))}`
    );
  }

  return [lead, "", "\\begin{itemize}", ...bullets, "\\end{itemize}"].join("\n");
}
