import { z } from "zod/v4";

import { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { GenerationConfig } from "../../config/runtimeConfig.js";
import { GenerationError } from "../../domain/errors.js";
import { ModuleOutline, ModuleRef, OutlineEntry, VectorIndexHandle } from "../../domain/models.js";
import { isNotFound, readJsonFile, writeJsonAtomic } from "../../utils/files.js";
import { VectorIndex } from "../vector/vectorIndex.js";
import { PromptLibrary } from "./promptLibrary.js";

const INTRODUCTION_TITLE = "Introduction";

const outlineEntrySchema = z.object({
  order: z.number().int().min(0),
  kind: z.enum(["section", "subsection"]),
  title: z.string().trim().min(1),
  query: z.string().trim().min(1)
});

const outlineFileSchema = z.union([
  z.array(outlineEntrySchema).min(1),
  z.object({
    moduleName: z.string().optional(),
    source: z.enum(["file", "agent", "fallback"]).optional(),
    entries: z.array(outlineEntrySchema).min(1)
  })
]);

const agentOutlineSchema = z.object({
  sections: z
    .array(
      z.object({
        title: z.string().trim().min(1),
        query: z.string().trim().optional()
      })
    )
    .min(1)
});

export const OUTLINE_RESPONSE_SHAPE = '{ "sections": [{ "title": string, "query": string }] }';

export class OutlinePlanner {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly prompts: PromptLibrary,
    private readonly index: VectorIndex,
    private readonly config: GenerationConfig
  ) {}

  /**
   * Outline precedence: the configured outline file, then the outline
   * persisted for the module (unless overwriting), then a fresh proposal.
   */
  async plan(
    moduleRef: ModuleRef,
    handle: VectorIndexHandle,
    outlinePath: string,
    overwrite = false
  ): Promise<ModuleOutline> {
    if (this.config.outlineFile) {
      const entries = await readOutlineFile(this.config.outlineFile);
      const outline: ModuleOutline = { moduleName: moduleRef.moduleName, source: "file", entries };
      await writeJsonAtomic(outlinePath, outline);
      this.log(`Using ${entries.length} outline entries from ${this.config.outlineFile}`);
      return outline;
    }

    if (!overwrite) {
      const stored = await readStoredOutline(outlinePath);
      if (stored) {
        this.log(`Reusing ${stored.entries.length} outline entries from ${outlinePath}`);
        return { ...stored, moduleName: moduleRef.moduleName };
      }
    }

    const outline = await this.propose(moduleRef, handle);
    await writeJsonAtomic(outlinePath, outline);
    this.log(`Planned ${outline.entries.length} outline entries (${outline.source}) -> ${outlinePath}`);
    return outline;
  }

  private async propose(moduleRef: ModuleRef, handle: VectorIndexHandle): Promise<ModuleOutline> {
    const topics = await this.collectTopics(moduleRef, handle);
    const prompt = await this.prompts.renderOutline(moduleRef, topics);

    const run = await this.runtime.runJson<OutlineEntry[]>({
      stage: "call",
      agentName: `outline:${moduleRef.moduleSlug}`,
      systemPrompt: `${prompt.system}\n\nReturn ONLY valid JSON of the shape ${OUTLINE_RESPONSE_SHAPE}.`,
      userPrompt: prompt.user,
      parse: (value) => parseAgentOutline(value, moduleRef),
      fallback: () => buildFallbackOutline(moduleRef, topics)
    });

    return {
      moduleName: moduleRef.moduleName,
      source: run.trace.fallbackUsed ? "fallback" : "agent",
      entries: run.data
    };
  }

  /** Distinct transcript item names for the module, in source file order. */
  private async collectTopics(moduleRef: ModuleRef, handle: VectorIndexHandle): Promise<string[]> {
    const passages = await this.index.query(handle, moduleRef.moduleName, this.config.outlineTopK, {
      moduleSlug: moduleRef.moduleSlug
    });

    const firstSeen = new Map<string, { name: string; sourceFile: string }>();
    for (const passage of passages) {
      const key = passage.metadata.itemSlug;
      const current = firstSeen.get(key);
      if (!current || passage.metadata.sourceFile.localeCompare(current.sourceFile) < 0) {
        firstSeen.set(key, { name: passage.metadata.itemName, sourceFile: passage.metadata.sourceFile });
      }
    }

    return [...firstSeen.values()]
      .sort((left, right) => left.sourceFile.localeCompare(right.sourceFile) || left.name.localeCompare(right.name))
      .map((topic) => topic.name);
  }

  private log(message: string): void {
    console.log(`[outline] ${message}`);
  }
}

export function validateOutline(entries: OutlineEntry[], origin: string): OutlineEntry[] {
  const sorted = [...entries].sort((left, right) => left.order - right.order);

  const first = sorted[0];
  if (!first || first.order !== 0 || first.kind !== "section") {
    throw new GenerationError(`Outline ${origin} must start with an order 0 introduction section.`);
  }

  for (let index = 1; index < sorted.length; index += 1) {
    if (sorted[index].order === sorted[index - 1].order) {
      throw new GenerationError(`Outline ${origin} repeats order ${sorted[index].order}.`);
    }
  }

  return sorted;
}

export function buildFallbackOutline(moduleRef: ModuleRef, topics: string[]): OutlineEntry[] {
  return [
    {
      order: 0,
      kind: "section",
      title: INTRODUCTION_TITLE,
      query: `Introduce ${moduleRef.moduleName}: its goals, the main topics it covers and how they connect.`
    },
    ...topics.map(
      (topic, index): OutlineEntry => ({
        order: index + 1,
        kind: "subsection",
        title: topic,
        query: `Explain ${topic} as it is taught in ${moduleRef.moduleName}, with definitions and worked examples.`
      })
    )
  ];
}

function parseAgentOutline(value: unknown, moduleRef: ModuleRef): OutlineEntry[] {
  const { sections } = agentOutlineSchema.parse(value);
  const body = sections.filter((section) => section.title.toLowerCase() !== INTRODUCTION_TITLE.toLowerCase());

  return buildFallbackOutline(moduleRef, []).concat(
    body.map((section, index): OutlineEntry => ({
      order: index + 1,
      kind: "subsection",
      title: section.title,
      query: section.query || `Explain ${section.title} as it is taught in ${moduleRef.moduleName}.`
    }))
  );
}

async function readOutlineFile(filePath: string): Promise<OutlineEntry[]> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw new GenerationError(`Outline file ${filePath} could not be read.`, undefined, { cause: error });
  }

  const parsed = outlineFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GenerationError(`Outline file ${filePath} is malformed.`, undefined, { cause: parsed.error });
  }
  return validateOutline(Array.isArray(parsed.data) ? parsed.data : parsed.data.entries, filePath);
}

async function readStoredOutline(outlinePath: string): Promise<ModuleOutline | null> {
  let raw: unknown;
  try {
    raw = await readJsonFile(outlinePath);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw new GenerationError(`Stored outline ${outlinePath} could not be read.`, undefined, { cause: error });
  }

  const parsed = outlineFileSchema.safeParse(raw);
  if (!parsed.success || Array.isArray(parsed.data)) {
    console.warn(`[outline] Ignoring malformed stored outline ${outlinePath}`);
    return null;
  }

  return {
    moduleName: parsed.data.moduleName ?? "",
    source: parsed.data.source ?? "file",
    entries: validateOutline(parsed.data.entries, outlinePath)
  };
}
