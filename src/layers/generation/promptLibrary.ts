import { Liquid } from "liquidjs";

import { ModuleRef, OutlineEntry } from "../../domain/models.js";

export interface RenderedPrompt {
  system: string;
  user: string;
}

export const PROMPT_FILES = {
  assistant: "assistant_message",
  intro: "intro_query",
  subsection: "subsection_query",
  outline: "outline_query"
} as const;

/**
 * Loads the `.liquid` prompt files from one directory. The assistant message
 * is the system prompt for every section; the entry kind picks the user
 * prompt.
 */
export class PromptLibrary {
  private readonly engine: Liquid;

  constructor(promptsDirectory: string) {
    this.engine = new Liquid({
      root: [promptsDirectory],
      extname: ".liquid",
      strictVariables: false
    });
  }

  async renderSection(moduleRef: ModuleRef, entry: OutlineEntry): Promise<RenderedPrompt> {
    const context = {
      course: moduleRef.course,
      module_name: moduleRef.moduleName,
      topic_number: moduleRef.topicNumber,
      title: entry.title,
      kind: entry.kind,
      query: entry.query,
      order: entry.order
    };

    const [system, user] = await Promise.all([
      this.render(PROMPT_FILES.assistant, context),
      this.render(entry.order === 0 ? PROMPT_FILES.intro : PROMPT_FILES.subsection, context)
    ]);
    return { system, user };
  }

  async renderOutline(moduleRef: ModuleRef, topics: string[]): Promise<RenderedPrompt> {
    const context = {
      course: moduleRef.course,
      module_name: moduleRef.moduleName,
      topic_number: moduleRef.topicNumber,
      topics
    };

    const [system, user] = await Promise.all([
      this.render(PROMPT_FILES.assistant, context),
      this.render(PROMPT_FILES.outline, context)
    ]);
    return { system, user };
  }

  private async render(templateName: string, context: Record<string, unknown>): Promise<string> {
    const rendered: unknown = await this.engine.renderFile(templateName, context);
    return String(rendered).trim();
  }
}
