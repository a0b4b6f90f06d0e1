import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod/v4";

import { ResolutionError } from "../../domain/errors.js";
import { ModuleRef, ModuleSource, SourceContentType } from "../../domain/models.js";
import { isNotFound } from "../../utils/files.js";
import { slugify } from "../../utils/text.js";

const contentRefSchema = z.object({
  content_type: z.string().trim().min(1),
  path: z.string()
});

const itemSchema = z.object({
  name: z.string().min(1),
  transformed_slug: z.string().optional(),
  content: z.array(contentRefSchema).default([])
});

const lessonSchema = z.object({
  lesson_name: z.string().min(1),
  lesson_slug: z.string().optional(),
  items: z.array(itemSchema).default([])
});

const moduleSchema = z.object({
  module_name: z.string().trim().min(1),
  module_slug: z.string().optional(),
  transcript_path: z.string().optional(),
  lessons: z.array(lessonSchema).default([])
});

export const courseMetadataSchema = z.object({
  course_name: z.string().trim().min(1),
  course_slug: z.string().optional(),
  modules: z.array(moduleSchema).default([])
});

export type CourseMetadata = z.infer<typeof courseMetadataSchema>;
type ModuleMetadata = z.infer<typeof moduleSchema>;

const SOURCE_EXTENSIONS: Record<SourceContentType, string> = {
  transcript: ".txt",
  "extra-notes": ".md"
};

/**
 * Turns a course metadata file and a 1-based topic number into the module
 * the pipeline will build. Reads only; every failure is a ResolutionError.
 */
export class MetadataResolver {
  async resolve(metadataFile: string, topicNumber: number): Promise<ModuleRef> {
    const metadata = await this.load(metadataFile);

    if (!Number.isInteger(topicNumber) || topicNumber < 1 || topicNumber > metadata.modules.length) {
      throw new ResolutionError(
        `Topic ${topicNumber} is out of range: ${metadataFile} lists ${metadata.modules.length} module(s).`
      );
    }

    const moduleMeta = metadata.modules[topicNumber - 1];
    const baseDirectory = path.dirname(path.resolve(metadataFile));
    const sources = collectSources(moduleMeta, baseDirectory);
    const transcriptPath = resolveTranscriptPath(moduleMeta, sources, baseDirectory);

    if (!transcriptPath) {
      throw new ResolutionError(
        `Module "${moduleMeta.module_name}" has no transcript location (set transcript_path or list transcript content).`
      );
    }

    return {
      course: metadata.course_name.trim(),
      courseSlug: metadata.course_slug || slugify(metadata.course_name),
      topicNumber,
      moduleName: moduleMeta.module_name.trim(),
      moduleSlug: moduleMeta.module_slug || slugify(moduleMeta.module_name),
      transcriptPath,
      sources
    };
  }

  private async load(metadataFile: string): Promise<CourseMetadata> {
    let raw: string;
    try {
      raw = await readFile(metadataFile, "utf8");
    } catch (error) {
      const reason = isNotFound(error) ? "does not exist" : "could not be read";
      throw new ResolutionError(`Metadata file ${metadataFile} ${reason}.`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ResolutionError(`Metadata file ${metadataFile} is not valid JSON.`, { cause: error });
    }

    const parsed = courseMetadataSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const location = issue ? issue.path.map(String).join(".") : "";
      throw new ResolutionError(
        `Metadata file ${metadataFile} is malformed at "${location}": ${issue?.message ?? "invalid"}`,
        { cause: parsed.error }
      );
    }

    return parsed.data;
  }
}

function collectSources(moduleMeta: ModuleMetadata, baseDirectory: string): ModuleSource[] {
  const sources: ModuleSource[] = [];

  for (const lesson of moduleMeta.lessons) {
    const lessonSlug = lesson.lesson_slug || slugify(lesson.lesson_name);
    for (const item of lesson.items) {
      const itemSlug = item.transformed_slug || slugify(item.name);
      for (const content of item.content) {
        const contentType = toSourceType(content.content_type);
        if (!contentType || !content.path.toLowerCase().endsWith(SOURCE_EXTENSIONS[contentType])) {
          continue;
        }

        sources.push({
          filePath: path.resolve(baseDirectory, content.path),
          contentType,
          lessonName: lesson.lesson_name,
          lessonSlug,
          itemName: item.name,
          itemSlug
        });
      }
    }
  }

  return sources;
}

function toSourceType(value: string): SourceContentType | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "transcript" || normalized === "extra-notes") {
    return normalized;
  }
  return undefined;
}

function resolveTranscriptPath(
  moduleMeta: ModuleMetadata,
  sources: ModuleSource[],
  baseDirectory: string
): string | undefined {
  if (moduleMeta.transcript_path?.trim()) {
    return path.resolve(baseDirectory, moduleMeta.transcript_path.trim());
  }

  const firstTranscript = sources.find((source) => source.contentType === "transcript");
  return firstTranscript ? path.dirname(firstTranscript.filePath) : undefined;
}
