import path from "node:path";

import { ArtifactPaths, ModuleRef, OutlineEntry, VectorIndexHandle } from "../../domain/models.js";
import { slugify } from "../../utils/text.js";

const MAX_SEGMENT_LENGTH = 120;
const FRAGMENT_PATTERN = /^(\d+)-.*\.tex$/;

export function sanitizePathSegment(value: string): string {
  const cleaned = value
    .normalize("NFKC")
    .replace(/\s+/g, " ")
    .replace(/[\u0000-\u001f\u007f]/g, "")
    .replace(/[\\/:*?"<>|]/g, "-")
    .trim()
    .replace(/^\.+/, "")
    .replace(/[. ]+$/, "")
    .slice(0, MAX_SEGMENT_LENGTH)
    .trim();

  return cleaned || "untitled";
}

export function buildArtifactPaths(
  outputBase: string,
  course: string,
  moduleName: string,
  topicNumber: number
): ArtifactPaths {
  const courseSegment = sanitizePathSegment(course);
  const moduleSegment = sanitizePathSegment(moduleName);
  const topicSegment = `Topic ${topicNumber}`;
  // Module names can sanitize alike; the topic segment keeps their artifacts apart.
  const moduleDir = path.join(path.resolve(outputBase), courseSegment, topicSegment, moduleSegment);

  return {
    moduleDir,
    indexDir: path.join(moduleDir, "index"),
    sectionsDir: path.join(moduleDir, "sections"),
    outlinePath: path.join(moduleDir, "outline.json"),
    runsDir: path.join(moduleDir, "runs"),
    mergedDocPath: path.join(
      path.resolve(outputBase),
      courseSegment,
      "Lecture Notes",
      topicSegment,
      moduleSegment,
      `${moduleSegment}.tex`
    )
  };
}

export function sectionIdFor(entry: Pick<OutlineEntry, "order" | "title">): string {
  return `${String(entry.order).padStart(3, "0")}-${slugify(entry.title) || "section"}`;
}

export function fragmentFileName(entry: Pick<OutlineEntry, "order" | "title">): string {
  return `${sectionIdFor(entry)}.tex`;
}

/** Order key encoded in a fragment file name, or null for anything else. */
export function parseFragmentOrder(fileName: string): number | null {
  const match = FRAGMENT_PATTERN.exec(fileName);
  return match ? Number(match[1]) : null;
}

export class ArtifactPathBuilder {
  constructor(private readonly outputBase: string) {}

  forModule(moduleRef: ModuleRef): ArtifactPaths {
    return buildArtifactPaths(this.outputBase, moduleRef.course, moduleRef.moduleName, moduleRef.topicNumber);
  }

  indexHandle(moduleRef: ModuleRef, tableName: string): VectorIndexHandle {
    return { tableName, directory: this.forModule(moduleRef).indexDir };
  }
}
