export type SourceContentType = "transcript" | "extra-notes";

export interface ModuleSource {
  filePath: string;
  contentType: SourceContentType;
  lessonName: string;
  lessonSlug: string;
  itemName: string;
  itemSlug: string;
}

export interface ModuleRef {
  course: string;
  courseSlug: string;
  topicNumber: number;
  moduleName: string;
  moduleSlug: string;
  transcriptPath: string;
  sources: ModuleSource[];
}

export interface ArtifactPaths {
  moduleDir: string;
  indexDir: string;
  sectionsDir: string;
  outlinePath: string;
  runsDir: string;
  mergedDocPath: string;
}

export interface VectorIndexHandle {
  tableName: string;
  directory: string;
}

export interface PassageMetadata {
  courseSlug: string;
  moduleSlug: string;
  lessonName: string;
  lessonSlug: string;
  itemName: string;
  itemSlug: string;
  sourceFile: string;
  contentType: SourceContentType;
}

export interface TranscriptDocument {
  id: string;
  text: string;
  metadata: PassageMetadata;
}

export interface PassageDocument {
  id: string;
  documentId: string;
  text: string;
  metadata: PassageMetadata;
}

export interface RankedPassage {
  id: string;
  text: string;
  metadata: PassageMetadata;
  score: number;
}

export type SectionKind = "section" | "subsection";

export interface OutlineEntry {
  order: number;
  kind: SectionKind;
  title: string;
  query: string;
}

export interface ModuleOutline {
  moduleName: string;
  source: "file" | "agent" | "fallback";
  entries: OutlineEntry[];
}

export interface SectionFragment {
  sectionId: string;
  order: number;
  kind: SectionKind;
  title: string;
  content: string;
  sourceQuery: string;
  filePath: string;
}

export interface SectionFailure {
  sectionId: string;
  title: string;
  message: string;
}

export interface IngestResult {
  documentsIndexed: number;
  chunksIndexed: number;
  skipped: boolean;
}

export interface GenerationResult {
  fragments: SectionFragment[];
  generatedIds: string[];
  reusedIds: string[];
  failures: SectionFailure[];
  failedSectionIds: string[];
}

export interface AssembledResult {
  sectionsIncluded: number;
  sectionsExpected: number | null;
  mergedDocPath: string;
}
