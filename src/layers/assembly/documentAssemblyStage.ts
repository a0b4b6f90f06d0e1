import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import { AssemblyError } from "../../domain/errors.js";
import { AssembledResult } from "../../domain/models.js";
import { isNotFound, writeFileAtomic } from "../../utils/files.js";
import { escapeLatex } from "../../utils/latex.js";
import { parseFragmentOrder } from "../paths/artifactPathBuilder.js";

export interface DocumentTemplates {
  header: string;
  footer: string;
}

export interface AssemblyOptions {
  course: string;
  moduleName: string;
  topicNumber: number;
  expectedSections?: number;
}

export async function loadDocumentTemplates(templatesDirectory: string): Promise<DocumentTemplates> {
  const [header, footer] = await Promise.all([
    readTemplate(path.join(templatesDirectory, "header.tex")),
    readTemplate(path.join(templatesDirectory, "footer.tex"))
  ]);
  return { header, footer };
}

async function readTemplate(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    throw new AssemblyError(`Document template ${filePath} could not be read.`, { cause: error });
  }
}

export function renderHeader(header: string, options: AssemblyOptions): string {
  return header
    .replaceAll("TEMPLATE_COURSE_NAME", escapeLatex(options.course))
    .replaceAll("TEMPLATE_MODULE_NAME", escapeLatex(options.moduleName))
    .replaceAll("TEMPLATE_LESSON_CODE", escapeLatex(`Topic ${options.topicNumber}`));
}

interface FragmentFile {
  name: string;
  order: number;
}

function groupByOrder(files: FragmentFile[]): Map<number, string[]> {
  const groups = new Map<number, string[]>();
  for (const file of files) {
    groups.set(file.order, [...(groups.get(file.order) ?? []), file.name]);
  }
  return groups;
}

export class DocumentAssemblyStage {
  async assemble(
    sectionsDir: string,
    headerTemplate: string,
    footerTemplate: string,
    mergedDocPath: string,
    options: AssemblyOptions
  ): Promise<AssembledResult> {
    const fragmentFiles = await this.listFragments(sectionsDir);
    if (fragmentFiles.length === 0) {
      throw new AssemblyError(`No section fragments found in ${sectionsDir}; nothing to assemble.`);
    }

    const fragments = await Promise.all(
      fragmentFiles.map((file) => readFile(path.join(sectionsDir, file.name), "utf8"))
    );
    const body = fragments.map((fragment) => `${fragment.trim()}\n\n`).join("");
    const document = `${renderHeader(headerTemplate, options).trimEnd()}\n\n${body}${footerTemplate}`;

    await writeFileAtomic(mergedDocPath, document);

    const expected = options.expectedSections ?? null;
    if (expected !== null && fragments.length !== expected) {
      console.warn(`[assemble] Included ${fragments.length} of ${expected} expected section(s).`);
    }
    for (const [order, names] of groupByOrder(fragmentFiles)) {
      if (names.length > 1) {
        console.warn(`[assemble] Order key ${order} is shared by ${names.join(", ")}.`);
      }
    }
    this.log(`Merged ${fragments.length} section(s) -> ${mergedDocPath}`);

    return { sectionsIncluded: fragments.length, sectionsExpected: expected, mergedDocPath };
  }

  private async listFragments(sectionsDir: string): Promise<FragmentFile[]> {
    let names: string[];
    try {
      names = await readdir(sectionsDir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new AssemblyError(`Sections directory ${sectionsDir} could not be read.`, { cause: error });
    }

    return names
      .map((name) => ({ name, order: parseFragmentOrder(name) }))
      .filter((entry): entry is FragmentFile => entry.order !== null)
      .sort((left, right) => left.order - right.order || left.name.localeCompare(right.name));
  }

  private log(message: string): void {
    console.log(`[assemble] ${message}`);
  }
}
