import { readdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { makeTempDir, writeTextFiles } from "../../../__tests__/fixtures.js";
import { AssemblyError } from "../../../domain/errors.js";
import { DocumentAssemblyStage, loadDocumentTemplates, renderHeader } from "../documentAssemblyStage.js";

const HEADER = "\\title{TEMPLATE_MODULE_NAME}\n\\author{TEMPLATE_COURSE_NAME}\n\\date{TEMPLATE_LESSON_CODE}\n\\begin{document}\n\n\n";
const FOOTER = "\\end{document}\n";
const OPTIONS = { course: "R&D 101", moduleName: "Costs_and_Benefits", topicNumber: 4 };

describe("DocumentAssemblyStage", () => {
  let root: string;
  let sectionsDir: string;
  let mergedDocPath: string;
  const stage = new DocumentAssemblyStage();

  beforeEach(async () => {
    root = await makeTempDir();
    sectionsDir = path.join(root, "sections");
    mergedDocPath = path.join(root, "out", "Lecture Notes", "Topic 4", "doc.tex");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("concatenates header, ordered fragments and footer", async () => {
    await writeTextFiles(sectionsDir, {
      "001-b.tex": "  B body  \n",
      "000-a.tex": "\\section{A}\nA body\n",
      "notes.txt": "ignored",
      "readme.tex": "ignored"
    });

    const result = await stage.assemble(sectionsDir, HEADER, FOOTER, mergedDocPath, OPTIONS);

    expect(result).toEqual({ sectionsIncluded: 2, sectionsExpected: null, mergedDocPath });
    expect(await readFile(mergedDocPath, "utf8")).toBe(
      "\\title{Costs\\_and\\_Benefits}\n\\author{R\\&D 101}\n\\date{Topic 4}\n\\begin{document}\n\n" +
        "\\section{A}\nA body\n\nB body\n\n\\end{document}\n"
    );
  });

  it("orders fragments by their numeric key", async () => {
    await writeTextFiles(sectionsDir, { "100-late.tex": "late", "99-early.tex": "early" });

    await stage.assemble(sectionsDir, "H", FOOTER, mergedDocPath, OPTIONS);

    expect(await readFile(mergedDocPath, "utf8")).toBe("H\n\nearly\n\nlate\n\n\\end{document}\n");
  });

  it("reports included against expected sections", async () => {
    await writeTextFiles(sectionsDir, { "000-a.tex": "a", "002-c.tex": "c" });

    const result = await stage.assemble(sectionsDir, HEADER, FOOTER, mergedDocPath, {
      ...OPTIONS,
      expectedSections: 3
    });

    expect(result.sectionsIncluded).toBe(2);
    expect(result.sectionsExpected).toBe(3);
  });

  it("warns about stale fragments beyond the outline and repeated order keys", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    await writeTextFiles(sectionsDir, {
      "000-introduction.tex": "intro",
      "001-convergence.tex": "old",
      "001-gradient-descent.tex": "new"
    });

    const result = await stage.assemble(sectionsDir, "H", FOOTER, mergedDocPath, { ...OPTIONS, expectedSections: 2 });

    expect(result.sectionsIncluded).toBe(3);
    expect(warn.mock.calls.map((call) => call[0])).toEqual([
      "[assemble] Included 3 of 2 expected section(s).",
      "[assemble] Order key 1 is shared by 001-convergence.tex, 001-gradient-descent.tex."
    ]);
    expect(await readFile(mergedDocPath, "utf8")).toBe("H\n\nintro\n\nold\n\nnew\n\n\\end{document}\n");
  });

  it("fails when there is nothing to assemble", async () => {
    await writeTextFiles(sectionsDir, { "notes.txt": "not a fragment" });

    await expect(stage.assemble(sectionsDir, HEADER, FOOTER, mergedDocPath, OPTIONS)).rejects.toBeInstanceOf(
      AssemblyError
    );
    await expect(
      stage.assemble(path.join(root, "missing"), HEADER, FOOTER, mergedDocPath, OPTIONS)
    ).rejects.toBeInstanceOf(AssemblyError);
  });

  it("replaces an existing document wholesale and leaves no temp files", async () => {
    await writeTextFiles(path.dirname(mergedDocPath), { "doc.tex": "stale content that is much longer than the new one" });
    await writeTextFiles(sectionsDir, { "000-a.tex": "a" });

    await stage.assemble(sectionsDir, "H", FOOTER, mergedDocPath, OPTIONS);

    expect(await readFile(mergedDocPath, "utf8")).toBe("H\n\na\n\n\\end{document}\n");
    expect(await readdir(path.dirname(mergedDocPath))).toEqual(["doc.tex"]);
  });
});

describe("document templates", () => {
  it("fills every placeholder occurrence with escaped values", () => {
    expect(renderHeader("TEMPLATE_COURSE_NAME / TEMPLATE_COURSE_NAME", OPTIONS)).toBe("R\\&D 101 / R\\&D 101");
  });

  it("loads header and footer from a directory", async () => {
    const root = await makeTempDir();
    try {
      await writeFile(path.join(root, "header.tex"), "HEAD", "utf8");
      await writeFile(path.join(root, "footer.tex"), FOOTER, "utf8");

      expect(await loadDocumentTemplates(root)).toEqual({ header: "HEAD", footer: FOOTER });
      await rm(path.join(root, "footer.tex"));
      await expect(loadDocumentTemplates(root)).rejects.toBeInstanceOf(AssemblyError);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});
