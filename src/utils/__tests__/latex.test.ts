import { describe, expect, it } from "vitest";

import { ensureHeading, escapeLatex, inspectFragment, sanitizeLatex } from "../latex.js";

describe("escapeLatex", () => {
  it("escapes LaTeX special characters", () => {
    expect(escapeLatex("50% of $x_1$ & {y}")).toBe("50\\% of \\$x\\_1\\$ \\& \\{y\\}");
    expect(escapeLatex("a\\b ~ c^2 #1")).toBe(
      "a\\textbackslash{}b \\textasciitilde{} c\\textasciicircum{}2 \\#1"
    );
  });
});

describe("sanitizeLatex", () => {
  it("strips code fences and document scaffolding", () => {
    const raw = "```latex\n\\documentclass{article}\n\\begin{document}\nLine one\\n\\n2 items\n\\end{document}\n```";

    expect(sanitizeLatex(raw)).toBe("Line one\n\n2 items");
  });

  it("repairs commands that lost their leading backslash", () => {
    expect(sanitizeLatex("extbf{Key} idea imes two")).toBe("\\textbf{Key} idea \\times two");
  });

  it("escapes underscores only outside math", () => {
    expect(sanitizeLatex("snake_case and $x_1$\nplain_word")).toBe("snake_case and $x_1$\nplain\\_word");
  });

  it("escapes ampersands only outside environments", () => {
    const raw = "Q&A\n\\begin{tabular}{ll}\na & b\\\\\n\\end{tabular}";

    expect(sanitizeLatex(raw)).toBe("Q\\&A\n\\begin{tabular}{ll}\na & b\\\\\n\\end{tabular}");
  });

  it("collapses runs of blank lines", () => {
    expect(sanitizeLatex("one\n\n\n\ntwo")).toBe("one\n\ntwo");
  });
});

describe("ensureHeading", () => {
  it("prepends a heading of the entry's kind when missing", () => {
    expect(ensureHeading("Body", "subsection", "Cost & Loss")).toBe("\\subsection{Cost \\& Loss}\nBody");
  });

  it("keeps an existing heading", () => {
    expect(ensureHeading("\\section{Overview}\nBody", "section", "Introduction")).toBe("\\section{Overview}\nBody");
  });
});

describe("inspectFragment", () => {
  it("accepts a well-formed fragment", () => {
    expect(inspectFragment("\\section{A}\n\\begin{itemize}\n\\item $x$ and \\{\n\\end{itemize}")).toEqual([]);
  });

  it("reports structural problems", () => {
    expect(inspectFragment("\\section{A}\n$x")).toEqual(["unpaired $ in math mode"]);
    expect(inspectFragment("\\begin{itemize}\n\\item {a")).toEqual([
      "unbalanced braces",
      "unclosed environments: itemize"
    ]);
    expect(inspectFragment("\\end{align}")).toEqual(["\\end{align} without matching \\begin"]);
  });
});
