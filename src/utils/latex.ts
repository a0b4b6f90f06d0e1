import { SectionKind } from "../domain/models.js";

const LATEX_ESCAPES: Record<string, string> = {
  "\\": "\\textbackslash{}",
  "&": "\\&",
  "%": "\\%",
  $: "\\$",
  "#": "\\#",
  _: "\\_",
  "{": "\\{",
  "}": "\\}",
  "~": "\\textasciitilde{}",
  "^": "\\textasciicircum{}"
};

const MATH_MARKERS = ["$", "\\(", "\\["];
const VERBATIM_COMMANDS = /\\(label|ref|url|href|includegraphics|input|cite)\{/;

export function escapeLatex(value: string): string {
  return value.replace(/[\\&%$#_{}~^]/g, (character) => LATEX_ESCAPES[character] ?? character);
}

/**
 * Cleans model output into a fragment that can sit between the shared
 * preamble and `\end{document}`.
 */
export function sanitizeLatex(raw: string): string {
  let text = raw.replace(/```+[ \t]*latex|```+/gi, "");

  text = text
    .replace(/\\n(?![a-zA-Z])/g, "\n")
    .replace(/\\t(?![a-zA-Z{])/g, " ")
    .replace(/\t/g, " ")
    .replace(/^[ ]*latex[ ]*$/gim, "")
    .replace(/^[ ]*\\documentclass.*$/gm, "")
    .replace(/^[ ]*\\(begin|end)\{document\}[ ]*$/gm, "");

  text = text
    .replace(/(?<![\\a-zA-Z])extbf\{/g, "\\textbf{")
    .replace(/(?<![\\a-zA-Z])extit\{/g, "\\textit{")
    .replace(/(?<!\\)textrightarrow/g, "\\rightarrow")
    .replace(/(?<![\\a-zA-Z])imes\b/g, "\\times");

  text = escapeUnderscoresOutsideMath(text);
  text = escapeAmpersandsOutsideEnvironments(text);

  return text.replace(/\n{3,}/g, "\n\n").trim();
}

function escapeUnderscoresOutsideMath(text: string): string {
  return text
    .split("\n")
    .map((line) => {
      if (MATH_MARKERS.some((marker) => line.includes(marker)) || VERBATIM_COMMANDS.test(line)) {
        return line;
      }
      return line.replace(/(?<!\\)_/g, "\\_");
    })
    .join("\n");
}

function escapeAmpersandsOutsideEnvironments(text: string): string {
  let depth = 0;
  return text
    .split("\n")
    .map((line) => {
      depth += countMatches(line, /\\begin\{/g);
      const escaped = depth === 0 ? line.replace(/(?<!\\)&/g, "\\&") : line;
      depth = Math.max(0, depth - countMatches(line, /\\end\{/g));
      return escaped;
    })
    .join("\n");
}

function countMatches(line: string, pattern: RegExp): number {
  return line.match(pattern)?.length ?? 0;
}

export function ensureHeading(content: string, kind: SectionKind, title: string): string {
  const pattern = kind === "section" ? /\\section\*?\{/ : /\\subsection\*?\{/;
  if (pattern.test(content)) {
    return content;
  }
  return `\\${kind}{${escapeLatex(title)}}\n${content}`.trim();
}

/**
 * Structural checks on a fragment. Returns human-readable issues; an empty
 * list means the fragment looks safe to merge.
 */
export function inspectFragment(content: string): string[] {
  const issues: string[] = [];

  let depth = 0;
  for (let index = 0; index < content.length; index += 1) {
    const character = content[index];
    if (content[index - 1] === "\\") {
      continue;
    }
    if (character === "{") {
      depth += 1;
    } else if (character === "}") {
      depth -= 1;
      if (depth < 0) {
        break;
      }
    }
  }
  if (depth !== 0) {
    issues.push("unbalanced braces");
  }

  if ((content.match(/(?<!\\)\$/g)?.length ?? 0) % 2 !== 0) {
    issues.push("unpaired $ in math mode");
  }

  const environments: string[] = [];
  for (const match of content.matchAll(/\\(begin|end)\{([^}]+)\}/g)) {
    const [, kind, name] = match;
    if (kind === "begin") {
      environments.push(name);
    } else if (environments[environments.length - 1] === name) {
      environments.pop();
    } else {
      issues.push(`\\end{${name}} without matching \\begin`);
      return issues;
    }
  }
  if (environments.length > 0) {
    issues.push(`unclosed environments: ${environments.join(", ")}`);
  }

  return issues;
}
