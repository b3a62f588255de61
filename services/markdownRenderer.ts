import MarkdownIt from "markdown-it";
import { transliterateLatex } from "../lib/mathText";

const md = new MarkdownIt({
  html: true,
  linkify: true,
  typographer: true,
});

export const escapeHtml = (value: string): string => md.utils.escapeHtml(value);

export interface MathSpan {
  latex: string;
  display: boolean;
  placeholder: string;
}

export interface ExtractedMath {
  text: string;
  spans: MathSpan[];
}

// Closing marker keeps MATHPLACEHOLDER1END from matching inside MATHPLACEHOLDER10END
const placeholderFor = (index: number) => `MATHPLACEHOLDER${index}END`;

/**
 * Lifts `$$...$$` and then `$...$` spans out of the markdown so the
 * markdown pass cannot mangle them.
 */
export function extractMath(markdown: string): ExtractedMath {
  const spans: MathSpan[] = [];

  const take = (latex: string, display: boolean) => {
    const placeholder = placeholderFor(spans.length);
    spans.push({ latex, display, placeholder });
    return placeholder;
  };

  const text = markdown
    .replace(/\$\$([^$]+)\$\$/g, (_match, latex: string) => take(latex, true))
    .replace(/\$([^$\n]+)\$/g, (_match, latex: string) => take(latex, false));

  return { text, spans };
}

function restoreMath(html: string, spans: MathSpan[], replacements: string[]): string {
  let restored = html;
  spans.forEach((span, index) => {
    // Function replacer: "$$" in the replacement must stay literal
    restored = restored.replace(span.placeholder, () => replacements[index]);
  });
  return restored;
}

/**
 * HTML for the stored artifact. LaTeX stays literal for MathJax to typeset in
 * the browser; `data-unicode` carries a plain-text reading of each span.
 */
export function renderMarkdownForBrowser(markdown: string): string {
  const { text, spans } = extractMath(markdown);
  const replacements = spans.map((span) => {
    const delimiter = span.display ? "$$" : "$";
    const className = span.display ? "math-display" : "math-inline";
    return `<span class="${className}" data-unicode="${escapeHtml(
      transliterateLatex(span.latex)
    )}">${escapeHtml(`${delimiter}${span.latex}${delimiter}`)}</span>`;
  });
  return restoreMath(md.render(text), spans, replacements);
}

export type MathSpanRenderer = (span: MathSpan, index: number) => Promise<string>;

/**
 * HTML for mail clients, which run no scripts. Each span is rendered by
 * `renderSpan`, one after the other, so a failing span only affects itself.
 */
export async function renderMarkdownForEmail(
  markdown: string,
  renderSpan: MathSpanRenderer
): Promise<string> {
  const { text, spans } = extractMath(markdown);
  const replacements: string[] = [];
  for (const [index, span] of spans.entries()) {
    replacements.push(await renderSpan(span, index));
  }
  return restoreMath(md.render(text), spans, replacements);
}

export function renderMathFallback(span: Pick<MathSpan, "latex" | "display">): string {
  const unicode = escapeHtml(transliterateLatex(span.latex));
  if (span.display) {
    return `<div style="text-align: center; margin: 15px 0; font-family: 'Times New Roman', serif; font-size: 1.2em;">${unicode}</div>`;
  }
  return `<span style="font-family: 'Times New Roman', serif; font-size: 1.1em;">${unicode}</span>`;
}
