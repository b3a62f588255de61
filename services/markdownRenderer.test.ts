import { describe, it, expect } from "vitest";
import {
  extractMath,
  renderMarkdownForBrowser,
  renderMarkdownForEmail,
  renderMathFallback,
} from "./markdownRenderer";

describe("extractMath", () => {
  it("lifts display math before inline math", () => {
    const { text, spans } = extractMath("a $$x$$ b $y$");

    expect(text).toBe("a MATHPLACEHOLDER0END b MATHPLACEHOLDER1END");
    expect(spans.map(({ latex, display }) => ({ latex, display }))).toEqual([
      { latex: "x", display: true },
      { latex: "y", display: false },
    ]);
  });
});

describe("renderMarkdownForBrowser", () => {
  it("keeps LaTeX literal and adds a unicode reading", () => {
    expect(renderMarkdownForBrowser("hello $x^2$")).toBe(
      '<p>hello <span class="math-inline" data-unicode="x²">$x^2$</span></p>\n'
    );
  });

  it("escapes display math and keeps its double dollars", () => {
    expect(renderMarkdownForBrowser("$$a<b$$")).toBe(
      '<p><span class="math-display" data-unicode="a&lt;b">$$a&lt;b$$</span></p>\n'
    );
  });

  it("restores every span when there are more than ten", () => {
    const body = Array.from({ length: 11 }, (_, i) => `$v${i}$`).join(" ");
    const html = renderMarkdownForBrowser(body);

    expect(html).toContain('data-unicode="v1">$v1$</span>');
    expect(html).toContain('data-unicode="v10">$v10$</span>');
    expect(html).not.toContain("MATHPLACEHOLDER");
  });

  it("renders regular markdown", () => {
    expect(renderMarkdownForBrowser("# Title")).toBe("<h1>Title</h1>\n");
  });
});

describe("renderMarkdownForEmail", () => {
  it("hands each span to the renderer in extraction order", async () => {
    const html = await renderMarkdownForEmail(
      "$a$ and $$b$$",
      async (span, index) => `[${index}:${span.latex}]`
    );
    expect(html).toBe("<p>[1:a] and [0:b]</p>\n");
  });
});

describe("renderMathFallback", () => {
  it("wraps the transliteration in a serif span", () => {
    expect(renderMathFallback({ latex: "x^2", display: false })).toBe(
      `<span style="font-family: 'Times New Roman', serif; font-size: 1.1em;">x²</span>`
    );
  });

  it("centres display math", () => {
    expect(renderMathFallback({ latex: "\\pi", display: true })).toBe(
      `<div style="text-align: center; margin: 15px 0; font-family: 'Times New Roman', serif; font-size: 1.2em;">π</div>`
    );
  });
});
