import axios, { type AxiosInstance } from "axios";
import { errorMessage } from "../lib/errors";
import type { StorageBackend } from "../storage/types";
import {
  escapeHtml,
  renderMathFallback,
  type MathSpan,
  type MathSpanRenderer,
} from "./markdownRenderer";

export interface LatexImageRenderer {
  render(latex: string, display: boolean): Promise<Buffer>;
}

export interface CodecogsOptions {
  renderUrl: string;
  timeoutMs: number;
  dpi?: number;
}

// PNG over SVG: mail clients display PNG reliably
export class CodecogsLatexRenderer implements LatexImageRenderer {
  constructor(
    private readonly options: CodecogsOptions,
    private readonly http: AxiosInstance = axios
  ) {}

  imageUrl(latex: string, display: boolean): string {
    const dpi = this.options.dpi ?? 150;
    const size = display ? "\\large" : "\\normalsize";
    return `${this.options.renderUrl}?\\dpi{${dpi}}\\bg{white}${size}{${encodeURIComponent(latex)}}`;
  }

  async render(latex: string, display: boolean): Promise<Buffer> {
    // Non-2xx responses reject through axios' default validateStatus
    const response = await this.http.get<ArrayBuffer>(this.imageUrl(latex, display), {
      responseType: "arraybuffer",
      timeout: this.options.timeoutMs,
    });
    return Buffer.from(response.data);
  }
}

export function mathImageFilename(index: number): string {
  return `math_${index}.png`;
}

/**
 * Span renderer for the notification body: the image is stored beside the
 * report and referenced by its locator. Any failure falls back to a Unicode
 * transliteration of that one expression.
 */
export function createEmailMathRenderer(
  renderer: LatexImageRenderer,
  storage: StorageBackend,
  reportFolder: string
): MathSpanRenderer {
  return async (span: MathSpan, index: number) => {
    try {
      const image = await renderer.render(span.latex, span.display);
      const locator = await storage.persist(
        `${reportFolder}/${mathImageFilename(index)}`,
        image,
        "image/png"
      );
      const alt = escapeHtml(span.latex);
      if (span.display) {
        return `<div style="text-align: center; margin: 15px 0;"><img src="${escapeHtml(locator)}" alt="${alt}" style="max-width: 100%; height: auto;"></div>`;
      }
      return `<img src="${escapeHtml(locator)}" alt="${alt}" style="vertical-align: middle; height: 1.2em;">`;
    } catch (error) {
      console.warn(`Math rendering fell back to text for expression ${index}:`, errorMessage(error));
      return renderMathFallback(span);
    }
  };
}
