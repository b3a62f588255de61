import { isImage } from "./contentClassifier";

export const DEFAULT_MAX_EMBEDDED = 5;
// Below the 10 MiB ceiling of common mail transports once base64 adds ~33%
export const DEFAULT_MAX_EMBEDDED_BYTES = 8 * 1024 * 1024;

export const COMBINED_TEXT_FILENAME = "combined_text_attachments.txt";
export const DELIMITER = "=".repeat(80);

export interface SizedFile {
  filename: string;
  sizeBytes: number;
}

export interface EmbedSelection<T extends SizedFile> {
  embedded: T[];
  all: T[];
}

/**
 * Picks the images that travel inline with a notification. Files are taken
 * smallest first so the count budget fits as many as possible; everything not
 * picked is still stored and linked.
 */
export function selectEmbeddable<T extends SizedFile>(
  files: readonly T[],
  maxCount: number = DEFAULT_MAX_EMBEDDED,
  maxTotalBytes: number = DEFAULT_MAX_EMBEDDED_BYTES
): EmbedSelection<T> {
  const all = sortBySize(files);
  const embedded: T[] = [];
  let runningBytes = 0;

  for (const file of all) {
    if (!isImage(file.filename)) continue;
    if (embedded.length >= maxCount) break;
    if (runningBytes + file.sizeBytes > maxTotalBytes) continue;
    embedded.push(file);
    runningBytes += file.sizeBytes;
  }

  return { embedded, all };
}

// Stable ascending sort; equal sizes keep caller order
export function sortBySize<T extends SizedFile>(files: readonly T[]): T[] {
  return [...files].sort((a, b) => a.sizeBytes - b.sizeBytes);
}

export interface TextSource {
  filename: string;
  path: string;
  content: string;
}

/**
 * Concatenates text attachments into one file behind delimiter banners.
 * Returns null when fewer than two text files are present.
 */
export function buildCombinedTextAttachment(
  textFiles: readonly TextSource[],
  generatedAt: Date
): string | null {
  if (textFiles.length < 2) return null;

  let combined = `Combined Text Attachments\n${DELIMITER}\n`;
  combined += `Total files: ${textFiles.length}\n`;
  combined += `Generated at: ${generatedAt.toISOString()}\n`;
  combined += `${DELIMITER}\n\n`;

  for (const file of textFiles) {
    combined += `${DELIMITER}\n`;
    combined += `FILE: ${file.filename}\n`;
    combined += `PATH: ${file.path}\n`;
    combined += `${DELIMITER}\n`;
    combined += file.content;
    if (!file.content.endsWith("\n")) {
      combined += "\n";
    }
    combined += "\n";
  }

  combined += `${DELIMITER}\n`;
  combined += "END OF COMBINED ATTACHMENTS\n";
  combined += `${DELIMITER}\n`;
  return combined;
}
