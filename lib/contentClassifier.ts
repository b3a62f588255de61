import { lookup } from "mime-types";

export type FileRole = "image" | "text" | "other";

const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".gif", ".webp"]);

// Files eligible for the combined text attachment
const TEXT_EXTENSIONS = new Set([
  ".txt", ".csv", ".yaml", ".yml", ".json", ".py", ".sh", ".r",
  ".js", ".ts", ".jsx", ".tsx", ".md", ".xml", ".html", ".css",
  ".cpp", ".c", ".h", ".hpp", ".java", ".go", ".rs", ".rb",
  ".php", ".sql", ".conf", ".ini", ".toml", ".env", ".log",
]);

// Last ".xxx" of the name, so dotfiles such as ".env" keep their extension
export function fileExtension(filename: string): string {
  const match = filename.match(/\.[^./\\]+$/);
  return match ? match[0].toLowerCase() : "";
}

export function classifyFile(filename: string): FileRole {
  const ext = fileExtension(filename);
  if (IMAGE_EXTENSIONS.has(ext)) return "image";
  if (TEXT_EXTENSIONS.has(ext)) return "text";
  return "other";
}

export function isImage(filename: string): boolean {
  return classifyFile(filename) === "image";
}

export function contentTypeFor(filename: string): string {
  const mimeType = lookup(filename) || "application/octet-stream";
  // ".ts" maps to video/mp2t and ".sh" to application/x-sh; text files are served as text
  if (
    classifyFile(filename) === "text" &&
    !mimeType.startsWith("text/") &&
    mimeType !== "application/json"
  ) {
    return "text/plain";
  }
  return mimeType;
}
