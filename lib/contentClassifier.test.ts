import { describe, it, expect } from "vitest";
import { classifyFile, contentTypeFor, fileExtension, isImage } from "./contentClassifier";

describe("classifyFile", () => {
  it("recognises raster images case-insensitively", () => {
    expect(classifyFile("chart.PNG")).toBe("image");
    expect(classifyFile("photo.jpeg")).toBe("image");
    expect(classifyFile("anim.webp")).toBe("image");
    expect(isImage("diagram.svg")).toBe(false);
  });

  it("recognises source, config and log files as text", () => {
    expect(classifyFile("notes.md")).toBe("text");
    expect(classifyFile("run.log")).toBe("text");
    expect(classifyFile("main.rs")).toBe("text");
    expect(classifyFile(".env")).toBe("text");
  });

  it("treats everything else as other", () => {
    expect(classifyFile("archive.tar.gz")).toBe("other");
    expect(classifyFile("Makefile")).toBe("other");
    expect(classifyFile("model.bin")).toBe("other");
  });
});

describe("fileExtension", () => {
  it("takes the last extension, lower-cased", () => {
    expect(fileExtension("report.Final.TXT")).toBe(".txt");
    expect(fileExtension("README")).toBe("");
  });
});

describe("contentTypeFor", () => {
  it("uses the registered mime type", () => {
    expect(contentTypeFor("chart.png")).toBe("image/png");
    expect(contentTypeFor("data.json")).toBe("application/json");
    expect(contentTypeFor("notes.md")).toBe("text/markdown");
  });

  it("serves text files whose registered type is not text as text/plain", () => {
    expect(contentTypeFor("script.ts")).toBe("text/plain");
  });

  it("falls back to octet-stream for unknown extensions", () => {
    expect(contentTypeFor("blob.zzz")).toBe("application/octet-stream");
  });
});
