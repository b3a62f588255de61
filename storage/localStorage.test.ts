import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { LocalStorageBackend } from "./localStorage";

vi.mock("fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs/promises")>();
  return { ...actual, readdir: vi.fn(actual.readdir) };
});

describe("LocalStorageBackend", () => {
  let root: string;
  let storage: LocalStorageBackend;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "reports-"));
    storage = new LocalStorageBackend(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes under the root and returns the absolute path", async () => {
    const locator = await storage.persist("bot1/2025-06-26_14-03-09-000_AB12/a.txt", Buffer.from("alpha"), "text/plain");

    expect(locator).toBe(path.join(root, "bot1", "2025-06-26_14-03-09-000_AB12", "a.txt"));
    expect(await readFile(locator, "utf8")).toBe("alpha");
    expect((await storage.fetch("bot1/2025-06-26_14-03-09-000_AB12/a.txt")).toString()).toBe("alpha");
    expect(await storage.locate("bot1/2025-06-26_14-03-09-000_AB12/a.txt")).toBe(locator);
  });

  it("lists keys in reverse name order so dated folders come newest first", async () => {
    await storage.persist("bot2/x/metadata.json", Buffer.from("{}"), "application/json");
    await storage.persist("bot1/2025-06-01_10-00-00-000_AAAA/metadata.json", Buffer.from("{}"), "application/json");
    await storage.persist("bot1/2025-06-02_10-00-00-000_BBBB/metadata.json", Buffer.from("{}"), "application/json");
    await storage.persist("bot1/2025-06-02_10-00-00-000_BBBB/index.html", Buffer.from("<p></p>"), "text/html");

    const all = await storage.list("");
    expect(all.map((o) => o.key)).toEqual([
      "bot2/x/metadata.json",
      "bot1/2025-06-02_10-00-00-000_BBBB/metadata.json",
      "bot1/2025-06-02_10-00-00-000_BBBB/index.html",
      "bot1/2025-06-01_10-00-00-000_AAAA/metadata.json",
    ]);

    const bot1 = await storage.list("bot1/", { maxObjects: 2 });
    expect(bot1.map((o) => o.key)).toEqual([
      "bot1/2025-06-02_10-00-00-000_BBBB/metadata.json",
      "bot1/2025-06-02_10-00-00-000_BBBB/index.html",
    ]);
    expect(bot1[1].sizeBytes).toBe(7);
  });

  it("walks only the folder the prefix names and stops at the ceiling", async () => {
    await storage.persist("bot1/a/one.txt", Buffer.from("1"), "text/plain");
    await storage.persist("bot1/b/two.txt", Buffer.from("2"), "text/plain");
    await storage.persist("bot1/c/three.txt", Buffer.from("3"), "text/plain");
    await storage.persist("bot10/d/four.txt", Buffer.from("4"), "text/plain");
    vi.mocked(readdir).mockClear();

    const bot1 = await storage.list("bot1/", { maxObjects: 1 });

    expect(bot1.map((o) => o.key)).toEqual(["bot1/c/three.txt"]);
    const visited = vi.mocked(readdir).mock.calls.map(([dir]) => String(dir));
    expect(visited).toEqual([path.join(root, "bot1"), path.join(root, "bot1", "c")]);
  });

  it("matches a partial last segment of the prefix", async () => {
    await storage.persist("bot1/2025-06-01_x/metadata.json", Buffer.from("{}"), "application/json");
    await storage.persist("bot1/2025-07-01_y/metadata.json", Buffer.from("{}"), "application/json");

    const june = await storage.list("bot1/2025-06");
    expect(june.map((o) => o.key)).toEqual(["bot1/2025-06-01_x/metadata.json"]);
  });

  it("lists nothing for a ceiling of zero", async () => {
    await storage.persist("bot1/a/one.txt", Buffer.from("1"), "text/plain");
    expect(await storage.list("", { maxObjects: 0 })).toEqual([]);
  });

  it("lists nothing when the folder does not exist yet", async () => {
    const fresh = new LocalStorageBackend(path.join(root, "missing"));
    expect(await fresh.list("")).toEqual([]);
  });

  it("rejects keys that leave the root", async () => {
    await expect(storage.persist("../escape.txt", Buffer.from("x"), "text/plain")).rejects.toThrow(
      "Storage key escapes the report folder"
    );
  });

  it("describes itself by folder", () => {
    expect(storage.describe()).toBe(`local folder ${path.resolve(root)}`);
    expect(storage.mode).toBe("local");
  });
});
