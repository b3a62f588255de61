import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import request from "supertest";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createApp } from "../app";
import { ReportService } from "../services/reportService";
import { LocalStorageBackend } from "../storage/localStorage";
import { FIXED_NOW, testSettings } from "../test/helpers";

describe("report routes", () => {
  let root: string;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    root = await mkdtemp(path.join(os.tmpdir(), "report-routes-"));
    const service = new ReportService({
      storage: new LocalStorageBackend(root),
      settings: testSettings,
      clock: () => FIXED_NOW,
      generateTag: () => "AB12",
    });
    app = createApp(service, { bodyLimit: "1mb", rateLimitPerMinute: 1000 });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  const submit = () =>
    request(app).post("/api/reports").send({ agentName: "bot1", title: "T", body: "hello $x^2$" });

  it("reports health and mode", async () => {
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok", mode: "local" });
  });

  it("accepts a report", async () => {
    const res = await submit();

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      tag: "AB12",
      locator: path.join(root, "bot1", "2025-06-26_14-03-09-000_AB12", "index.html"),
      attachmentCount: 0,
      embeddedCount: 0,
      warnings: [],
    });
  });

  it("rejects a submission without a title", async () => {
    const res = await request(app).post("/api/reports").send({ agentName: "bot1", body: "x" });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Invalid report submission");
    expect(res.body.issues).toContain("title: Required");
  });

  it("rejects a submission with both content sources", async () => {
    const res = await request(app)
      .post("/api/reports")
      .send({ agentName: "bot1", title: "T", body: "x", bodyFilePath: "/tmp/x.md" });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Provide exactly one of body or bodyFilePath.");
  });

  it("rejects malformed JSON", async () => {
    const res = await request(app)
      .post("/api/reports")
      .set("Content-Type", "application/json")
      .send("{not json");

    expect(res.status).toBe(400);
  });

  it("lists stored reports", async () => {
    await submit();

    const res = await request(app).get("/api/reports").query({ agentName: "bot1", hour: "14" });

    expect(res.status).toBe(200);
    expect(res.body.count).toBe(1);
    expect(res.body.total).toBe(1);
    expect(res.body.reports[0]).toMatchObject({ tag: "AB12", agentName: "bot1", minute: 3 });
  });

  it("rejects an out-of-range hour", async () => {
    const res = await request(app).get("/api/reports").query({ hour: "25" });
    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Invalid report query");
  });

  it("looks a report up by tag, case-insensitively", async () => {
    await submit();

    const res = await request(app).get("/api/reports/lookup").query({ tag: "ab12" });

    expect(res.status).toBe(200);
    expect(res.body.report.title).toBe("T");
    expect(res.body.locator).toBe(path.join(root, "bot1", "2025-06-26_14-03-09-000_AB12", "index.html"));
  });

  it("looks a report up by agent and minute", async () => {
    await submit();

    const res = await request(app)
      .get("/api/reports/lookup")
      .query({ agentName: "bot1", date: "2025-06-26", hour: "14", minute: "3" });

    expect(res.status).toBe(200);
    expect(res.body.report.tag).toBe("AB12");
  });

  it("answers 404 for an unknown tag", async () => {
    const res = await request(app).get("/api/reports/lookup").query({ tag: "ZZZZ" });
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ message: "Report not found" });
  });

  it("needs a tag or the full agent and time criteria", async () => {
    const res = await request(app).get("/api/reports/lookup").query({ agentName: "bot1" });

    expect(res.status).toBe(400);
    expect(res.body.issues).toEqual([
      "Provide either a tag OR agentName with date, hour, and minute.",
    ]);
  });
});
