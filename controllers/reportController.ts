import { Request, Response } from "express";
import { ReportValidationError } from "../lib/errors";
import { formatIssues, getReportSchema, listReportsSchema } from "../lib/reportSchemas";
import type { ReportService } from "../services/reportService";

type ReportOperations = Pick<ReportService, "submit" | "list" | "get">;

export const createReportController = (service: ReportOperations) => ({
  async submit(req: Request, res: Response) {
    try {
      const result = await service.submit(req.body);
      res.status(201).json(result);
    } catch (error) {
      if (error instanceof ReportValidationError) {
        return res.status(400).json({ message: error.message, code: error.code, issues: error.issues });
      }
      console.error("Error submitting report:", error);
      res.status(500).json({ message: "Error submitting report" });
    }
  },

  async list(req: Request, res: Response) {
    const parsed = listReportsSchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({
        message: "Invalid report query",
        issues: formatIssues(parsed.error),
      });
    }

    try {
      const { reports, total } = await service.list(parsed.data);
      res.json({ count: reports.length, total, reports });
    } catch (error) {
      console.error("Error listing reports:", error);
      res.status(500).json({ message: "Error listing reports" });
    }
  },

  async get(req: Request, res: Response) {
    const parsed = getReportSchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({
        message: "Invalid report lookup",
        issues: formatIssues(parsed.error),
      });
    }

    try {
      const found = await service.get(parsed.data);
      if (!found) {
        return res.status(404).json({ message: "Report not found" });
      }
      res.json(found);
    } catch (error) {
      if (error instanceof ReportValidationError) {
        return res.status(400).json({ message: error.message, issues: error.issues });
      }
      console.error("Error fetching report:", error);
      res.status(500).json({ message: "Error fetching report" });
    }
  },
});
