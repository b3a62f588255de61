import express from "express";
import { createReportController } from "../controllers/reportController";
import type { ReportService } from "../services/reportService";

export function createReportRouter(service: Pick<ReportService, "submit" | "list" | "get">) {
  const router = express.Router();
  const reportController = createReportController(service);

  // Submit a report
  router.post("/", reportController.submit);

  // Search stored reports
  router.get("/", reportController.list);

  // Single report by tag, or by agent + date/hour/minute
  router.get("/lookup", reportController.get);

  return router;
}
