import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config/reportConfig";
import { createReportService } from "./services/reportServiceFactory";

dotenv.config();

// Missing remote credentials stop the process here, before anything listens
const config = loadConfig();
const { service, storage, notifier } = createReportService(config);

console.log(`Report mode: ${service.mode.toUpperCase()} (${storage.describe()})`);

if (notifier) {
  console.log(`Report emails: ${notifier.describe()}`);
  // Test SMTP connection on startup (non-blocking)
  notifier.verify().catch((err) => {
    console.error("SMTP test error:", err);
  });
}

const app = createApp(service, config);

process.on("unhandledRejection", (reason, promise) => {
  console.error("Unhandled Rejection at:", promise, "reason:", reason);
});

app.listen(config.port, () => {
  console.log(`Report service is running on port ${config.port}`);
});
