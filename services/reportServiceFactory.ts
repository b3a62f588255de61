import type { ReportServiceConfig } from "../config/reportConfig";
import { createS3Client } from "../config/s3";
import { LocalStorageBackend } from "../storage/localStorage";
import { S3ObjectStore } from "../storage/objectStore";
import { RemoteStorageBackend } from "../storage/remoteStorage";
import type { StorageBackend } from "../storage/types";
import { ReportNotifier, createSmtpTransport } from "./emailService";
import { CodecogsLatexRenderer } from "./mathImages";
import { ReportService } from "./reportService";

export interface ReportRuntime {
  service: ReportService;
  storage: StorageBackend;
  // Present in remote mode
  notifier?: ReportNotifier;
}

// The only place that branches on the storage mode
export function createReportService(config: ReportServiceConfig): ReportRuntime {
  if (config.mode === "local") {
    const storage = new LocalStorageBackend(config.localFolder);
    return { service: new ReportService({ storage, settings: config }), storage };
  }

  const storage = new RemoteStorageBackend(
    new S3ObjectStore(createS3Client(config.s3), config.s3.bucket),
    { urlExpirationSeconds: config.s3.urlExpirationSeconds }
  );
  const notifier = new ReportNotifier(createSmtpTransport(config.smtp), config.email);
  const mathRenderer = new CodecogsLatexRenderer({
    renderUrl: config.math.renderUrl,
    timeoutMs: config.math.timeoutMs,
  });

  return {
    service: new ReportService({
      storage,
      settings: config,
      notification: { notifier, mathRenderer },
    }),
    storage,
    notifier,
  };
}
