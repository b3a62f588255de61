import { readFile, writeFile } from "fs/promises";
import path from "path";
import {
  COMBINED_TEXT_FILENAME,
  buildCombinedTextAttachment,
  selectEmbeddable,
  sortBySize,
} from "../lib/attachmentBudget";
import { classifyFile, contentTypeFor, type FileRole } from "../lib/contentClassifier";
import { ERROR_CODES, ReportValidationError, errorMessage } from "../lib/errors";
import {
  formatIssues,
  submitReportSchema,
  type ReportMetadata,
  type SubmitReportInput,
} from "../lib/reportSchemas";
import { reportFolderName, timeFields } from "../lib/reportTime";
import { generateReportTag } from "../lib/tagGenerator";
import type { ServiceSettings } from "../config/reportConfig";
import type { StorageBackend } from "../storage/types";
import type { ReportNotifier } from "./emailService";
import { renderMarkdownForBrowser, renderMarkdownForEmail } from "./markdownRenderer";
import { createEmailMathRenderer, type LatexImageRenderer } from "./mathImages";
import {
  ReportIndex,
  METADATA_FILENAME,
  type FindCriteria,
  type FindResult,
  type ReportCriteria,
  type ReportLookup,
} from "./reportIndex";
import {
  renderReportEmailHtml,
  renderReportEmailText,
  renderReportPage,
  reportSubject,
  type AttachmentLink,
  type ReportEmailData,
} from "./reportTemplates";

export const ARTIFACT_FILENAME = "index.html";

const RESERVED_FILENAMES = new Set([ARTIFACT_FILENAME, METADATA_FILENAME, COMBINED_TEXT_FILENAME]);
const MATH_IMAGE_PATTERN = /^math_\d+\.png$/i;

export interface AttachmentRecord {
  filename: string;
  sizeBytes: number;
  role: FileRole;
  locator: string;
  embedded: boolean;
  sourcePath?: string;
  derived: boolean;
}

export interface SubmitResult {
  tag: string;
  locator: string;
  attachmentCount: number;
  embeddedCount: number;
  attachments: AttachmentRecord[];
  warnings: string[];
  notified: boolean;
  combinedTextFile: boolean;
  subject: string;
}

// Remote mode only: where notifications go and how their math is drawn
export interface NotificationChannel {
  notifier: Pick<ReportNotifier, "send">;
  mathRenderer: LatexImageRenderer;
}

export type ReportSettings = Pick<
  ServiceSettings,
  "hostLabel" | "timeZone" | "maxEmbedded" | "maxEmbeddedBytes" | "listCeiling" | "latestLocatorFile"
>;

export interface ReportServiceDeps {
  storage: StorageBackend;
  settings: ReportSettings;
  notification?: NotificationChannel;
  generateTag?: () => string;
  clock?: () => Date;
}

interface LoadedFile {
  sourcePath: string;
  filename: string;
  sizeBytes: number;
  bytes: Buffer;
}

interface PersistedFile extends LoadedFile {
  record: AttachmentRecord;
}

export class ReportService {
  readonly index: ReportIndex;
  private readonly storage: StorageBackend;
  private readonly settings: ReportSettings;
  private readonly notification?: NotificationChannel;
  private readonly generateTag: () => string;
  private readonly clock: () => Date;

  constructor(deps: ReportServiceDeps) {
    this.storage = deps.storage;
    this.settings = deps.settings;
    this.notification = deps.notification;
    this.generateTag = deps.generateTag ?? (() => generateReportTag());
    this.clock = deps.clock ?? (() => new Date());
    this.index = new ReportIndex(deps.storage, { listCeiling: deps.settings.listCeiling });
  }

  get mode() {
    return this.storage.mode;
  }

  /**
   * Stores a report, its attachments and its browsable page, then notifies.
   * Storage happens first; a failed notification is returned as a warning.
   */
  async submit(input: SubmitReportInput): Promise<SubmitResult> {
    const parsed = submitReportSchema.safeParse(input);
    if (!parsed.success) {
      throw new ReportValidationError("Invalid report submission", formatIssues(parsed.error));
    }
    const request = parsed.data;

    if ((request.body === undefined) === (request.bodyFilePath === undefined)) {
      throw new ReportValidationError("Provide exactly one of body or bodyFilePath.");
    }
    const body = request.body ?? (await readBodyFile(request.bodyFilePath ?? ""));

    const submittedAt = this.clock();
    const tag = this.generateTag();
    const folder = `${request.agentName}/${reportFolderName(submittedAt, tag)}`;
    const warnings: string[] = [];

    const warn = (message: string, error: unknown) => {
      warnings.push(`${message}: ${errorMessage(error)}`);
      console.warn(`${message}:`, errorMessage(error));
    };

    const loaded: LoadedFile[] = [];
    for (const sourcePath of new Set(request.files)) {
      try {
        const bytes = await readFile(sourcePath);
        loaded.push({
          sourcePath,
          filename: path.basename(sourcePath),
          sizeBytes: bytes.length,
          bytes,
        });
      } catch (error) {
        warn(`Skipped unreadable file ${sourcePath}`, error);
      }
    }

    const sorted = sortBySize(loaded);
    const takenNames = new Set<string>();
    const persisted: PersistedFile[] = [];
    const attachments: AttachmentRecord[] = [];

    for (const file of sorted) {
      const filename = uniqueFilename(file.filename, takenNames);
      try {
        const locator = await this.storage.persist(
          `${folder}/${filename}`,
          file.bytes,
          contentTypeFor(filename)
        );
        const record: AttachmentRecord = {
          filename,
          sizeBytes: file.sizeBytes,
          role: classifyFile(filename),
          locator,
          embedded: false,
          sourcePath: file.sourcePath,
          derived: false,
        };
        persisted.push({ ...file, filename, record });
        attachments.push(record);
      } catch (error) {
        warn(`Failed to store attachment ${file.sourcePath}`, error);
      }
    }

    const combined = buildCombinedTextAttachment(
      sorted
        .filter((file) => classifyFile(file.filename) === "text")
        .map((file) => ({
          filename: file.filename,
          path: file.sourcePath,
          content: file.bytes.toString("utf8"),
        })),
      submittedAt
    );
    let combinedTextFile = false;
    if (combined !== null) {
      const bytes = Buffer.from(combined, "utf8");
      try {
        const locator = await this.storage.persist(
          `${folder}/${COMBINED_TEXT_FILENAME}`,
          bytes,
          "text/plain"
        );
        attachments.push({
          filename: COMBINED_TEXT_FILENAME,
          sizeBytes: bytes.length,
          role: "text",
          locator,
          embedded: false,
          derived: true,
        });
        combinedTextFile = true;
      } catch (error) {
        warn("Failed to store combined text attachment", error);
      }
    }

    const links: AttachmentLink[] = attachments.map(({ filename, locator, role }) => ({
      filename,
      locator,
      role,
    }));
    const header = {
      agentName: request.agentName,
      title: request.title,
      tag,
      hostLabel: this.settings.hostLabel,
      submittedAt,
      timeZone: this.settings.timeZone,
    };

    const page = renderReportPage({
      ...header,
      mode: this.storage.mode,
      bodyHtml: renderMarkdownForBrowser(body),
      attachments: links,
    });
    const artifactKey = `${folder}/${ARTIFACT_FILENAME}`;
    const locator = await this.storage.persist(
      artifactKey,
      Buffer.from(page, "utf8"),
      "text/html; charset=utf-8"
    );

    const metadata: ReportMetadata = {
      tag,
      agentName: request.agentName,
      title: request.title,
      ...timeFields(submittedAt),
      artifactLocator: locator,
      hostLabel: this.settings.hostLabel,
      mode: this.storage.mode,
      reportFolder: folder,
      artifactKey,
    };
    await this.storage.persist(
      `${folder}/${METADATA_FILENAME}`,
      Buffer.from(JSON.stringify(metadata, null, 2), "utf8"),
      "application/json"
    );

    const subject = reportSubject(request.agentName, request.title, tag);
    let notified = false;
    let embeddedCount = 0;

    if (this.notification) {
      const { notifier, mathRenderer } = this.notification;
      try {
        const emailData: ReportEmailData = {
          ...header,
          body,
          bodyHtml: await renderMarkdownForEmail(
            body,
            createEmailMathRenderer(mathRenderer, this.storage, folder)
          ),
          attachments: links,
          artifactLocator: locator,
        };
        const { embedded } = selectEmbeddable(
          persisted,
          this.settings.maxEmbedded,
          this.settings.maxEmbeddedBytes
        );

        await notifier.send({
          subject,
          textBody: renderReportEmailText(emailData),
          htmlBody: renderReportEmailHtml(emailData),
          attachments: embedded.map((file) => ({
            filename: file.filename,
            contentType: contentTypeFor(file.filename),
            content: file.bytes,
          })),
          urgent: request.urgent,
        });

        for (const file of embedded) {
          file.record.embedded = true;
        }
        embeddedCount = embedded.length;
        notified = true;
      } catch (error) {
        warn("Report stored but notification failed", error);
      }
    }

    if (this.settings.latestLocatorFile) {
      try {
        await writeFile(this.settings.latestLocatorFile, locator, "utf8");
      } catch (error) {
        warn(`Failed to write latest report locator to ${this.settings.latestLocatorFile}`, error);
      }
    }

    console.log(`Report ${tag} stored for ${request.agentName} at ${locator}`);

    return {
      tag,
      locator,
      attachmentCount: persisted.length,
      embeddedCount,
      attachments,
      warnings,
      notified,
      combinedTextFile,
      subject,
    };
  }

  list(criteria: FindCriteria = {}): Promise<FindResult> {
    return this.index.find(criteria);
  }

  get(criteria: ReportCriteria): Promise<ReportLookup | null> {
    return this.index.get(criteria);
  }
}

async function readBodyFile(bodyFilePath: string): Promise<string> {
  try {
    return await readFile(bodyFilePath, "utf8");
  } catch (error) {
    throw new ReportValidationError(
      `Cannot read body file ${bodyFilePath}`,
      [errorMessage(error)],
      ERROR_CODES.BODY_UNREADABLE
    );
  }
}

function isReserved(filename: string): boolean {
  return RESERVED_FILENAMES.has(filename.toLowerCase()) || MATH_IMAGE_PATTERN.test(filename);
}

/**
 * Name under which an attachment is stored inside the report folder.
 * Clashes get `_2`, `_3`... before the extension.
 */
export function uniqueFilename(filename: string, taken: Set<string>): string {
  let candidate = filename;
  if (isReserved(candidate) || taken.has(candidate)) {
    const ext = path.extname(filename);
    const base = ext ? filename.slice(0, -ext.length) : filename;
    let suffix = 2;
    do {
      candidate = `${base}_${suffix}${ext}`;
      suffix += 1;
    } while (isReserved(candidate) || taken.has(candidate));
  }
  taken.add(candidate);
  return candidate;
}
