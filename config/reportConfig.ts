import os from "os";
import { z } from "zod";
import { ConfigurationError } from "../lib/errors";
import {
  DEFAULT_MAX_EMBEDDED,
  DEFAULT_MAX_EMBEDDED_BYTES,
} from "../lib/attachmentBudget";
import { DEFAULT_URL_EXPIRATION_SECONDS } from "../storage/remoteStorage";

export const DEFAULT_LIST_CEILING = 600;
export const DEFAULT_MATH_RENDER_URL = "https://latex.codecogs.com/png.image";

// Unset and blank variables both fall back to the default
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const flag = z.preprocess(
  blankToUndefined,
  z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((value) => value === "true" || value === "1")
);

const envSchema = z.object({
  PORT: positiveInt(5000),
  REPORT_FOLDER: optionalString,
  REPORT_HOST_LABEL: optionalString,
  REPORT_TIME_ZONE: optionalString,
  REPORT_MAX_EMBEDDED: positiveInt(DEFAULT_MAX_EMBEDDED),
  REPORT_MAX_EMBEDDED_BYTES: positiveInt(DEFAULT_MAX_EMBEDDED_BYTES),
  REPORT_LIST_CEILING: positiveInt(DEFAULT_LIST_CEILING),
  REPORT_LATEST_URL_FILE: optionalString,
  REPORT_RATE_LIMIT: positiveInt(500),
  REPORT_BODY_LIMIT: optionalString,

  REPORT_BUCKET: optionalString,
  REPORT_AWS_REGION: optionalString,
  REPORT_S3_ENDPOINT: optionalString,
  REPORT_AWS_ACCESS_KEY_ID: optionalString,
  REPORT_AWS_SECRET_ACCESS_KEY: optionalString,
  REPORT_URL_EXPIRATION: positiveInt(DEFAULT_URL_EXPIRATION_SECONDS),
  REPORT_EMAIL_FROM: optionalString,
  REPORT_EMAIL_TO: optionalString,
  REPORT_MATH_RENDER_URL: optionalString,
  REPORT_MATH_TIMEOUT_MS: positiveInt(5000),

  SMTP_HOST: optionalString,
  SMTP_PORT: positiveInt(587),
  SMTP_SECURE: flag,
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
});

export interface ServiceSettings {
  port: number;
  hostLabel: string;
  timeZone: string;
  maxEmbedded: number;
  maxEmbeddedBytes: number;
  listCeiling: number;
  latestLocatorFile?: string;
  rateLimitPerMinute: number;
  bodyLimit: string;
}

export interface LocalModeConfig extends ServiceSettings {
  mode: "local";
  localFolder: string;
}

export interface RemoteModeConfig extends ServiceSettings {
  mode: "remote";
  s3: {
    bucket: string;
    region: string;
    endpoint?: string;
    accessKeyId: string;
    secretAccessKey: string;
    urlExpirationSeconds: number;
  };
  email: {
    from: string;
    to: string;
  };
  smtp: {
    host: string;
    port: number;
    secure: boolean;
    user?: string;
    pass?: string;
  };
  math: {
    renderUrl: string;
    timeoutMs: number;
  };
}

export type ReportServiceConfig = LocalModeConfig | RemoteModeConfig;

/**
 * Reads the environment once at startup. A report folder path selects local
 * mode; an empty value or "EMAIL" selects remote mode, which refuses to start
 * without object-store credentials and an SMTP host.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReportServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid report service configuration: ${issues.join("; ")}`);
  }
  const vars = parsed.data;

  const settings: ServiceSettings = {
    port: vars.PORT,
    hostLabel: vars.REPORT_HOST_LABEL ?? os.hostname(),
    timeZone: vars.REPORT_TIME_ZONE ?? "America/New_York",
    maxEmbedded: vars.REPORT_MAX_EMBEDDED,
    maxEmbeddedBytes: vars.REPORT_MAX_EMBEDDED_BYTES,
    listCeiling: vars.REPORT_LIST_CEILING,
    latestLocatorFile: vars.REPORT_LATEST_URL_FILE,
    rateLimitPerMinute: vars.REPORT_RATE_LIMIT,
    bodyLimit: vars.REPORT_BODY_LIMIT ?? "1mb",
  };

  if (vars.REPORT_FOLDER && vars.REPORT_FOLDER !== "EMAIL") {
    return { ...settings, mode: "local", localFolder: vars.REPORT_FOLDER };
  }

  const accessKeyId = vars.REPORT_AWS_ACCESS_KEY_ID;
  const secretAccessKey = vars.REPORT_AWS_SECRET_ACCESS_KEY;
  const smtpHost = vars.SMTP_HOST;
  if (!accessKeyId || !secretAccessKey || !smtpHost) {
    const missing = [
      !accessKeyId && "REPORT_AWS_ACCESS_KEY_ID",
      !secretAccessKey && "REPORT_AWS_SECRET_ACCESS_KEY",
      !smtpHost && "SMTP_HOST",
    ].filter((name): name is string => typeof name === "string");
    throw new ConfigurationError(
      `Remote report mode requires ${missing.join(", ")}. Set REPORT_FOLDER to a path to store reports locally instead.`,
      missing
    );
  }

  return {
    ...settings,
    mode: "remote",
    s3: {
      bucket: vars.REPORT_BUCKET ?? "agent-reports",
      region: vars.REPORT_AWS_REGION ?? "us-east-1",
      endpoint: vars.REPORT_S3_ENDPOINT,
      accessKeyId,
      secretAccessKey,
      urlExpirationSeconds: vars.REPORT_URL_EXPIRATION,
    },
    email: {
      from: vars.REPORT_EMAIL_FROM ?? "reports@example.com",
      to: vars.REPORT_EMAIL_TO ?? "user@example.com",
    },
    smtp: {
      host: smtpHost,
      port: vars.SMTP_PORT,
      secure: vars.SMTP_SECURE,
      user: vars.SMTP_USER,
      pass: vars.SMTP_PASS,
    },
    math: {
      renderUrl: vars.REPORT_MATH_RENDER_URL ?? DEFAULT_MATH_RENDER_URL,
      timeoutMs: vars.REPORT_MATH_TIMEOUT_MS,
    },
  };
}
