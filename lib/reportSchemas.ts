import { z } from "zod";

export const agentNameSchema = z
  .string()
  .trim()
  .min(1, "agentName is required")
  .max(128)
  .regex(/^[A-Za-z0-9._-]+$/, "agentName may only contain letters, digits, '.', '_' and '-'")
  .refine((name) => name !== "." && name !== "..", "agentName cannot be '.' or '..'");

export const submitReportSchema = z.object({
  agentName: agentNameSchema,
  title: z.string().trim().min(1, "title is required"),
  body: z.string().optional(),
  bodyFilePath: z.string().optional(),
  files: z.array(z.string().min(1)).default([]),
  urgent: z.boolean().default(false),
});

export type SubmitReportInput = z.input<typeof submitReportSchema>;
export type SubmitReportRequest = z.output<typeof submitReportSchema>;

const dateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD");

// Query strings arrive as text
const queryInt = (min: number, max: number) =>
  z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().int().min(min).max(max));

const queryFlag = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
  .transform((value) => value === true || value === "true" || value === "1");

export const listReportsSchema = z.object({
  agentName: agentNameSchema.optional(),
  tag: z.string().trim().min(1).optional(),
  date: dateSchema.optional(),
  hour: queryInt(0, 23).optional(),
  minute: queryInt(0, 59).optional(),
  maxResults: queryInt(1, 1000).default(20),
  includeAncient: queryFlag.default(false),
});

export type ListReportsInput = z.input<typeof listReportsSchema>;
export type ListCriteria = z.output<typeof listReportsSchema>;

export const getReportSchema = z
  .object({
    tag: z.string().trim().min(1).optional(),
    agentName: agentNameSchema.optional(),
    date: dateSchema.optional(),
    hour: queryInt(0, 23).optional(),
    minute: queryInt(0, 59).optional(),
    includeAncient: queryFlag.default(false),
  })
  .refine(
    (query) =>
      query.tag !== undefined ||
      (query.agentName !== undefined &&
        query.date !== undefined &&
        query.hour !== undefined &&
        query.minute !== undefined),
    { message: "Provide either a tag OR agentName with date, hour, and minute." }
  );

export type GetReportInput = z.input<typeof getReportSchema>;
export type GetCriteria = z.output<typeof getReportSchema>;

export const reportMetadataSchema = z.object({
  tag: z.string(),
  agentName: z.string(),
  title: z.string(),
  timestamp: z.string().datetime(),
  date: dateSchema,
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
  artifactLocator: z.string(),
  hostLabel: z.string(),
  mode: z.enum(["local", "remote"]),
  reportFolder: z.string(),
  artifactKey: z.string(),
});

export type ReportMetadata = z.infer<typeof reportMetadataSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
