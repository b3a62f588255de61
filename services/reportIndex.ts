import { ReportValidationError, errorMessage } from "../lib/errors";
import { reportMetadataSchema, type ReportMetadata } from "../lib/reportSchemas";
import { isReportTag, normalizeTag } from "../lib/tagGenerator";
import type { StorageBackend, StoredObject } from "../storage/types";

export const METADATA_FILENAME = "metadata.json";
export const DEFAULT_MAX_RESULTS = 20;

export interface ReportCriteria {
  agentName?: string;
  tag?: string;
  date?: string;
  hour?: number;
  minute?: number;
  includeAncient?: boolean;
}

export interface FindCriteria extends ReportCriteria {
  maxResults?: number;
}

export interface FindResult {
  reports: ReportMetadata[];
  // Matches before `maxResults` was applied
  total: number;
}

export interface ReportLookup {
  report: ReportMetadata;
  locator: string;
}

export interface ReportIndexOptions {
  listCeiling: number;
}

const newestModifiedFirst = (a: StoredObject, b: StoredObject) =>
  b.lastModified.getTime() - a.lastModified.getTime();

const newestTimestampFirst = (a: ReportMetadata, b: ReportMetadata) =>
  a.timestamp < b.timestamp ? 1 : a.timestamp > b.timestamp ? -1 : 0;

/**
 * Search over the metadata records that sit beside every stored report.
 * There is no separate database: each query lists the store.
 */
export class ReportIndex {
  constructor(
    private readonly storage: StorageBackend,
    private readonly options: ReportIndexOptions
  ) {}

  async find(criteria: FindCriteria = {}): Promise<FindResult> {
    const tag = criteria.tag === undefined ? undefined : normalizeTag(criteria.tag);
    if (tag !== undefined && !isReportTag(tag)) {
      return { reports: [], total: 0 };
    }

    // A tag search looks at the whole store, newest first
    const candidates = await this.listMetadataKeys(
      criteria.agentName,
      tag !== undefined || criteria.includeAncient === true
    );
    if (tag !== undefined) {
      candidates.sort(newestModifiedFirst);
    }

    const matches: ReportMetadata[] = [];
    for (const candidate of candidates) {
      const record = await this.readRecord(candidate.key);
      if (record && matchesCriteria(record, { ...criteria, tag })) {
        matches.push(record);
      }
    }

    if (tag === undefined) {
      matches.sort(newestTimestampFirst);
    }

    const maxResults = criteria.maxResults ?? DEFAULT_MAX_RESULTS;
    return { reports: matches.slice(0, maxResults), total: matches.length };
  }

  /**
   * Looks a single report up by tag, or by agent and minute of submission.
   * Returns null when nothing matches; the locator is minted fresh so a
   * time-limited URL is valid again.
   */
  async get(criteria: ReportCriteria): Promise<ReportLookup | null> {
    let lookup: ReportCriteria;
    if (criteria.tag !== undefined) {
      const tag = normalizeTag(criteria.tag);
      if (!isReportTag(tag)) return null;
      lookup = { tag, agentName: criteria.agentName };
    } else if (
      criteria.agentName !== undefined &&
      criteria.date !== undefined &&
      criteria.hour !== undefined &&
      criteria.minute !== undefined
    ) {
      lookup = criteria;
    } else {
      throw new ReportValidationError(
        "Provide either a tag OR agentName with date, hour, and minute."
      );
    }

    const candidates = await this.listMetadataKeys(
      lookup.agentName,
      lookup.tag !== undefined || criteria.includeAncient === true
    );
    candidates.sort(newestModifiedFirst);

    for (const candidate of candidates) {
      const record = await this.readRecord(candidate.key);
      if (record && matchesCriteria(record, lookup)) {
        return { report: record, locator: await this.storage.locate(record.artifactKey) };
      }
    }
    return null;
  }

  private async listMetadataKeys(
    agentName: string | undefined,
    unbounded: boolean
  ): Promise<StoredObject[]> {
    const prefix = agentName ? `${agentName}/` : "";
    const objects = await this.storage.list(
      prefix,
      unbounded ? {} : { maxObjects: this.options.listCeiling }
    );
    return objects.filter((object) => object.key.endsWith(`/${METADATA_FILENAME}`));
  }

  private async readRecord(key: string): Promise<ReportMetadata | null> {
    let raw: unknown;
    try {
      raw = JSON.parse((await this.storage.fetch(key)).toString("utf8"));
    } catch (error) {
      console.error(`Error reading report metadata ${key}:`, errorMessage(error));
      return null;
    }

    const parsed = reportMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`Skipping malformed report metadata ${key}`);
      return null;
    }
    return parsed.data;
  }
}

export function matchesCriteria(record: ReportMetadata, criteria: ReportCriteria): boolean {
  if (criteria.tag !== undefined && record.tag.toUpperCase() !== criteria.tag.toUpperCase()) {
    return false;
  }
  if (criteria.agentName !== undefined && record.agentName !== criteria.agentName) return false;
  if (criteria.date !== undefined && record.date !== criteria.date) return false;
  if (criteria.hour !== undefined && record.hour !== criteria.hour) return false;
  if (criteria.minute !== undefined && record.minute !== criteria.minute) return false;
  return true;
}
