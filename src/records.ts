import type { z } from "zod";
import { createLogger, type Logger } from "./logger.js";
import {
  CrowdReportSchema,
  StationDataSchema,
  StationInfoSchema,
  WarningInfoSchema,
  isJsonObject,
  type CrowdReport,
  type StationData,
  type WarningInfo,
} from "./models.js";

/** Feed kinds double as the key the upstream nests each item list under. */
export type FeedKind = "stations" | "warnings" | "reports";

export interface FeedRecords {
  stations: StationData;
  warnings: WarningInfo;
  reports: CrowdReport;
}

export interface RecordFilters {
  region?: string;
  minSeverity?: number;
}

interface FeedDefinition<T> {
  label: string;
  parse(item: unknown): z.SafeParseReturnType<unknown, T>;
  matches(record: T, filters: RecordFilters): boolean;
  /** Whether the feed has a field the region filter can match against. */
  filtersByRegion: boolean;
}

// Region filtering is not defined for stations and crowd reports: neither
// record carries a region to match. Accepted and ignored.
const acceptAll = (): boolean => true;

const FEEDS: { [K in FeedKind]: FeedDefinition<FeedRecords[K]> } = {
  stations: {
    label: "station",
    parse(item) {
      if (isJsonObject(item) && "station" in item) {
        return StationDataSchema.safeParse(item);
      }
      const info = StationInfoSchema.safeParse(item);
      if (!info.success) {
        return info;
      }
      const wrapped = Object.freeze({ station: info.data, measurements: Object.freeze([]) });
      return { success: true, data: wrapped };
    },
    matches: acceptAll,
    filtersByRegion: false,
  },
  warnings: {
    label: "warning",
    parse: (item) => WarningInfoSchema.safeParse(item),
    matches(warning, { region, minSeverity }) {
      if (minSeverity !== undefined && warning.level < minSeverity) {
        return false;
      }
      if (region && !warning.regions.includes(region)) {
        return false;
      }
      return true;
    },
    filtersByRegion: true,
  },
  reports: {
    label: "crowd report",
    parse: (item) => CrowdReportSchema.safeParse(item),
    matches: acceptAll,
    filtersByRegion: false,
  },
};

export function supportsRegionFilter(kind: FeedKind): boolean {
  return FEEDS[kind].filtersByRegion;
}

/**
 * Parses each item into a record of the given kind and keeps the ones passing
 * the filters, in input order. Items that fail validation are logged and
 * skipped; one bad item never fails the batch.
 */
export function validateAndFilter<K extends FeedKind>(
  items: readonly unknown[],
  kind: K,
  filters: RecordFilters = {},
  logger: Logger = createLogger(),
): FeedRecords[K][] {
  const feed: FeedDefinition<FeedRecords[K]> = FEEDS[kind];
  const records: FeedRecords[K][] = [];

  items.forEach((item, index) => {
    const result = feed.parse(item);
    if (!result.success) {
      logger.warn(`Failed to parse ${feed.label} data`, {
        index,
        issues: result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
      });
      return;
    }
    if (feed.matches(result.data, filters)) {
      records.push(result.data);
    }
  });

  return records;
}
