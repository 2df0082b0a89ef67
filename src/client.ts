import { createLogger, type Logger } from "./logger.js";
import type { CrowdReport, StationData, WarningInfo } from "./models.js";
import { normalize } from "./normalize.js";
import { supportsRegionFilter, validateAndFilter, type FeedKind, type FeedRecords, type RecordFilters } from "./records.js";
import type { QueryParams, Transport } from "./transport.js";

export const ENDPOINTS: Record<FeedKind, string> = {
  stations: "/stationOverviewExtended",
  warnings: "/warnings_nowcast.json",
  reports: "/crowd_meldungen_overview_v2.json",
};

export interface StationQuery {
  stationIds?: string[];
  region?: string;
}

export interface WarningQuery {
  region?: string;
  severity?: number;
}

export interface CrowdReportQuery {
  region?: string;
}

/** The three read-only DWD feeds, as typed records. */
export interface WeatherFeeds {
  getWeatherStations(query?: StationQuery): Promise<StationData[]>;
  getCurrentWarnings(query?: WarningQuery): Promise<WarningInfo[]>;
  getCrowdReports(query?: CrowdReportQuery): Promise<CrowdReport[]>;
}

export class DwdClient implements WeatherFeeds {
  constructor(
    private readonly transport: Transport,
    private readonly logger: Logger = createLogger(),
  ) {}

  async getWeatherStations({ stationIds, region }: StationQuery = {}): Promise<StationData[]> {
    const params: QueryParams = {};
    if (stationIds && stationIds.length > 0) {
      params.stationIds = stationIds.join(",");
    }
    return this.fetchFeed("stations", params, { region });
  }

  async getCurrentWarnings({ region, severity }: WarningQuery = {}): Promise<WarningInfo[]> {
    return this.fetchFeed("warnings", {}, { region, minSeverity: severity });
  }

  async getCrowdReports({ region }: CrowdReportQuery = {}): Promise<CrowdReport[]> {
    return this.fetchFeed("reports", {}, { region });
  }

  private async fetchFeed<K extends FeedKind>(
    kind: K,
    params: QueryParams,
    filters: RecordFilters,
  ): Promise<FeedRecords[K][]> {
    if (filters.region && !supportsRegionFilter(kind)) {
      this.logger.debug(`Region filter is not applied to ${kind}`, { region: filters.region });
    }

    const raw = await this.transport(ENDPOINTS[kind], params);
    const items = normalize(raw, kind, { wrapBareObject: kind === "stations" });
    const records = validateAndFilter(items, kind, filters, this.logger);

    this.logger.info(`Fetched ${kind}`, {
      received: items.length,
      returned: records.length,
    });
    return records;
  }
}
