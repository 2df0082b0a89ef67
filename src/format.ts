import type { CrowdReport, StationData, WarningInfo, WeatherMeasurement } from "./models.js";
import type { FeedKind, FeedRecords } from "./records.js";

type Formatter<K extends FeedKind> = (records: readonly FeedRecords[K][]) => string;

function formatCoordinates(latitude: number, longitude: number): string {
  return `${latitude.toFixed(4)}°N, ${longitude.toFixed(4)}°E`;
}

function formatDate(date: Date): string {
  return date.toISOString();
}

function formatMeasurementValue({ value, unit }: WeatherMeasurement): string {
  if (value === undefined) {
    return "N/A";
  }
  return unit ? `${value} ${unit}` : String(value);
}

/** Heading, blank line, then each section followed by one blank line. */
function renderReport<T>(heading: string, records: readonly T[], renderSection: (record: T) => string[]): string {
  const lines = [heading, ""];
  for (const record of records) {
    lines.push(...renderSection(record), "");
  }
  return lines.join("\n");
}

export function formatStations(stations: readonly StationData[]): string {
  if (stations.length === 0) {
    return "No weather stations found.";
  }

  return renderReport("# Weather Stations", stations, ({ station, measurements, last_updated }) => {
    const lines = [`## Station: ${station.station_name ?? "Unknown"}`, `- **ID**: ${station.station_id}`];

    if (station.latitude !== undefined && station.longitude !== undefined) {
      lines.push(`- **Location**: ${formatCoordinates(station.latitude, station.longitude)}`);
    }
    if (station.elevation !== undefined) {
      lines.push(`- **Elevation**: ${station.elevation}m`);
    }
    if (station.state !== undefined) {
      lines.push(`- **State**: ${station.state}`);
    }
    if (measurements.length > 0) {
      lines.push("- **Current Measurements**:");
      for (const measurement of measurements) {
        lines.push(`  - ${measurement.parameter}: ${formatMeasurementValue(measurement)}`);
      }
    }
    if (last_updated !== undefined) {
      lines.push(`- **Last Updated**: ${formatDate(last_updated)}`);
    }
    return lines;
  });
}

export function formatWarnings(warnings: readonly WarningInfo[]): string {
  if (warnings.length === 0) {
    return "No weather warnings found.";
  }

  return renderReport("# Current Weather Warnings", warnings, (warning) => {
    const lines = [
      `## ${warning.headline}`,
      `- **ID**: ${warning.warning_id}`,
      `- **Level**: ${warning.level}`,
      `- **Type**: ${warning.type}`,
      `- **Start**: ${formatDate(warning.start_time)}`,
    ];

    if (warning.end_time !== undefined) {
      lines.push(`- **End**: ${formatDate(warning.end_time)}`);
    }
    if (warning.regions.length > 0) {
      lines.push(`- **Regions**: ${warning.regions.join(", ")}`);
    }
    lines.push(`- **Description**: ${warning.description}`);
    return lines;
  });
}

export function formatCrowdReports(reports: readonly CrowdReport[]): string {
  if (reports.length === 0) {
    return "No crowd reports found.";
  }

  return renderReport("# User-Submitted Weather Reports", reports, (report) => {
    const lines = [
      `## Report ${report.report_id}`,
      `- **Location**: ${formatCoordinates(report.latitude, report.longitude)}`,
      `- **Condition**: ${report.weather_condition}`,
    ];

    if (report.temperature !== undefined) {
      lines.push(`- **Temperature**: ${report.temperature}°C`);
    }
    lines.push(`- **Time**: ${formatDate(report.timestamp)}`);
    if (report.user_comment !== undefined) {
      lines.push(`- **Comment**: ${report.user_comment}`);
    }
    return lines;
  });
}

const FORMATTERS: { [K in FeedKind]: Formatter<K> } = {
  stations: formatStations,
  warnings: formatWarnings,
  reports: formatCrowdReports,
};

export function formatReport<K extends FeedKind>(kind: K, records: readonly FeedRecords[K][]): string {
  const format: Formatter<K> = FORMATTERS[kind];
  return format(records);
}

/** Resource body: each record as indented JSON, one after another. */
export function formatRecordsJson(records: readonly object[]): string {
  return records.map((record) => JSON.stringify(record, null, 2)).join("\n");
}
