import { z } from "zod";

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGRAL = /^[+-]?\d+$/;

// Unix timestamps above this magnitude are taken as milliseconds.
const MS_TIMESTAMP_THRESHOLD = 2e10;

const float = z.union([z.number(), z.string().trim().regex(NUMERIC).transform(Number)]);

const integer = z.union([z.number().int(), z.string().trim().regex(INTEGRAL).transform(Number)]);

// Calendar date, optionally followed by a time and a UTC offset.
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/i;

function fromUnixTimestamp(value: number): Date {
  return new Date(Math.abs(value) > MS_TIMESTAMP_THRESHOLD ? value : value * 1000);
}

/** Rewrites an ISO-8601 date-time with an explicit zone; no offset means UTC. */
function toUtcIsoString(text: string): string | undefined {
  const match = ISO_DATE_TIME.exec(text);
  if (!match) {
    return undefined;
  }
  const [, day, time, offset] = match;
  if (time === undefined) {
    return `${day}T00:00:00Z`;
  }
  const zone =
    offset === undefined || offset.toUpperCase() === "Z" ? "Z" : `${offset.slice(0, 3)}:${offset.slice(-2)}`;
  return `${day}T${time}${zone}`;
}

const dateTime = z.union([z.string().trim(), z.number()]).transform((value, ctx) => {
  let date: Date | undefined;
  if (typeof value === "number") {
    date = fromUnixTimestamp(value);
  } else if (NUMERIC.test(value)) {
    date = fromUnixTimestamp(Number(value));
  } else {
    const iso = toUtcIsoString(value);
    date = iso === undefined ? undefined : new Date(iso);
  }

  if (date === undefined || Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected an ISO-8601 date-time or Unix timestamp" });
    return z.NEVER;
  }
  return date;
});

/** `null` and a missing key both leave the field unset. */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Object schema that accepts each field under its upstream alias or its
 * canonical name. The alias wins when both are given.
 */
function aliased<T extends z.ZodRawShape>(shape: T, aliases: Partial<Record<keyof T, string>>) {
  const renames = Object.entries(aliases).filter(
    (entry): entry is [string, string] => typeof entry[1] === "string" && entry[0] !== entry[1],
  );

  return z
    .preprocess((input) => {
      if (!isJsonObject(input)) {
        return input;
      }
      const renamed: Record<string, unknown> = { ...input };
      for (const [name, alias] of renames) {
        if (alias in input) {
          renamed[name] = input[alias];
        }
      }
      return renamed;
    }, z.object(shape))
    .readonly();
}

export const StationInfoSchema = aliased(
  {
    station_id: z.string(),
    station_name: optional(z.string()),
    latitude: optional(float),
    longitude: optional(float),
    elevation: optional(float),
    state: optional(z.string()),
  },
  { station_id: "stationId", station_name: "stationName", latitude: "lat", longitude: "lon" },
);

export const WeatherMeasurementSchema = z
  .object({
    parameter: z.string(),
    value: optional(float),
    unit: optional(z.string()),
    timestamp: optional(dateTime),
    quality: optional(z.string()),
  })
  .readonly();

export const StationDataSchema = aliased(
  {
    station: StationInfoSchema,
    measurements: z.array(WeatherMeasurementSchema).readonly().default([]),
    last_updated: optional(dateTime),
  },
  { last_updated: "lastUpdated" },
);

export const WarningInfoSchema = aliased(
  {
    warning_id: z.string(),
    level: integer,
    type: z.string(),
    headline: z.string(),
    description: z.string(),
    start_time: dateTime,
    end_time: optional(dateTime),
    regions: z.array(z.string()).readonly().default([]),
  },
  { warning_id: "warningId", start_time: "startTime", end_time: "endTime" },
);

export const CrowdReportSchema = aliased(
  {
    report_id: z.string(),
    latitude: float,
    longitude: float,
    weather_condition: z.string(),
    temperature: optional(float),
    timestamp: dateTime,
    user_comment: optional(z.string()),
  },
  {
    report_id: "reportId",
    latitude: "lat",
    longitude: "lon",
    weather_condition: "weatherCondition",
    user_comment: "userComment",
  },
);

export type StationInfo = z.output<typeof StationInfoSchema>;
export type WeatherMeasurement = z.output<typeof WeatherMeasurementSchema>;
export type StationData = z.output<typeof StationDataSchema>;
export type WarningInfo = z.output<typeof WarningInfoSchema>;
export type CrowdReport = z.output<typeof CrowdReportSchema>;

export const parseStationInfo = (input: unknown): StationInfo => StationInfoSchema.parse(input);
export const parseWeatherMeasurement = (input: unknown): WeatherMeasurement =>
  WeatherMeasurementSchema.parse(input);
export const parseStationData = (input: unknown): StationData => StationDataSchema.parse(input);
export const parseWarningInfo = (input: unknown): WarningInfo => WarningInfoSchema.parse(input);
export const parseCrowdReport = (input: unknown): CrowdReport => CrowdReportSchema.parse(input);
