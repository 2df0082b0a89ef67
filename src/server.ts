import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult, ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { WeatherFeeds } from "./client.js";
import { DwdApiError } from "./errors.js";
import { formatRecordsJson, formatReport } from "./format.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { SERVER_NAME, SERVER_VERSION } from "./version.js";

const stationsInput = {
  station_ids: z.array(z.string()).optional().describe("List of specific station IDs to fetch data for."),
  region: z.string().optional().describe("Region filter. Accepted but not currently applied to stations."),
};

const warningsInput = {
  region: z.string().optional().describe("Only warnings whose regions include this exact name."),
  severity: z.number().int().optional().describe("Minimum warning severity level (1-4)."),
};

const crowdReportsInput = {
  region: z.string().optional().describe("Region filter. Accepted but not currently applied to crowd reports."),
};

export const TOOL_NAMES = ["get_weather_stations", "get_current_warnings", "get_crowd_reports"] as const;

export const RESOURCES = {
  stations: {
    name: "All Weather Stations",
    uri: "weather://stations/all",
    description: "Complete list of all available weather stations",
  },
  warnings: {
    name: "Current Weather Warnings",
    uri: "weather://warnings/current",
    description: "Active weather warnings",
  },
  reports: {
    name: "Crowd Weather Reports",
    uri: "weather://reports/crowd",
    description: "User-submitted weather observations",
  },
} as const;

export interface ToolOutcome {
  text: string;
  isError: boolean;
}

/**
 * Runs one tool by name and renders its text response. Never throws: every
 * failure comes back as an error text.
 */
export async function runTool(
  feeds: WeatherFeeds,
  name: string,
  args: unknown,
  logger: Logger = createLogger(),
): Promise<ToolOutcome> {
  try {
    switch (name) {
      case "get_weather_stations": {
        const { station_ids, region } = z.object(stationsInput).parse(args ?? {});
        const stations = await feeds.getWeatherStations({ stationIds: station_ids, region });
        return { text: formatReport("stations", stations), isError: false };
      }
      case "get_current_warnings": {
        const { region, severity } = z.object(warningsInput).parse(args ?? {});
        const warnings = await feeds.getCurrentWarnings({ region, severity });
        return { text: formatReport("warnings", warnings), isError: false };
      }
      case "get_crowd_reports": {
        const { region } = z.object(crowdReportsInput).parse(args ?? {});
        const reports = await feeds.getCrowdReports({ region });
        return { text: formatReport("reports", reports), isError: false };
      }
      default:
        return { text: `Unknown tool: ${name}`, isError: true };
    }
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      logger.warn(`${name} called with invalid arguments`, { issues });
      return { text: `Invalid arguments for ${name}: ${issues}`, isError: true };
    }
    if (error instanceof DwdApiError) {
      logger.error(`${name} failed`, { endpoint: error.endpoint, error: error.message });
      return { text: `Error fetching data: ${error.message}`, isError: true };
    }
    logger.error(`${name} failed unexpectedly`, { error: errorMessage(error) });
    return { text: `Unexpected error: ${errorMessage(error)}`, isError: true };
  }
}

/**
 * Reads one resource as newline-joined JSON records. Unknown URIs get a text
 * answer; feed failures are logged and rethrown for the protocol layer.
 */
export async function readResource(
  feeds: WeatherFeeds,
  uri: string,
  logger: Logger = createLogger(),
): Promise<string> {
  try {
    switch (uri) {
      case RESOURCES.stations.uri:
        return formatRecordsJson(await feeds.getWeatherStations());
      case RESOURCES.warnings.uri:
        return formatRecordsJson(await feeds.getCurrentWarnings());
      case RESOURCES.reports.uri:
        return formatRecordsJson(await feeds.getCrowdReports());
      default:
        return `Unknown resource: ${uri}`;
    }
  } catch (error) {
    logger.error(`Error reading resource ${uri}`, { error: errorMessage(error) });
    throw error;
  }
}

function toolResult({ text, isError }: ToolOutcome): CallToolResult {
  return {
    content: [{ type: "text", text }],
    ...(isError ? { isError: true } : {}),
  };
}

export function createServer(feeds: WeatherFeeds, logger: Logger = createLogger()): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.tool(
    "get_weather_stations",
    "Get weather station data from the German Weather Service (DWD).",
    stationsInput,
    async (args) => toolResult(await runTool(feeds, "get_weather_stations", args, logger)),
  );

  server.tool(
    "get_current_warnings",
    "Get current weather warnings from the German Weather Service (DWD).",
    warningsInput,
    async (args) => toolResult(await runTool(feeds, "get_current_warnings", args, logger)),
  );

  server.tool(
    "get_crowd_reports",
    "Get user-submitted weather reports from the German Weather Service (DWD).",
    crowdReportsInput,
    async (args) => toolResult(await runTool(feeds, "get_crowd_reports", args, logger)),
  );

  for (const resource of Object.values(RESOURCES)) {
    server.resource(
      resource.name,
      resource.uri,
      { description: resource.description, mimeType: "application/json" },
      async (uri): Promise<ReadResourceResult> => ({
        contents: [
          {
            uri: uri.href,
            mimeType: "application/json",
            text: await readResource(feeds, uri.href, logger),
          },
        ],
      }),
    );
  }

  logger.info("DWD MCP server initialised", {
    tools: TOOL_NAMES,
    resources: Object.values(RESOURCES).map((resource) => resource.uri),
  });

  return server;
}
