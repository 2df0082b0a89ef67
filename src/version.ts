export const SERVER_NAME = "dwd-weather-mcp";
export const SERVER_VERSION = "0.1.0";
