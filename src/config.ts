import { ConfigError } from "./errors.js";

export const MEMORY_DATA_DIR = "memory://";

export interface Config {
  databaseUrl: string;
  dataDir: string;
  environment: string;
}

export function loadConfig(): Config {
  return {
    databaseUrl: process.env.DATABASE_URL?.trim() ?? "",
    dataDir: process.env.NEWS_DATA_DIR?.trim() || "./.news-data",
    environment: process.env.ENVIRONMENT ?? "development",
  };
}

export function validateConfig(config: Config): void {
  if (config.databaseUrl && !/^postgres(ql)?:\/\//.test(config.databaseUrl)) {
    throw new ConfigError(
      "DATABASE_URL must be a postgres:// or postgresql:// URL. Unset it to use the embedded store.",
    );
  }

  if (config.environment !== "production") return;

  if (config.databaseUrl.includes("CHANGEME")) {
    throw new ConfigError(
      "DATABASE_URL contains placeholder credentials. Set DATABASE_URL environment variable for production.",
    );
  }
  if (!config.databaseUrl && config.dataDir === MEMORY_DATA_DIR) {
    throw new ConfigError(
      "NEWS_DATA_DIR is set to an in-memory store. Point it at a directory in production.",
    );
  }
}
