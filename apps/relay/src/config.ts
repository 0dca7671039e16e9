import "dotenv/config";

interface Config {
  port: number;
  host: string;
  logLevel: string;
  corsOrigin: boolean | string[];
  bodyLimit: number;
}

function getEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export const config: Config = {
  port: getEnvNumber("PORT", 3001),
  host: getEnv("HOST", "0.0.0.0"),
  logLevel: getEnv("LOG_LEVEL", "info"),
  corsOrigin: getEnv("CORS_ORIGIN", "*") === "*" ? true : getEnv("CORS_ORIGIN", "*").split(","),
  // Layered records with many sections run to tens of kilobytes
  bodyLimit: getEnvNumber("BODY_LIMIT", 1024 * 1024),
};
