/**
 * Shared configuration utilities for services
 */

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
}

export interface RedisConfig {
  url: string;
  host?: string;
  port?: number;
}

export interface ServiceConfig {
  mode: string;
  logLevel: string;
  port?: number;
}

/**
 * Create database configuration from environment variables
 */
export function createDatabaseConfig(
  serviceName: string,
  defaultPort = 5432
): DatabaseConfig {
  return {
    host: process.env.DB_HOST ?? "localhost",
    port: Number(process.env.DB_PORT ?? defaultPort),
    user: process.env.DB_USER ?? serviceName,
    password: process.env.DB_PASSWORD ?? serviceName,
    name: process.env.DB_NAME ?? `${serviceName.replace(/-/g, "_")}_dev`,
  };
}

/**
 * Create Redis configuration from environment variables
 */
export function createRedisConfig(): RedisConfig {
  const redisUrl = process.env.REDIS_URL ?? "redis://localhost:6379";

  try {
    const url = new URL(redisUrl);
    return {
      url: redisUrl,
      host: url.hostname,
      port: url.port ? parseInt(url.port, 10) : 6379,
    };
  } catch {
    // Not a URL, fall back to discrete host/port variables
    return {
      url: redisUrl,
      host: process.env.REDIS_HOST ?? "localhost",
      port: Number(process.env.REDIS_PORT ?? 6379),
    };
  }
}

/**
 * Create service configuration from environment variables
 */
export function createServiceConfig(defaultPort?: number): ServiceConfig {
  return {
    mode: process.env.MODE ?? process.env.NODE_ENV ?? "development",
    logLevel: process.env.LOG_LEVEL ?? "info",
    port: defaultPort ? Number(process.env.PORT ?? defaultPort) : undefined,
  };
}
