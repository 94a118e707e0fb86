/**
 * Configuration management for ttrss-feed-client
 */

import { readFileSync } from "node:fs";
import type { ConfigOptions, ConnInfo } from "../domain/types.ts";
import { ConfigError } from "../domain/errors.ts";

const PLACEHOLDER_VALUES = new Set(["changeme", "placeholder", "demo"]);

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

class ConfigManager {
  private static instance: ConfigManager;
  private configCache: ConfigOptions | null = null;

  static getInstance(): ConfigManager {
    if (!this.instance) {
      this.instance = new ConfigManager();
    }
    return this.instance;
  }

  loadConfig(): ConfigOptions {
    if (this.configCache) {
      return this.configCache;
    }

    this.configCache = {
      network: {
        http_timeout: parseIntOr(process.env.HTTP_TIMEOUT, 30000),
        user_agent: process.env.HTTP_USER_AGENT ||
          "ttrss-feed-client/1.0.0",
      },
      logger: {
        level: (process.env.LOG_LEVEL || "info").toLowerCase(),
      },
    };

    return this.configCache;
  }

  validateConfig(): boolean {
    for (const key of ["TTRSS_URL", "TTRSS_USER", "TTRSS_PASSWORD"]) {
      const value = this.getEnvOrFile(key);
      if (!value || PLACEHOLDER_VALUES.has(value.toLowerCase())) {
        return false;
      }
    }

    const url = this.getEnvOrFile("TTRSS_URL");
    return url !== undefined && /^https?:\/\//.test(url);
  }

  getConnInfo(): ConnInfo {
    const hostUrl = this.getEnvOrFile("TTRSS_URL");
    const user = this.getEnvOrFile("TTRSS_USER");
    const password = this.getEnvOrFile("TTRSS_PASSWORD");
    if (!hostUrl || !user || password === undefined) {
      throw new ConfigError(
        "TTRSS_URL, TTRSS_USER and TTRSS_PASSWORD (or TTRSS_PASSWORD_FILE) must be set",
      );
    }
    return { hostUrl, user, password };
  }

  getEnvOrFile(key: string): string | undefined {
    const val = process.env[key];
    if (val) return val;

    const filePath = process.env[`${key}_FILE`];
    if (filePath) {
      try {
        return readFileSync(filePath, "utf8").trim();
      } catch {
        return undefined;
      }
    }

    return undefined;
  }

  /** Reset cached config (for testing) */
  resetCache(): void {
    this.configCache = null;
  }
}

export const config = ConfigManager.getInstance();
export { ConfigManager };
