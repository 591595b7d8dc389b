import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { ConfigError } from "./errors.js";
import { CONFIG_KEYS, ConfigFileSchema, REQUIRED_CONFIG_KEYS, parseOrThrow } from "./schemas.js";
import type { BackoffKind } from "./utils/backoff.js";

export type InstallerConfig = {
  /** Minimum macOS version, e.g. "13.0". */
  requiredVersion: string;
  retry: {
    maxRetries: number;
    delayMs: number;
    jitterMs: number;
    maxDelayMs: number;
    backoff: BackoffKind;
  };
  limits: {
    maxParallelJobs: number;
    /** Upper bound for a single brew invocation. */
    commandTimeoutMs: number;
  };
  dryRun: boolean;
  verbose: boolean;
  paths: {
    logFile: string;
    appsFile: string;
    historyDb: string;
  };
  checks: {
    endpoints: string[];
    probeTimeoutMs: number;
    requiredFreeBytes: number;
    maxCpuPercent: number;
    minFreeMemMb: number;
    requiredCommands: string[];
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export const DEFAULT_CONFIG_FILE = "config.txt";

const DEFAULTS: InstallerConfig = {
  requiredVersion: "13.0",
  retry: {
    maxRetries: 3,
    delayMs: 5_000,
    jitterMs: 1_000,
    maxDelayMs: 60_000,
    backoff: "linear",
  },
  limits: {
    maxParallelJobs: 4,
    commandTimeoutMs: 30 * 60 * 1000, // 30 minutes
  },
  dryRun: false,
  verbose: true,
  paths: {
    logFile: "install_log.jsonl",
    appsFile: "apps.txt",
    historyDb: join(homedir(), ".mac-app-installer", "runs.db"),
  },
  checks: {
    endpoints: ["https://google.com", "https://cloudflare.com", "https://github.com"],
    probeTimeoutMs: 5_000,
    requiredFreeBytes: 10 * 1024 ** 3,
    maxCpuPercent: 80,
    minFreeMemMb: 1024,
    requiredCommands: ["brew", "xcode-select", "curl"],
  },
};

let current: InstallerConfig = structuredClone(DEFAULTS);

function deepMerge<T extends Record<string, unknown>>(base: T, overrides: DeepPartial<T>): T {
  const result = structuredClone(base);
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined && typeof val === "object" && !Array.isArray(val) && val !== null) {
      (result as Record<string, unknown>)[key as string] = deepMerge(
        result[key] as Record<string, unknown>,
        val as DeepPartial<Record<string, unknown>>,
      );
    } else if (val !== undefined) {
      (result as Record<string, unknown>)[key as string] = val;
    }
  }
  return result;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<InstallerConfig>): void {
  current = deepMerge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<InstallerConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<InstallerConfig> = Object.freeze(DEFAULTS);

/**
 * Parse `KEY=VALUE` lines. Blank lines and `#` comments are skipped, an
 * optional leading `export` is dropped, surrounding quotes are stripped and
 * empty values are treated as unset.
 */
export function parseKeyValue(text: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    const match = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/.exec(line);
    if (!match) continue;
    let value = match[2].trim();
    if (!/^(["']).*\1$/.test(value)) value = value.replace(/\s+#.*$/, "");
    const quoted = /^(["'])(.*)\1$/.exec(value);
    if (quoted) value = quoted[2];
    if (value !== "") values[match[1]] = value;
  }
  return values;
}

export type LoadConfigOptions = {
  configPath?: string;
  env?: Record<string, string | undefined>;
  /** Applied last, e.g. from CLI flags. */
  overrides?: DeepPartial<InstallerConfig>;
};

/**
 * Load settings with precedence defaults < environment < config file < overrides,
 * make them the current config and return them.
 */
export function loadConfig(opts: LoadConfigOptions = {}): InstallerConfig {
  const configPath = resolve(opts.configPath ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`, configPath);
  }

  const env = opts.env ?? process.env;
  const raw: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const fromEnv = env[key];
    if (fromEnv !== undefined && fromEnv !== "") raw[key] = fromEnv;
  }
  Object.assign(raw, pickKnown(parseKeyValue(readFileSync(configPath, "utf-8"))));

  for (const key of REQUIRED_CONFIG_KEYS) {
    if (raw[key] === undefined) {
      throw new ConfigError(`Missing required configuration key '${key}' in ${configPath}`, configPath);
    }
  }

  const values = parseOrThrow(ConfigFileSchema, raw, `configuration in ${configPath}`);
  const baseDir = dirname(configPath);

  const fromFile: DeepPartial<InstallerConfig> = {
    requiredVersion: values.REQUIRED_VERSION,
    retry: {
      maxRetries: values.MAX_RETRIES,
      delayMs: values.RETRY_DELAY * 1000,
      jitterMs: values.RETRY_JITTER !== undefined ? values.RETRY_JITTER * 1000 : undefined,
      backoff: values.BACKOFF,
    },
    limits: { maxParallelJobs: values.MAX_PARALLEL_JOBS },
    dryRun: values.DRY_RUN,
    verbose: values.VERBOSE_MODE,
    paths: {
      logFile: values.LOG_FILE,
      appsFile: resolve(baseDir, values.APPS_FILE ?? DEFAULTS.paths.appsFile),
    },
  };
  current = deepMerge(deepMerge(DEFAULTS, fromFile), opts.overrides ?? {});
  return current;
}

function pickKnown(values: Record<string, string>): Record<string, string> {
  const known: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    if (values[key] !== undefined) known[key] = values[key];
  }
  return known;
}
