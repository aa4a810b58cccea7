import path from "node:path";
import { ConfigError } from "../errors";
import {
  LOG_LEVELS,
  readProjectConfig,
  type LogLevel,
  type ProjectConfig,
} from "./configFile";

export interface AppConfig {
  server: {
    host: string;
    port: number;
  };
  storage: {
    /** Absolute path of the live order table */
    dataFile: string;
    /** Absolute path of the table served in test mode */
    testDataFile: string;
  };
  display: {
    currencySymbol: string;
    pdfCurrencySymbol: string;
  };
  logging: {
    level: LogLevel;
  };
}

export type AppConfigOverrides = {
  [Section in keyof AppConfig]?: Partial<AppConfig[Section]>;
};

export interface ResolveConfigOptions {
  /** Explicit config file; otherwise the nearest order-flow.config.toml */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: AppConfigOverrides;
}

const ENV_PREFIX = "ORDER_FLOW_";

const defaults = {
  host: "127.0.0.1",
  port: 8501,
  dataFile: "orders.csv",
  testDataFile: "sample_orders.csv",
  currencySymbol: "₹",
  pdfCurrencySymbol: "Rs. ",
  level: "info",
} as const;

function readEnv(
  env: NodeJS.ProcessEnv,
  section: string,
  key: string,
): string | undefined {
  const value = env[`${ENV_PREFIX}${section}__${key}`];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(
      `${ENV_PREFIX}SERVER__PORT must be a port number, got "${value}"`,
    );
  }
  return port;
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const level = LOG_LEVELS.find((candidate) => candidate === value.toLowerCase());
  if (!level) {
    throw new ConfigError(
      `${ENV_PREFIX}LOGGING__LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`,
    );
  }
  return level;
}

/**
 * Resolves the runtime configuration. Precedence is explicit overrides, then
 * `ORDER_FLOW_<SECTION>__<KEY>` environment variables, then the config file,
 * then built-in defaults. Relative data file paths resolve against the config
 * file's directory, or the working directory when there is no file.
 */
export function resolveAppConfig(options: ResolveConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const found = readProjectConfig(options.configPath);
  const file: ProjectConfig = found?.config ?? {};
  const baseDir = found ? path.dirname(found.path) : process.cwd();

  const dataFile =
    overrides.storage?.dataFile ??
    readEnv(env, "STORAGE", "DATA_FILE") ??
    file.storage?.data_file ??
    defaults.dataFile;
  const testDataFile =
    overrides.storage?.testDataFile ??
    readEnv(env, "STORAGE", "TEST_DATA_FILE") ??
    file.storage?.test_data_file ??
    defaults.testDataFile;

  return {
    server: {
      host:
        overrides.server?.host ??
        readEnv(env, "SERVER", "HOST") ??
        file.server?.host ??
        defaults.host,
      port:
        overrides.server?.port ??
        parsePort(readEnv(env, "SERVER", "PORT")) ??
        file.server?.port ??
        defaults.port,
    },
    storage: {
      dataFile: path.resolve(baseDir, dataFile),
      testDataFile: path.resolve(baseDir, testDataFile),
    },
    display: {
      currencySymbol:
        overrides.display?.currencySymbol ??
        readEnv(env, "DISPLAY", "CURRENCY_SYMBOL") ??
        file.display?.currency_symbol ??
        defaults.currencySymbol,
      pdfCurrencySymbol:
        overrides.display?.pdfCurrencySymbol ??
        // untrimmed: the label usually ends in a space
        env[`${ENV_PREFIX}DISPLAY__PDF_CURRENCY_SYMBOL`] ??
        file.display?.pdf_currency_symbol ??
        defaults.pdfCurrencySymbol,
    },
    logging: {
      level:
        overrides.logging?.level ??
        parseLevel(readEnv(env, "LOGGING", "LEVEL")) ??
        file.logging?.level ??
        defaults.level,
    },
  };
}
