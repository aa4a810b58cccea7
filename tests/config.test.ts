import { expect } from "chai";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { parseProjectConfig } from "../src/config/configFile";
import { resolveAppConfig } from "../src/config/runtime";
import { ConfigError } from "../src/errors";
import { withTempDir } from "./fixtures";

const sampleToml = `
[server]
host = "0.0.0.0"
port = 9000

[storage]
data_file = "data/orders.csv"

[display]
currency_symbol = "$"
`;

describe("configuration", () => {
  it("parses and validates the TOML file", () => {
    const config = parseProjectConfig(sampleToml);
    expect(config.server).to.deep.equal({ host: "0.0.0.0", port: 9000 });
    expect(config.storage?.data_file).to.equal("data/orders.csv");
  });

  it("rejects malformed TOML and bad values", () => {
    expect(() => parseProjectConfig("[server\nport = 1")).to.throw(ConfigError, /Failed to parse/);
    expect(() => parseProjectConfig('[server]\nport = "high"')).to.throw(
      ConfigError,
      /server\.port/,
    );
    expect(() => parseProjectConfig('[logging]\nlevel = "loud"')).to.throw(ConfigError);
  });

  it("resolves the file over the defaults", () =>
    withTempDir(async (dir) => {
      const configPath = path.join(dir, "order-flow.config.toml");
      await writeFile(configPath, sampleToml, "utf-8");

      const config = resolveAppConfig({ configPath, env: {} });
      expect(config.server).to.deep.equal({ host: "0.0.0.0", port: 9000 });
      expect(config.storage).to.deep.equal({
        dataFile: path.join(dir, "data", "orders.csv"),
        testDataFile: path.join(dir, "sample_orders.csv"),
      });
      expect(config.display).to.deep.equal({ currencySymbol: "$", pdfCurrencySymbol: "Rs. " });
      expect(config.logging.level).to.equal("info");
    }));

  it("lets the environment and overrides win", () =>
    withTempDir(async (dir) => {
      const configPath = path.join(dir, "order-flow.config.toml");
      await writeFile(configPath, sampleToml, "utf-8");

      const config = resolveAppConfig({
        configPath,
        env: {
          ORDER_FLOW_SERVER__PORT: " 9100 ",
          ORDER_FLOW_LOGGING__LEVEL: "DEBUG",
          ORDER_FLOW_DISPLAY__CURRENCY_SYMBOL: "  ",
        },
        overrides: { server: { host: "localhost" } },
      });
      expect(config.server).to.deep.equal({ host: "localhost", port: 9100 });
      expect(config.logging.level).to.equal("debug");
      expect(config.display.currencySymbol).to.equal("$");
    }));

  it("rejects invalid environment values", () =>
    withTempDir(async (dir) => {
      const configPath = path.join(dir, "order-flow.config.toml");
      await writeFile(configPath, sampleToml, "utf-8");
      expect(() =>
        resolveAppConfig({ configPath, env: { ORDER_FLOW_SERVER__PORT: "eighty" } }),
      ).to.throw(ConfigError, /ORDER_FLOW_SERVER__PORT/);
    }));

  it("fails on an explicit path that does not exist", () => {
    expect(() =>
      resolveAppConfig({ configPath: path.join("/nonexistent", "order-flow.config.toml"), env: {} }),
    ).to.throw(ConfigError, /Config file not found/);
  });
});
