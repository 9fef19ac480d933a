import * as fs from "fs/promises";
import { IConfigService } from "@core/interfaces";
import {
  Result,
  AppConfig,
  DisplayConfig,
  ScrollConfig,
  PreviewConfig,
  LocationConfig,
  ModuleConfig,
  success,
  failure,
} from "@core/types";
import { ConfigError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { isNodeJSErrnoException, isRecord, toError } from "@utils/typeGuards";
import { formatZodIssues } from "@utils/validation";
import { appConfigSchema } from "./schema";

const logger = getLogger("ConfigService");

const DEFAULT_CONFIG_PATH = "./config/default.json";

export interface ConfigServiceOptions {
  /** Overrides CONFIG_PATH */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function readRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? { ...value } : {};
}

function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return value;
}

/**
 * Config Service Implementation
 *
 * Reads config/default.json, applies environment overrides and validates
 * the result. Configuration is read-only once initialized.
 */
export class ConfigService implements IConfigService {
  private isInitialized: boolean = false;
  private config: AppConfig;
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigServiceOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath =
      options.configPath ?? this.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
    this.config = appConfigSchema.parse({});
  }

  /**
   * Load and validate the configuration.
   * A missing file means built-in defaults; anything else that is wrong
   * with the file fails.
   */
  async initialize(): Promise<Result<void, ConfigError>> {
    if (this.isInitialized) {
      return success(undefined);
    }

    const fileResult = await this.loadConfigFile();
    if (!fileResult.success) {
      return fileResult;
    }

    const input = this.applyEnvOverrides(fileResult.data);
    const parsed = appConfigSchema.safeParse(input);
    if (!parsed.success) {
      return failure(ConfigError.validationFailed(formatZodIssues(parsed.error)));
    }

    this.config = parsed.data;
    this.isInitialized = true;

    const enabled = this.getEnabledModules().map((m) => m.name);
    logger.info(
      `Configuration loaded: ${this.config.display.width}x${this.config.display.height} ` +
        `@ ${this.config.display.tickRateHz} Hz, modules: ${enabled.join(", ") || "none"}`,
    );
    return success(undefined);
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getDisplayConfig(): DisplayConfig {
    return this.config.display;
  }

  getScrollConfig(): ScrollConfig {
    return this.config.scroll;
  }

  getPreviewConfig(): PreviewConfig {
    return this.config.preview;
  }

  getLocationConfig(): LocationConfig {
    return this.config.location;
  }

  getEnabledModules(): ModuleConfig[] {
    return this.config.modules.filter((module) => module.enabled);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  private async loadConfigFile(): Promise<Result<unknown, ConfigError>> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if (isNodeJSErrnoException(error) && error.code === "ENOENT") {
        logger.warn(
          `Configuration file ${this.configPath} not found, using defaults`,
        );
        return success({});
      }
      return failure(ConfigError.readError(this.configPath, toError(error)));
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return success(parsed);
    } catch (error) {
      return failure(ConfigError.invalidJSON(this.configPath, toError(error)));
    }
  }

  /**
   * Overlay environment variables on the raw file contents so that they
   * are validated together with it
   */
  private applyEnvOverrides(raw: unknown): unknown {
    if (!isRecord(raw)) {
      return raw;
    }
    const env = this.env;
    const config = { ...raw };

    const display = readRecord(config.display);
    if (env.DISPLAY_DRIVER) display.driver = env.DISPLAY_DRIVER;
    if (env.DISPLAY_WIDTH) display.width = Number(env.DISPLAY_WIDTH);
    if (env.DISPLAY_HEIGHT) display.height = Number(env.DISPLAY_HEIGHT);
    if (env.TICK_RATE_HZ) display.tickRateHz = Number(env.TICK_RATE_HZ);
    config.display = display;

    const preview = readRecord(config.preview);
    if (env.PREVIEW_ENABLED) preview.enabled = parseBoolean(env.PREVIEW_ENABLED);
    if (env.PREVIEW_PORT) preview.port = Number(env.PREVIEW_PORT);
    config.preview = preview;

    const apiKey = env.TRANSIT_API_KEY;
    if (apiKey && Array.isArray(config.modules)) {
      config.modules = config.modules.map((entry: unknown) => {
        if (!isRecord(entry) || entry.type !== "transit") {
          return entry;
        }
        return { ...entry, params: { ...readRecord(entry.params), apiKey } };
      });
    }

    return config;
  }
}
