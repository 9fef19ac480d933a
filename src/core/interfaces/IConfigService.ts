import {
  Result,
  AppConfig,
  DisplayConfig,
  ScrollConfig,
  PreviewConfig,
  LocationConfig,
  ModuleConfig,
} from "@core/types";
import { ConfigError } from "@core/errors";

/**
 * Config Service Interface
 *
 * Loads and validates the application configuration. Configuration is
 * read once at startup and is read-only afterwards.
 */
export interface IConfigService {
  /**
   * Load the configuration file and apply environment overrides
   * @returns Result indicating success or failure
   */
  initialize(): Promise<Result<void, ConfigError>>;

  /**
   * Get the complete application configuration
   */
  getConfig(): AppConfig;

  getDisplayConfig(): DisplayConfig;

  getScrollConfig(): ScrollConfig;

  getPreviewConfig(): PreviewConfig;

  getLocationConfig(): LocationConfig;

  /**
   * Enabled modules in rotation order
   */
  getEnabledModules(): ModuleConfig[];
}
