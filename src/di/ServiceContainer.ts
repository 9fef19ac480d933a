import {
  IConfigService,
  IDisplayOrchestrator,
  IFrameBuffer,
  IMatrixDriver,
  IBrightnessController,
  IPreviewServer,
  SunTimes,
} from "@core/interfaces";
import {
  DisplayConfig,
  MatrixDriverType,
  Result,
  WeatherData,
  success,
  failure,
} from "@core/types";
import { ConfigError, DisplayError } from "@core/errors";
import { ConfigService } from "@services/config/ConfigService";
import { FrameBuffer } from "@services/matrix/FrameBuffer";
import {
  EmulatorMatrixDriver,
  TerminalMatrixDriver,
} from "@services/matrix/drivers";
import {
  ModuleRegistry,
  createDefaultModuleRegistry,
} from "@services/modules/ModuleRegistry";
import { DisplayOrchestrator } from "@services/orchestrator/DisplayOrchestrator";
import { BrightnessController } from "@services/brightness/BrightnessController";
import { WeatherModule, sunTimesOf } from "@services/sources/weather/WeatherModule";
import { PreviewServer } from "@web/PreviewServer";
import { getLogger } from "@utils/logger";

const logger = getLogger("ServiceContainer");

/**
 * Matrix driver factory function type
 */
type DriverFactory = (config: DisplayConfig) => IMatrixDriver;

/**
 * Service Container (Dependency Injection Container)
 *
 * Singleton that manages service instances and their dependencies.
 * Provides factory methods for production and test setters for mocking.
 */
export class ServiceContainer {
  private static instance: ServiceContainer;

  private services: {
    config?: IConfigService;
    frameBuffer?: IFrameBuffer;
    driver?: IMatrixDriver;
    modules?: ModuleRegistry;
    orchestrator?: IDisplayOrchestrator;
    brightness?: IBrightnessController;
    preview?: IPreviewServer;
  } = {};

  /**
   * Sunrise/sunset source for the brightness controller, set when a
   * weather module is registered
   */
  private sunTimesProvider: (() => SunTimes | null) | null = null;

  /**
   * Registry of matrix driver factories
   * Key: driver name (e.g., 'emulator')
   * Value: factory function that creates the driver
   */
  private driverFactories: Map<string, DriverFactory> = new Map();

  private constructor() {
    this.registerDefaultDrivers();
  }

  /**
   * Register the built-in matrix drivers
   */
  private registerDefaultDrivers(): void {
    this.registerMatrixDriver(
      MatrixDriverType.EMULATOR,
      () => new EmulatorMatrixDriver(),
    );
    this.registerMatrixDriver(
      MatrixDriverType.TERMINAL,
      () => new TerminalMatrixDriver(),
    );
  }

  /**
   * Get singleton instance
   */
  static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer();
    }
    return ServiceContainer.instance;
  }

  /**
   * Reset the container (useful for testing)
   */
  static reset(): void {
    if (ServiceContainer.instance) {
      ServiceContainer.instance.services = {};
      ServiceContainer.instance.sunTimesProvider = null;
      ServiceContainer.instance.driverFactories.clear();
      ServiceContainer.instance.registerDefaultDrivers();
    }
  }

  // Matrix Driver Management

  /**
   * Register a matrix driver factory
   * @param name Driver identifier used in display.driver
   */
  registerMatrixDriver(name: string, factory: DriverFactory): void {
    this.driverFactories.set(name, factory);
  }

  /**
   * Get list of registered driver names
   */
  getRegisteredDrivers(): string[] {
    return Array.from(this.driverFactories.keys());
  }

  /**
   * Create a matrix driver by name
   */
  createMatrixDriver(
    name: string,
    config: DisplayConfig,
  ): Result<IMatrixDriver, DisplayError> {
    const factory = this.driverFactories.get(name);
    if (!factory) {
      return failure(DisplayError.unknownDriver(name, this.getRegisteredDrivers()));
    }
    return success(factory(config));
  }

  // Factory methods for production

  /**
   * Get Config Service
   */
  getConfigService(): IConfigService {
    if (!this.services.config) {
      this.services.config = new ConfigService();
    }
    return this.services.config;
  }

  /**
   * Get the frame buffer sized from the display configuration
   */
  getFrameBuffer(): IFrameBuffer {
    if (!this.services.frameBuffer) {
      const { width, height } = this.getConfigService().getDisplayConfig();
      this.services.frameBuffer = new FrameBuffer(width, height);
    }
    return this.services.frameBuffer;
  }

  /**
   * Get the configured matrix driver
   * @throws DisplayError when display.driver has no registered factory
   */
  getMatrixDriver(): IMatrixDriver {
    if (!this.services.driver) {
      const config = this.getConfigService().getDisplayConfig();
      const driver = this.createMatrixDriver(config.driver, config);
      if (!driver.success) {
        throw driver.error;
      }
      this.services.driver = driver.data;
    }
    return this.services.driver;
  }

  getModuleRegistry(): ModuleRegistry {
    if (!this.services.modules) {
      this.services.modules = createDefaultModuleRegistry();
    }
    return this.services.modules;
  }

  /**
   * Get Display Orchestrator
   */
  getDisplayOrchestrator(): IDisplayOrchestrator {
    if (!this.services.orchestrator) {
      const display = this.getConfigService().getDisplayConfig();
      this.services.orchestrator = new DisplayOrchestrator(
        this.getFrameBuffer(),
        this.getMatrixDriver(),
        { maxConcurrentRefreshes: display.maxConcurrentRefreshes },
      );
    }
    return this.services.orchestrator;
  }

  getBrightnessController(): IBrightnessController {
    if (!this.services.brightness) {
      const config = this.getConfigService();
      this.services.brightness = new BrightnessController({
        config: config.getDisplayConfig().brightness,
        timeZone: config.getLocationConfig().timezone,
        driver: this.getMatrixDriver(),
        sunTimes: () => this.getSunTimes(),
      });
    }
    return this.services.brightness;
  }

  getPreviewServer(): IPreviewServer {
    if (!this.services.preview) {
      this.services.preview = new PreviewServer(
        this.getConfigService().getPreviewConfig(),
        this.getDisplayOrchestrator(),
        this.getFrameBuffer(),
      );
    }
    return this.services.preview;
  }

  /**
   * Build every enabled module from the configuration and add it to the
   * orchestrator in configuration order
   * @returns Names of the registered modules
   */
  registerModules(): Result<string[], ConfigError> {
    const config = this.getConfigService();
    const context = {
      scroll: config.getScrollConfig(),
      location: config.getLocationConfig(),
    };
    const registry = this.getModuleRegistry();
    const orchestrator = this.getDisplayOrchestrator();
    const names: string[] = [];

    for (const entry of config.getEnabledModules()) {
      const created = registry.create(entry, context);
      if (!created.success) {
        return created;
      }
      const { module, descriptor } = created.data;
      if (module instanceof WeatherModule) {
        const weather = orchestrator.register<WeatherData>(module, descriptor);
        if (!weather.success) {
          return weather;
        }
        if (!this.sunTimesProvider) {
          const reader = weather.data;
          this.sunTimesProvider = () => sunTimesOf(reader.getCache());
        }
      } else {
        const registered = orchestrator.register(module, descriptor);
        if (!registered.success) {
          return registered;
        }
      }
      names.push(descriptor.name);
      logger.info(`Registered module ${descriptor.name} (${entry.type})`);
    }

    return success(names);
  }

  /**
   * Sun times from the first weather module's applied cache
   */
  getSunTimes(): SunTimes | null {
    return this.sunTimesProvider?.() ?? null;
  }

  // Test setters

  setConfigService(service: IConfigService): void {
    this.services.config = service;
  }

  setFrameBuffer(frameBuffer: IFrameBuffer): void {
    this.services.frameBuffer = frameBuffer;
  }

  setMatrixDriver(driver: IMatrixDriver): void {
    this.services.driver = driver;
  }

  setDisplayOrchestrator(orchestrator: IDisplayOrchestrator): void {
    this.services.orchestrator = orchestrator;
  }

  setBrightnessController(controller: IBrightnessController): void {
    this.services.brightness = controller;
  }

  setPreviewServer(server: IPreviewServer): void {
    this.services.preview = server;
  }
}
