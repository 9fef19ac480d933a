import {
  LocationConfig,
  ModuleConfig,
  ModuleDescriptor,
  ModuleType,
  Result,
  ScrollConfig,
  success,
  failure,
} from "@core/types";
import { DisplayModule } from "@core/interfaces/IDisplayModule";
import { ConfigError } from "@core/errors/ConfigError";
import { MODULE_STALE_INTERVAL_MULTIPLIER } from "@core/constants/defaults";
import { SportsModule } from "@services/sources/sports/SportsModule";
import { TransitModule } from "@services/sources/transit/TransitModule";
import { BikeShareModule } from "@services/sources/bikeshare/BikeShareModule";
import { WeatherModule } from "@services/sources/weather/WeatherModule";
import { NewsModule } from "@services/sources/news/NewsModule";

/**
 * Settings shared by every module, passed to each factory
 */
export type ModuleFactoryContext = {
  scroll: ScrollConfig;
  location: LocationConfig;
};

/**
 * Builds a module from its configuration entry
 */
export type ModuleFactory = (
  config: ModuleConfig,
  context: ModuleFactoryContext,
) => Result<DisplayModule<unknown>, ConfigError>;

type ModuleConfigOf<K extends ModuleType> = Extract<ModuleConfig, { type: K }>;

function isModuleOfType<K extends ModuleType>(
  config: ModuleConfig,
  type: K,
): config is ModuleConfigOf<K> {
  return config.type === type;
}

/**
 * Wrap a constructor for one module type into a ModuleFactory
 */
export function factoryFor<K extends ModuleType>(
  type: K,
  build: (config: ModuleConfigOf<K>, context: ModuleFactoryContext) => DisplayModule<unknown>,
): ModuleFactory {
  return (config, context) => {
    if (!isModuleOfType(config, type)) {
      return failure(ConfigError.unknownModuleType(config.type));
    }
    return success(build(config, context));
  };
}

/**
 * Orchestrator descriptor for a configuration entry. The stale window
 * defaults to three refresh intervals.
 */
export function descriptorFor(config: ModuleConfig): ModuleDescriptor {
  return {
    name: config.name,
    refreshIntervalSeconds: config.refreshIntervalSeconds,
    displayDurationSeconds: config.displayDurationSeconds,
    staleAfterSeconds:
      config.staleAfterSeconds ??
      config.refreshIntervalSeconds * MODULE_STALE_INTERVAL_MULTIPLIER,
  };
}

/**
 * Registry of module factories keyed by module type
 */
export class ModuleRegistry {
  private factories: Map<string, ModuleFactory> = new Map();

  register(type: string, factory: ModuleFactory): void {
    this.factories.set(type, factory);
  }

  getRegisteredTypes(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Build the module and its descriptor for a configuration entry
   */
  create(
    config: ModuleConfig,
    context: ModuleFactoryContext,
  ): Result<{ module: DisplayModule<unknown>; descriptor: ModuleDescriptor }, ConfigError> {
    const factory = this.factories.get(config.type);
    if (!factory) {
      return failure(ConfigError.unknownModuleType(config.type));
    }

    const module = factory(config, context);
    if (!module.success) {
      return module;
    }
    return success({ module: module.data, descriptor: descriptorFor(config) });
  }
}

/**
 * Registry with the built-in module types
 */
export function createDefaultModuleRegistry(): ModuleRegistry {
  const registry = new ModuleRegistry();

  registry.register(
    "sports",
    factoryFor("sports", (config, { location }) =>
      new SportsModule({
        name: config.name,
        params: config.params,
        timeZone: location.timezone,
      }),
    ),
  );
  registry.register(
    "transit",
    factoryFor("transit", (config) =>
      new TransitModule({
        name: config.name,
        params: config.params,
        displayDurationSeconds: config.displayDurationSeconds,
      }),
    ),
  );
  registry.register(
    "bikeshare",
    factoryFor("bikeshare", (config) =>
      new BikeShareModule({
        name: config.name,
        params: config.params,
        displayDurationSeconds: config.displayDurationSeconds,
      }),
    ),
  );
  registry.register(
    "weather",
    factoryFor("weather", (config, { location }) =>
      new WeatherModule({
        name: config.name,
        params: config.params,
        location,
        displayDurationSeconds: config.displayDurationSeconds,
      }),
    ),
  );
  registry.register(
    "news",
    factoryFor("news", (config, { scroll }) =>
      new NewsModule({
        name: config.name,
        params: config.params,
        scroll,
        displayDurationSeconds: config.displayDurationSeconds,
      }),
    ),
  );

  return registry;
}
