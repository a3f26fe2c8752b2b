/**
 * Plugin Registry
 *
 * Explicit name → plugin maps injected into the provenance engine and the
 * pipeline runner. Registration happens during process setup; there is no
 * global registry and no folder scanning.
 *
 * ```typescript
 * const registries = createRegistries();
 * registries.processors.register(myProcessor);
 * registries.annotators.register(myAnnotator);
 *
 * const runner = new PipelineRunner(pipeline, registries);
 * ```
 */

import { PluginNotFoundError, ValidationError } from "@/lib/errors";
import { loggers } from "@/lib/logger";
import type {
  AnnotatorPlugin,
  ComputePlugin,
  ProcessorPlugin,
} from "@/types/plugins";

const logger = loggers.plugins;

export interface NamedPlugin {
  name: string;
}

export interface PluginLookup<T extends NamedPlugin> {
  lookup(name: string): T | undefined;
}

export class PluginRegistry<T extends NamedPlugin> implements PluginLookup<T> {
  private plugins = new Map<string, T>();

  constructor(private readonly kind: string) {}

  /**
   * Register a plugin under its name
   */
  register(plugin: T): this {
    this.validateName(plugin.name);

    if (this.plugins.has(plugin.name)) {
      logger.warn(`${this.kind} already registered, overwriting`, {
        name: plugin.name,
      });
    }

    this.plugins.set(plugin.name, plugin);
    logger.debug(`Registered ${this.kind}`, { name: plugin.name });
    return this;
  }

  registerMany(plugins: T[]): this {
    plugins.forEach((plugin) => this.register(plugin));
    return this;
  }

  unregister(name: string): boolean {
    return this.plugins.delete(name);
  }

  lookup(name: string): T | undefined {
    return this.plugins.get(name);
  }

  /**
   * Like lookup, but a missing plugin is an error
   */
  require(name: string): T {
    const plugin = this.plugins.get(name);
    if (!plugin) {
      throw new PluginNotFoundError(this.kind, name);
    }
    return plugin;
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  getAll(): T[] {
    return Array.from(this.plugins.values());
  }

  getNames(): string[] {
    return Array.from(this.plugins.keys());
  }

  get size(): number {
    return this.plugins.size;
  }

  private validateName(name: string): void {
    if (!name || name.trim() !== name) {
      throw new ValidationError(
        `Invalid ${this.kind} name "${name}". Must be a non-empty string without surrounding whitespace`,
      );
    }
  }
}

export interface PluginRegistries {
  processors: PluginRegistry<ProcessorPlugin>;
  annotators: PluginRegistry<AnnotatorPlugin>;
  computes: PluginRegistry<ComputePlugin>;
}

export function createRegistries(): PluginRegistries {
  return {
    processors: new PluginRegistry<ProcessorPlugin>("Processor"),
    annotators: new PluginRegistry<AnnotatorPlugin>("Annotator"),
    computes: new PluginRegistry<ComputePlugin>("Compute module"),
  };
}
