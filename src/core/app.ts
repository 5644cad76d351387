import type { Plugin } from "./plugin";
import type { Logger } from "../domains/observability/types";
import { rootLogger } from "../domains/observability/logger";

export class Application {
  private plugins: Map<string, Plugin> = new Map();
  private started: Plugin[] = [];
  private logger: Logger;

  constructor(logger: Logger = rootLogger) {
    this.logger = logger.child({ component: "Core" });
  }

  use(plugin: Plugin) {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin ${plugin.name} is already registered.`);
    }
    this.plugins.set(plugin.name, plugin);
    this.logger.info(`Plugin registered: ${plugin.name}`);
    return this;
  }

  async start() {
    this.logger.info("Application starting...");
    for (const plugin of this.plugins.values()) {
      try {
        if (plugin.start) {
          await plugin.start();
        }
      } catch (error) {
        this.logger.error(`Plugin ${plugin.name} failed to start`, error);
        await this.stop();
        throw error;
      }
      this.started.push(plugin);
    }
    this.logger.info("Application started successfully.");
  }

  /**
   * Stops started plugins in reverse start order, so consumers shut down
   * before the resources they depend on.
   */
  async stop() {
    this.logger.info("Application stopping...");
    while (this.started.length > 0) {
      const plugin = this.started.pop();
      if (!plugin?.stop) continue;
      try {
        await plugin.stop();
      } catch (error) {
        this.logger.error(`Plugin ${plugin.name} failed to stop`, error);
      }
    }
    this.logger.info("Application stopped.");
  }
}
