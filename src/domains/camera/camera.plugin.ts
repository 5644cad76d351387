import type { Plugin } from "../../core/plugin";
import type { Settings } from "../config/settings";
import type { Logger } from "../observability/types";
import { rootLogger } from "../observability/logger";
import { initializeFleet, type CameraFleet, type FleetOptions } from "./fleet";

export class CameraPlugin implements Plugin {
  readonly name = "camera";
  private current?: CameraFleet;
  private readonly logger: Logger;

  constructor(
    private readonly settings: Settings,
    private readonly options: FleetOptions = {}
  ) {
    this.logger = (options.logger ?? rootLogger).child({ component: "CameraPlugin" });
  }

  /** The started fleet. Throws when read before `start()` finished. */
  get fleet(): CameraFleet {
    if (!this.current) {
      throw new Error("Camera fleet is not initialized.");
    }
    return this.current;
  }

  async start(): Promise<void> {
    this.current = await initializeFleet(this.settings, this.options);
  }

  async stop(): Promise<void> {
    const fleet = this.current;
    this.current = undefined;
    if (!fleet) return;
    this.logger.info("Releasing camera fleet");
    await fleet.shutdown();
  }
}
