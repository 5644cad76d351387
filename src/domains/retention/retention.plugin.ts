import type { Plugin } from "../../core/plugin";
import { RetentionSweeper, type RetentionSweeperOptions } from "./sweeper";

export class RetentionPlugin implements Plugin {
  readonly name = "retention";
  readonly sweeper: RetentionSweeper;

  constructor(options: RetentionSweeperOptions) {
    this.sweeper = new RetentionSweeper(options);
  }

  async start(): Promise<void> {
    await this.sweeper.start();
  }

  async stop(): Promise<void> {
    await this.sweeper.stop();
  }
}
