import { createServer, type Server } from "http";
import { getRequestListener } from "@hono/node-server";
import type { Plugin } from "../../core/plugin";
import type { Logger } from "../observability/types";
import { rootLogger } from "../observability/logger";
import { createHttpApp, type HttpApp, type HttpAppDeps } from "./http-app";

export interface ServerPluginOptions extends HttpAppDeps {
  port: number;
  host: string;
}

export class ServerPlugin implements Plugin {
  readonly name = "server";
  readonly app: HttpApp;
  private readonly port: number;
  private readonly host: string;
  private readonly logger: Logger;
  private server?: Server;

  constructor(options: ServerPluginOptions) {
    this.port = options.port;
    this.host = options.host;
    this.logger = (options.logger ?? rootLogger).child({ component: "Server" });
    this.app = createHttpApp(options);
  }

  async start(): Promise<void> {
    const server = createServer(getRequestListener(this.app.fetch));
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.server = server;
    this.logger.info(`Listening on http://${this.host}:${this.port}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.logger.info("Stopped");
  }
}
