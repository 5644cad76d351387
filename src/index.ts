import { Application } from "./core/app";
import { loadSettings } from "./domains/config/settings";
import { CameraPlugin } from "./domains/camera/camera.plugin";
import { CaptureCoordinator } from "./domains/capture/coordinator";
import { ImageStorage } from "./domains/storage/image-storage";
import { RetentionPlugin } from "./domains/retention/retention.plugin";
import { ServerPlugin } from "./domains/server/server.plugin";
import { rootLogger } from "./domains/observability/logger";

const logger = rootLogger.child({ component: "Bootstrap" });
const app = new Application();

async function bootstrap() {
  try {
    const settings = loadSettings();
    logger.info("Configuration loaded", {
      storageDir: settings.storageDir,
      defaultResolution: settings.defaultResolution,
      defaultFormat: settings.defaultFormat,
      retentionSeconds: settings.retentionSeconds,
    });

    const storage = new ImageStorage(settings.storageDir);
    await storage.ensureDir();

    const camera = new CameraPlugin(settings);
    const coordinator = new CaptureCoordinator({
      fleet: () => camera.fleet,
      storage,
      defaults: settings,
    });

    // Stop runs in reverse: server, then sweeper, then cameras.
    app.use(camera);
    app.use(
      new RetentionPlugin({
        directory: settings.storageDir,
        retentionSeconds: settings.retentionSeconds,
        intervalSeconds: settings.cleanupIntervalSeconds,
      })
    );
    app.use(new ServerPlugin({ port: settings.port, host: settings.host, coordinator, storage }));

    await app.start();
  } catch (error) {
    logger.error("Failed to start", error);
    process.exit(1);
  }
}

let shuttingDown = false;
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`Received ${signal}, shutting down`);
  await app.stop();
  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

void bootstrap();
