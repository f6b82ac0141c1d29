import { createApp } from './app.js';
import { loadConfig, readConfigFile } from './config.js';
import { createLogger, setLogLevel } from './logger.js';
import { Scheduler } from './scheduler.js';

const log = createLogger('main');

const configFile = process.env.CONFIG_FILE;
const config = loadConfig(configFile);
if (config.log_level) setLogLevel(config.log_level);
const scheduler = new Scheduler(config);

// Fail fast when the snapshot directory cannot be used
await scheduler.ensureStorage();
scheduler.start();

const app = createApp(scheduler, {
  readConfig: () => readConfigFile(configFile),
  title: process.env.APP_TITLE,
});

const port = config.port;
const server = app.listen(port, () => {
  log.info(`Snapwatch running at http://localhost:${port}`);
  log.info(`Capturing ${config.camera.snapshot_url || '(no URL)'} every ${config.schedule.interval_seconds}s`);
});

function shutdown(signal: string): void {
  log.info(`Received ${signal}, shutting down`);
  scheduler.stop();
  server.close();
  // Open event streams would otherwise keep the process alive
  server.closeAllConnections();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
