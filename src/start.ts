import 'dotenv/config';
import { ConfigurationManager } from './detection/ConfigurationManager.js';
import { SessionManager } from './detection/SessionManager.js';
import { DetectionLogger } from './utils/logger/detectionLogger.js';
import { AlertNotifier } from './utils/logger/alertNotifier.js';
import { installFileLogger } from './utils/logger/fileLogger.js';
import { createApp } from './server.js';

function startServer() {
  const config = new ConfigurationManager().getConfig();

  const restoreConsole = installFileLogger({
    logFile: config.logging.appLogPath,
    retentionDays: config.logging.retentionDays,
  });

  const manager = new SessionManager(config.detection, Date.now, config.retainStoppedSessions);
  const detectionLogger = new DetectionLogger({ eventLogPath: config.logging.eventLogPath });
  detectionLogger.attach(manager);
  new AlertNotifier({
    webhookUrl: config.alerts.webhookUrl,
    cooldown: config.alerts.webhookCooldown,
  }).attach(manager);

  const app = createApp({ manager, detectionLogger, rateLimit: config.server.rateLimit });

  if (config.autoStart) {
    manager.startSession();
  }

  const server = app.listen(config.server.port, () => {
    console.log(`Deauth monitor listening on port ${config.server.port}`);
  });

  const shutdown = () => {
    manager.stopAll();
    detectionLogger.flush();
    server.close(() => {
      restoreConsole()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Failed to flush application log:', error);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  startServer();
} catch (error) {
  console.error('Failed to start deauth monitor:', error);
  process.exit(1);
}
