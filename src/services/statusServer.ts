import express from 'express';
import { HealthCheckService } from './health';
import { SchedulerService } from './scheduler';
import { BotIdentity } from '../types/telegram';
import { describeError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface TransportDiagnostics {
  sendTestMessage(): Promise<void>;
  getIdentity(): Promise<BotIdentity>;
}

export interface StatusServerDeps {
  health: HealthCheckService;
  scheduler: SchedulerService;
  transport: TransportDiagnostics;
}

/**
 * Operational endpoints. None of them touch the ledger directly: a manual run goes through
 * the scheduler, which keeps cycles one at a time.
 */
export function createStatusApp(deps: StatusServerDeps): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/', (_req: express.Request, res: express.Response) => {
    res.json({ message: 'New pair scout is running' });
  });

  app.get('/health', (_req: express.Request, res: express.Response) => {
    const status = deps.health.getHealthStatus();
    res.status(status.healthy ? 200 : 503).json(status);
  });

  app.post('/cycles', async (_req: express.Request, res: express.Response) => {
    const report = await deps.scheduler.triggerNow();
    res.json(report);
  });

  app.get('/test', async (_req: express.Request, res: express.Response) => {
    try {
      await deps.transport.sendTestMessage();
      res.json({ message: 'Test message sent successfully!' });
    } catch (error) {
      logger.error(`Test message failed: ${describeError(error)}`);
      res.status(502).json({ error: describeError(error) });
    }
  });

  app.get('/botinfo', async (_req: express.Request, res: express.Response) => {
    try {
      const identity = await deps.transport.getIdentity();
      res.json({
        bot_name: identity.botName,
        bot_username: identity.botUsername,
        chat_id: identity.chatId,
        chat_type: identity.chatType,
        chat_title: identity.chatTitle
      });
    } catch (error) {
      logger.error(`Error getting bot info: ${describeError(error)}`);
      res.status(502).json({ error: describeError(error) });
    }
  });

  return app;
}
