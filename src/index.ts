#!/usr/bin/env node
import dotenv from 'dotenv';
import { Server } from 'http';
import { AppConfig, loadConfig } from './utils/config';
import { DexScreenerService } from './services/dexscreener';
import { FileAlertLedger } from './services/ledger';
import { TelegramService } from './services/telegram';
import { AlertNotifier } from './services/notifier';
import { PollCycle } from './services/pollCycle';
import { SchedulerService } from './services/scheduler';
import { HealthCheckService } from './services/health';
import { createStatusApp } from './services/statusServer';
import { AppError, logAppError } from './utils/errorHandler';
import { logger } from './utils/logger';

dotenv.config();

class NewPairScout {
  private readonly config: AppConfig;
  private readonly telegram: TelegramService;
  private readonly cycle: PollCycle;
  private readonly scheduler: SchedulerService;
  private server: Server | null = null;
  private isShuttingDown = false;

  constructor(config: AppConfig) {
    this.config = config;
    this.telegram = new TelegramService(config.telegramBotToken, config.telegramChatId);

    const ledger = new FileAlertLedger(config.ledgerFile);
    const source = new DexScreenerService({
      baseURL: config.dexScreenerBaseUrl,
      query: config.searchQuery,
      timeoutMs: config.requestTimeoutMs
    });
    const notifier = new AlertNotifier(this.telegram, {
      chatId: config.telegramChatId,
      network: config.filter.targetNetwork,
      timeoutMs: config.requestTimeoutMs
    });

    this.cycle = new PollCycle({ source, ledger, notifier, filter: config.filter });
    this.scheduler = new SchedulerService(this.cycle, {
      intervalSeconds: config.pollIntervalSeconds,
      timezone: config.timezone,
      runOnStart: config.runOnStart
    });

    logger.info('Configuration loaded', {
      targetNetwork: config.filter.targetNetwork,
      maxAgeMinutes: config.filter.maxAgeMinutes,
      minVolumeUsd: config.filter.minVolumeUsd,
      pollIntervalSeconds: config.pollIntervalSeconds,
      ledgerFile: ledger.getFilePath(),
      chatId: config.telegramChatId
    });
  }

  async runOnce(): Promise<number> {
    const report = await this.cycle.run();
    logger.info('Single cycle report', report);
    return report.outcome === 'completed' ? 0 : 1;
  }

  start(): void {
    this.setupProcessHandlers();
    this.scheduler.start();
    this.startStatusServer();
    logger.info('New pair scout started');
  }

  private startStatusServer(): void {
    const app = createStatusApp({
      health: new HealthCheckService(this.scheduler, this.config.nodeEnv),
      scheduler: this.scheduler,
      transport: this.telegram
    });

    this.server = app.listen(this.config.port, () => {
      logger.info(`Status server started on port ${this.config.port}`);
    });
  }

  private setupProcessHandlers(): void {
    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled rejection', reason);
    });

    process.on('SIGTERM', () => {
      logger.warn('SIGTERM received');
      this.shutdown(0).catch((error: unknown) => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
    });

    process.on('SIGINT', () => {
      logger.warn('SIGINT received');
      this.shutdown(0).catch((error: unknown) => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
    });
  }

  async shutdown(exitCode: number): Promise<void> {
    if (this.isShuttingDown) {
      logger.warn('Shutdown already in progress, forcing exit');
      process.exit(exitCode);
    }
    this.isShuttingDown = true;
    logger.info('Initiating graceful shutdown...');

    const shutdownTimeout = setTimeout(() => {
      logger.error('Shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, 30000);

    this.scheduler.stop();
    await this.scheduler.waitForIdle();

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      logger.info('Status server closed');
    }

    clearTimeout(shutdownTimeout);
    logger.info('Graceful shutdown completed');
    process.exit(exitCode);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const scout = new NewPairScout(config);

  if (process.argv.includes('--once')) {
    process.exit(await scout.runOnce());
  }

  scout.start();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof AppError) {
      logAppError(error);
    } else {
      logger.error('Failed to start new pair scout', error);
    }
    process.exit(1);
  });
}

export { NewPairScout };
