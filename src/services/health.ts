import { SchedulerService, SchedulerStatus } from './scheduler';
import { SerializedError } from '../utils/errorHandler';
import { Formatters } from '../utils/formatters';

export interface HealthStatus {
  healthy: boolean;
  timestamp: string;
  uptime: string;
  environment: string;
  scheduler: SchedulerStatus;
  lastError: SerializedError | null;
  memory: {
    rssMB: number;
    heapUsedMB: number;
  };
}

export class HealthCheckService {
  private readonly scheduler: SchedulerService;
  private readonly environment: string;
  private readonly startTime: number;

  constructor(scheduler: SchedulerService, environment: string, startTime: number = Date.now()) {
    this.scheduler = scheduler;
    this.environment = environment;
    this.startTime = startTime;
  }

  getHealthStatus(now: number = Date.now()): HealthStatus {
    const scheduler = this.scheduler.getStatus();
    const memory = process.memoryUsage();

    return {
      healthy: scheduler.alive,
      timestamp: new Date(now).toISOString(),
      uptime: Formatters.formatDuration(now - this.startTime),
      environment: this.environment,
      scheduler,
      lastError: scheduler.lastError,
      memory: {
        rssMB: Math.round(memory.rss / 1024 / 1024),
        heapUsedMB: Math.round(memory.heapUsed / 1024 / 1024)
      }
    };
  }
}
