import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { EvaluationService } from '../evaluation/evaluation.service';
import type { ProviderName } from '../evaluation/evaluation.types';

type HealthStatus = 'healthy' | 'unhealthy' | 'degraded';

type ServiceHealth = {
  status: HealthStatus;
  message?: string;
  responseTime?: number;
};

type ProviderHealth = ServiceHealth & {
  providerName: ProviderName;
  modelName: string;
};

export type OverallHealth = {
  status: HealthStatus;
  timestamp: string;
  services: {
    database: ServiceHealth;
    evaluation: ProviderHealth;
  };
  uptime: number;
};

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly startTime = Date.now();

  constructor(
    private readonly database: DatabaseService,
    private readonly evaluationService: EvaluationService,
  ) {}

  async getHealth(): Promise<OverallHealth> {
    const database = this.checkDatabase();
    const evaluation = await this.checkEvaluationProvider();

    const status: HealthStatus =
      database.status === 'unhealthy' ? 'unhealthy' : evaluation.status === 'healthy' ? 'healthy' : 'degraded';

    return {
      status,
      timestamp: new Date().toISOString(),
      services: { database, evaluation },
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
    };
  }

  private checkDatabase(): ServiceHealth {
    const start = Date.now();
    const healthy = this.database.isHealthy();
    return {
      status: healthy ? 'healthy' : 'unhealthy',
      ...(!healthy && { message: 'Database query failed' }),
      responseTime: Date.now() - start,
    };
  }

  private async checkEvaluationProvider(): Promise<ProviderHealth> {
    const start = Date.now();
    const status = await this.evaluationService.getStatus();
    if (!status.available) {
      this.logger.warn(`Evaluation provider ${status.providerName} unavailable: ${status.reason ?? 'unknown'}`);
    }
    return {
      providerName: status.providerName,
      modelName: status.modelName,
      status: status.available ? 'healthy' : 'degraded',
      ...(status.reason && { message: status.reason }),
      responseTime: Date.now() - start,
    };
  }
}
