import { Logger, Module } from '@nestjs/common';
import { EVALUATION_PROVIDER } from './evaluation.constants';
import { EvaluationConfigService } from './evaluation-config.service';
import { EvaluationLogsController } from './evaluation-logs.controller';
import { EvaluationLogsService } from './evaluation-logs.service';
import { EvaluationService } from './evaluation.service';
import { GeminiClientFactory } from './providers/gemini-client.factory';
import { GeminiProvider } from './providers/gemini.provider';
import { OllamaProvider } from './providers/ollama.provider';
import type { EvaluationProvider } from './providers/provider.interface';

@Module({
  controllers: [EvaluationLogsController],
  providers: [
    EvaluationConfigService,
    EvaluationLogsService,
    GeminiClientFactory,
    {
      provide: EVALUATION_PROVIDER,
      inject: [EvaluationConfigService, GeminiClientFactory],
      useFactory: (
        evaluationConfigService: EvaluationConfigService,
        clientFactory: GeminiClientFactory,
      ): EvaluationProvider => {
        const { provider } = evaluationConfigService.resolveRuntimeConfig();
        new Logger('EvaluationModule').log(`Using ${provider} evaluation provider`);
        return provider === 'ollama'
          ? new OllamaProvider(evaluationConfigService)
          : new GeminiProvider(evaluationConfigService, clientFactory);
      },
    },
    EvaluationService,
  ],
  exports: [EvaluationService, EvaluationLogsService],
})
export class EvaluationModule {}
