import { Module } from '@nestjs/common';

import { envs } from '../../config/envs';
import { ExtractionsController } from './extractions.controller';
import { ExtractionsService } from './extractions.service';
import { ExportService } from './exporters';
import { EXTRACTOR_OPTIONS, type ExtractorOptions } from './extractor-options';
import { OpenAiService } from './openai.service';

@Module({
  controllers: [ExtractionsController],
  providers: [
    {
      provide: EXTRACTOR_OPTIONS,
      useFactory: (): ExtractorOptions => ({
        apiKey: envs.openAiApiKey,
        model: envs.openAiModel,
        timeoutMs: envs.openAiTimeoutMs,
        maxRetries: envs.openAiMaxRetries,
        maxOutputTokens: envs.openAiMaxOutputTokens,
        prompt: { language: envs.extractionLanguage },
      }),
    },
    ExtractionsService,
    OpenAiService,
    ExportService,
  ],
})
export class ExtractionsModule {}
