import { Inject, Injectable, Logger } from '@nestjs/common';
import { RpcException } from '@nestjs/microservices';

import { EmptyInputError, UpstreamError } from '../../common/errors';
import { ExtractInvoiceDto } from './dto';
import { ExportService } from './exporters';
import { EXTRACTOR_OPTIONS, type ExtractorOptions } from './extractor-options';
import type { ExportFormat, ExtractionReply } from './interfaces';
import { OpenAiService } from './openai.service';
import { buildPrompt } from './prompt.builder';
import { parseResponse } from './response.parser';

const DEFAULT_EXPORT_FORMATS: readonly ExportFormat[] = ['txt'];

@Injectable()
export class ExtractionsService {
  private readonly logger = new Logger(ExtractionsService.name);

  constructor(
    @Inject(EXTRACTOR_OPTIONS) private readonly options: ExtractorOptions,
    private readonly openAi: OpenAiService,
    private readonly exportService: ExportService,
  ) {}

  async extract(payload: ExtractInvoiceDto): Promise<ExtractionReply> {
    try {
      const image = Buffer.from(payload.buffer, 'base64');
      if (image.byteLength === 0) {
        throw new EmptyInputError('Please upload an invoice image first');
      }

      const prompt = buildPrompt(
        { mode: payload.mode, question: payload.question },
        this.options.prompt,
      );

      this.logger.log(`🔍 Analyzing ${payload.filename} in ${payload.mode} mode...`);
      const raw = await this.openAi.analyzeImage({
        image,
        mimetype: payload.mimetype,
        prompt,
        structured: payload.mode === 'auto',
      });

      const result = parseResponse(raw, payload.mode);
      this.logger.log(`✅ ${payload.filename} analyzed (${result.kind})`);

      const { artifacts, failures } = await this.exportService.exportAll(
        result,
        payload.formats ?? DEFAULT_EXPORT_FORMATS,
      );

      return {
        result,
        artifacts: artifacts.map((artifact) => ({
          format: artifact.format,
          filename: artifact.filename,
          contentType: artifact.contentType,
          data: artifact.content.toString('base64'),
        })),
        failures,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  health() {
    return {
      status: 'ok',
      model: this.openAi.model,
    };
  }

  private handleError(error: unknown): RpcException {
    if (error instanceof RpcException) {
      return error;
    }

    if (error instanceof EmptyInputError) {
      return new RpcException({ status: 400, message: error.message });
    }

    if (error instanceof UpstreamError) {
      this.logger.warn(`⚠️ ${error.message}`);
      return new RpcException({ status: 502, message: error.message });
    }

    this.logger.error(error);
    return new RpcException({ status: 500, message: 'Internal server error' });
  }
}
