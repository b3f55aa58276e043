import { Inject, Injectable, Logger } from '@nestjs/common';
import OpenAI from 'openai';
import type { ResponseFormatTextConfig } from 'openai/resources/responses/responses';

import { UpstreamError } from '../../common/errors';
import { buildExtractionSchema } from './prompt.builder';
import { EXTRACTOR_OPTIONS, type ExtractorOptions } from './extractor-options';

export interface AnalyzeImageParams {
  image: Buffer;
  mimetype: string;
  prompt: string;
  /** Ask for a JSON-schema constrained response instead of free text. */
  structured: boolean;
}

const statusOf = (error: unknown): number | null =>
  typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
    ? error.status
    : null;

@Injectable()
export class OpenAiService {
  private readonly logger = new Logger(OpenAiService.name);
  private readonly client: OpenAI;

  constructor(@Inject(EXTRACTOR_OPTIONS) private readonly options: ExtractorOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries,
    });
  }

  get model(): string {
    return this.options.model;
  }

  private textFormat(structured: boolean): ResponseFormatTextConfig {
    if (!structured) {
      return { type: 'text' };
    }

    return {
      type: 'json_schema',
      name: 'invoice_extraction',
      schema: buildExtractionSchema(),
      strict: true,
    };
  }

  /**
   * Sends the image and prompt in a single request and returns the model's
   * output text.
   */
  async analyzeImage(params: AnalyzeImageParams): Promise<string> {
    const encodedImage = params.image.toString('base64');

    let text: string;
    try {
      const response = await this.client.responses.create({
        model: this.options.model,
        input: [
          {
            role: 'user',
            content: [
              { type: 'input_text', text: params.prompt },
              {
                type: 'input_image',
                image_url: `data:${params.mimetype};base64,${encodedImage}`,
                detail: 'auto',
              },
            ],
          },
        ],
        text: { format: this.textFormat(params.structured) },
        max_output_tokens: this.options.maxOutputTokens,
      });
      text = response.output_text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`OpenAI request failed: ${message}`);
      throw new UpstreamError(`Model request failed: ${message}`, statusOf(error), {
        cause: error,
      });
    }

    if (!text || text.trim().length === 0) {
      throw new UpstreamError('Model returned an empty response');
    }

    return text;
  }
}
