import OpenAI from 'openai';

import { UpstreamError } from '../../common/errors';
import type { ExtractorOptions } from './extractor-options';
import { OpenAiService } from './openai.service';

const mockCreate = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ responses: { create: mockCreate } })),
}));

const options: ExtractorOptions = {
  apiKey: 'test-key',
  model: 'gpt-4o-mini',
  timeoutMs: 60000,
  maxRetries: 0,
  maxOutputTokens: 2000,
  prompt: { language: 'English' },
};

describe('OpenAiService', () => {
  let service: OpenAiService;

  beforeEach(() => {
    mockCreate.mockReset();
    service = new OpenAiService(options);
  });

  it('configures the client from the injected options', () => {
    expect(OpenAI).toHaveBeenCalledWith({ apiKey: 'test-key', timeout: 60000, maxRetries: 0 });
    expect(service.model).toBe('gpt-4o-mini');
  });

  it('sends the prompt and image with a JSON schema format', async () => {
    mockCreate.mockResolvedValue({ output_text: '{"invoiceNumber":"INV-1"}' });

    const text = await service.analyzeImage({
      image: Buffer.from('img'),
      mimetype: 'image/png',
      prompt: 'PROMPT',
      structured: true,
    });

    expect(text).toBe('{"invoiceNumber":"INV-1"}');
    expect(mockCreate).toHaveBeenCalledTimes(1);
    expect(mockCreate.mock.calls[0][0]).toMatchObject({
      model: 'gpt-4o-mini',
      input: [
        {
          role: 'user',
          content: [
            { type: 'input_text', text: 'PROMPT' },
            { type: 'input_image', image_url: 'data:image/png;base64,aW1n', detail: 'auto' },
          ],
        },
      ],
      text: { format: { type: 'json_schema', name: 'invoice_extraction', strict: true } },
      max_output_tokens: 2000,
    });
  });

  it('asks for plain text when no structure is wanted', async () => {
    mockCreate.mockResolvedValue({ output_text: 'The total is 20.9' });

    await service.analyzeImage({
      image: Buffer.from('img'),
      mimetype: 'image/jpeg',
      prompt: 'What is the total?',
      structured: false,
    });

    expect(mockCreate.mock.calls[0][0]).toMatchObject({ text: { format: { type: 'text' } } });
  });

  it('wraps request failures in UpstreamError with the HTTP status', async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error('Rate limit reached'), { status: 429 }));

    await expect(
      service.analyzeImage({ image: Buffer.from('img'), mimetype: 'image/png', prompt: 'p', structured: true }),
    ).rejects.toMatchObject({
      name: 'UpstreamError',
      message: 'Model request failed: Rate limit reached',
      status: 429,
    });
  });

  it('rejects an empty response', async () => {
    mockCreate.mockResolvedValue({ output_text: '   ' });

    const call = service.analyzeImage({
      image: Buffer.from('img'),
      mimetype: 'image/png',
      prompt: 'p',
      structured: false,
    });

    await expect(call).rejects.toBeInstanceOf(UpstreamError);
    await expect(call).rejects.toThrow('Model returned an empty response');
  });
});
