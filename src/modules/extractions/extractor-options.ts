export const EXTRACTOR_OPTIONS = 'EXTRACTOR_OPTIONS';

export interface PromptOptions {
  language: string;
}

export interface ExtractorOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
  maxOutputTokens: number;
  prompt: PromptOptions;
}
