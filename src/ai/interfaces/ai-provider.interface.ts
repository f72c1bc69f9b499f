export interface TextGenerationRequest {
  prompt: string;
  systemPrompt?: string;
  maxOutputTokens?: number;
  temperature?: number;
}

export interface TextGenerationProvider {
  /** False when the provider has no credentials; callers skip it instead of calling. */
  readonly enabled: boolean;
  generateText(request: TextGenerationRequest): Promise<string>;
}

export const TEXT_GENERATION_PROVIDER = 'TEXT_GENERATION_PROVIDER';
