import { GoogleGenerativeAI, HarmBlockThreshold, HarmCategory } from '@google/generative-ai';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describeError } from '../../common/errors/insights.errors';
import {
  TextGenerationProvider,
  TextGenerationRequest,
} from '../interfaces/ai-provider.interface';

@Injectable()
export class GeminiProvider implements TextGenerationProvider {
  private readonly logger = new Logger(GeminiProvider.name);
  private readonly client: GoogleGenerativeAI | null;
  private readonly textModel: string;

  constructor(config: ConfigService) {
    const apiKey = config.get<string>('GEMINI_API_KEY');
    this.client = apiKey ? new GoogleGenerativeAI(apiKey) : null;
    this.textModel = config.get<string>('GEMINI_MODEL', 'gemini-2.5-flash');
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  async generateText({
    prompt,
    systemPrompt,
    maxOutputTokens = 500,
    temperature = 0.7,
  }: TextGenerationRequest): Promise<string> {
    if (!this.client) {
      throw new Error('Gemini is not configured (GEMINI_API_KEY is missing)');
    }

    try {
      const model = this.client.getGenerativeModel({
        model: this.textModel,
        systemInstruction: systemPrompt,
        generationConfig: { maxOutputTokens, temperature },
        safetySettings: [
          {
            category: HarmCategory.HARM_CATEGORY_HARASSMENT,
            threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE,
          },
          {
            category: HarmCategory.HARM_CATEGORY_HATE_SPEECH,
            threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE,
          },
        ],
      });

      const result = await model.generateContent(prompt);
      return result.response.text().trim();
    } catch (error) {
      this.logger.error(`Gemini text error: ${describeError(error)}`);
      throw error;
    }
  }
}
