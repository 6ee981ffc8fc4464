import { generateText, type LanguageModel } from 'ai';
import { createGroq } from '@ai-sdk/groq';
import { logger } from '../utils/logger';
import { GenerationError, ModelLoadError, errorMessage } from '../types/api';

export interface AnswerGenerator {
  readonly modelName: string;
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface GroqGeneratorOptions {
  apiKey?: string;
  modelName: string;
  temperature: number;
}

/**
 * Hosted chat model on Groq, called through the AI SDK
 */
export class GroqAnswerGenerator implements AnswerGenerator {
  public readonly modelName: string;
  private readonly apiKey?: string;
  private readonly temperature: number;
  private model: LanguageModel | null = null;

  constructor(options: GroqGeneratorOptions) {
    this.apiKey = options.apiKey;
    this.modelName = options.modelName;
    this.temperature = options.temperature;
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const model = this.getModel();
    const startTime = Date.now();

    try {
      const result = await generateText({
        model,
        prompt,
        temperature: this.temperature,
        abortSignal: signal
      });

      logger.performance('Answer generation', Date.now() - startTime, {
        model: this.modelName,
        promptLength: prompt.length
      });
      return result.text;
    } catch (error) {
      logger.error('Language model call failed', error);
      throw new GenerationError(`Answer generation failed: ${errorMessage(error)}`);
    }
  }

  private getModel(): LanguageModel {
    if (!this.model) {
      if (!this.apiKey) {
        throw new ModelLoadError('GROQ_API_KEY is not set; the language model is unavailable');
      }
      const groq = createGroq({ apiKey: this.apiKey });
      this.model = groq(this.modelName);
    }
    return this.model;
  }
}
