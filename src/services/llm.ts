/**
 * LLM integration layer using Vercel AI SDK.
 * Supports Google Gemini, Anthropic and OpenAI models behind one call surface.
 *
 * Each call is a single attempt: translation and narration both have their
 * own failure handling, so nothing here retries.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { apiKeyVariable } from '../config.js';
import type { LLMConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { LLMError, describeError } from '../types/errors.js';

/**
 * Text-in, text-out access to a generative model.
 */
export interface LanguageModelClient {
  /**
   * @throws LLMError on transport, quota or configuration failures
   */
  generate(prompt: string): Promise<string>;
}

/**
 * Model client backed by the AI SDK's generateText.
 */
export class AiSdkModelClient implements LanguageModelClient {
  private modelPromise: Promise<LanguageModel> | null = null;

  constructor(
    private readonly config: LLMConfig,
    private readonly temperature: number = 0.0
  ) {}

  async generate(prompt: string): Promise<string> {
    const model = await this.getModel();

    try {
      const result = await generateText({
        model,
        prompt,
        temperature: this.temperature,
        maxOutputTokens: this.config.maxTokens,
        maxRetries: 0,
      });

      // Log token usage
      if (result.usage) {
        logger.debug(
          `LLM API call successful - ` +
            `Input: ${result.usage.inputTokens}, ` +
            `Output: ${result.usage.outputTokens}`
        );
      }

      return result.text;
    } catch (error) {
      logger.warn(`LLM API call failed: ${describeError(error)}`);
      throw new LLMError(`LLM API call failed: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Lazy initialization of the provider model.
   * A failed initialization is not cached, so a later key fix takes effect.
   */
  private async getModel(): Promise<LanguageModel> {
    if (!this.modelPromise) {
      this.modelPromise = this.loadModel().catch((error: unknown) => {
        this.modelPromise = null;
        throw error;
      });
    }
    return this.modelPromise;
  }

  /**
   * Load the model based on provider configuration.
   */
  private async loadModel(): Promise<LanguageModel> {
    const { provider, model: modelId, apiKey } = this.config;

    if (!apiKey) {
      throw new LLMError(
        `${apiKeyVariable(provider)} is required when LLM_PROVIDER is ${provider}`
      );
    }

    logger.info(`Initializing LLM: ${provider}/${modelId}`);

    switch (provider) {
      case 'google': {
        const { createGoogleGenerativeAI } = await import('@ai-sdk/google');
        return createGoogleGenerativeAI({ apiKey })(modelId);
      }

      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        return createAnthropic({ apiKey })(modelId);
      }

      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        return createOpenAI({ apiKey })(modelId);
      }

      default: {
        const unsupported: never = provider;
        throw new LLMError(`Unsupported LLM provider: ${String(unsupported)}`);
      }
    }
  }
}
