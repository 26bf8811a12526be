import OpenAI from 'openai';
import { buildClassificationPrompt, type RemoteClassifier } from '@spendsort/core';
import type { RemoteConfig } from '@spendsort/shared';

/**
 * Chat-completions client constrained to a closed category list.
 * Returns the raw answer; validation against the list happens in the core tier.
 */
export class OpenAIClassifier implements RemoteClassifier {
    private readonly client: OpenAI;

    constructor(
        apiKey: string,
        private readonly config: RemoteConfig
    ) {
        this.client = new OpenAI({
            apiKey,
            timeout: config.timeoutMs,
            maxRetries: config.maxRetries,
        });
    }

    async classify(context: string, categories: readonly string[]): Promise<string> {
        const response = await this.client.chat.completions.create({
            model: this.config.model,
            messages: [{ role: 'user', content: buildClassificationPrompt(context, categories) }],
            max_tokens: this.config.maxTokens,
            temperature: this.config.temperature,
        });

        return response.choices[0]?.message.content?.trim() ?? '';
    }
}

/**
 * Builds the classifier only when OPENAI_API_KEY is set.
 * Without it the remote tier reports "no credential" and the batch runs on local tiers.
 */
export function createRemoteClassifier(
    config: RemoteConfig,
    env: NodeJS.ProcessEnv = process.env
): OpenAIClassifier | undefined {
    const apiKey = env.OPENAI_API_KEY?.trim();
    if (!apiKey) {
        return undefined;
    }
    return new OpenAIClassifier(apiKey, config);
}
