/**
 * External text-generation capability used by the delegated scorer.
 * Production uses OpenAI chat completions; tests pass their own TextGenerator.
 */

import type OpenAI from "openai";

export type TextGenerationRequest = {
  system: string;
  user: string;
};

export interface TextGenerator {
  generate(request: TextGenerationRequest): Promise<string>;
}

export type OpenAITextGeneratorOptions = {
  apiKey: string;
  model?: string;
  maxTokens?: number;
};

export function createOpenAITextGenerator(options: OpenAITextGeneratorOptions): TextGenerator {
  let client: OpenAI | null = null;

  return {
    async generate({ system, user }) {
      if (!client) {
        const { default: OpenAIClient } = await import("openai");
        client = new OpenAIClient({ apiKey: options.apiKey });
      }
      const completion = await client.chat.completions.create({
        model: options.model ?? "gpt-4o-mini",
        messages: [
          { role: "system", content: system },
          { role: "user", content: user }
        ],
        temperature: 0,
        max_tokens: options.maxTokens ?? 2000
      });
      return completion.choices[0]?.message?.content?.trim() ?? "";
    }
  };
}
