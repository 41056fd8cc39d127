import OpenAI from "openai";
import { z } from "zod";

import { config } from "./config.js";
import type { EngineConfig } from "./config.js";
import type { ExternalSentimentStrategy, ExternalSentimentVerdict } from "./sentiment.js";
import { SENTIMENT_LABELS } from "./types.js";
import { safeJsonParse } from "./utils.js";

const SYSTEM_PROMPT = `You analyse customer feedback about a software product or service.
Classify the overall sentiment of the user's text. Treat requests for alternatives, unfavourable
comparisons and conditional approval ("fine but...") as dissatisfaction.
Respond with a single JSON object:
{"sentiment": "positive" | "negative" | "neutral", "polarity": number between -1 and 1,
 "confidence": number between 0 and 1, "reasoning": short explanation}`;

const verdictSchema = z.object({
  sentiment: z.enum(SENTIMENT_LABELS),
  polarity: z.number(),
  confidence: z.number(),
  reasoning: z.string().default(""),
});

export class ExternalStrategyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExternalStrategyError";
  }
}

/** Minimal slice of the OpenAI client the strategy depends on. */
export type ChatCompletionsClient = Pick<OpenAI, "chat">;

export class OpenAiSentimentStrategy implements ExternalSentimentStrategy {
  readonly name: string;

  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly model: string
  ) {
    this.name = `openai:${model}`;
  }

  async analyze(text: string, signal: AbortSignal): Promise<ExternalSentimentVerdict> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: 0,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: text },
        ],
      },
      { signal }
    );

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new ExternalStrategyError("Sentiment model returned an empty response");
    }

    const parsed = verdictSchema.safeParse(safeJsonParse(content));
    if (!parsed.success) {
      throw new ExternalStrategyError(`Sentiment model returned a malformed verdict: ${parsed.error.message}`);
    }

    return {
      label: parsed.data.sentiment,
      polarity: parsed.data.polarity,
      confidence: parsed.data.confidence,
      reasoning: parsed.data.reasoning,
    };
  }
}

export function createExternalStrategy(
  settings: Pick<EngineConfig, "OPENAI_API_KEY" | "LLM_MODEL"> = config
): ExternalSentimentStrategy | null {
  if (!settings.OPENAI_API_KEY) {
    return null;
  }
  const client = new OpenAI({ apiKey: settings.OPENAI_API_KEY, maxRetries: 0 });
  return new OpenAiSentimentStrategy(client, settings.LLM_MODEL);
}
