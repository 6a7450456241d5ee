/**
 * LLM Client: Google Gemini via @google/genai
 */

import { FinishReason, GoogleGenAI, type GenerateContentResponse } from "@google/genai";
import type { LanguageModel, ModelResponse } from "../collaborators";
import { ModelError } from "../errors";

export interface GeminiOptions {
  apiKey: string;
  model: string;
}

const BLOCKING_FINISH_REASONS: ReadonlySet<string> = new Set([
  FinishReason.SAFETY,
  FinishReason.RECITATION,
  FinishReason.BLOCKLIST,
  FinishReason.PROHIBITED_CONTENT,
  FinishReason.SPII,
]);

/** Map a raw Gemini response onto the three outcomes stages understand. */
export function interpretResponse(response: GenerateContentResponse): ModelResponse {
  const blockReason = response.promptFeedback?.blockReason;
  if (blockReason) {
    return { kind: "blocked", reason: String(blockReason) };
  }

  const finishReason = response.candidates?.[0]?.finishReason;
  const text = response.text;
  if (!text || !text.trim()) {
    if (finishReason && BLOCKING_FINISH_REASONS.has(finishReason)) {
      return { kind: "blocked", reason: String(finishReason) };
    }
    return { kind: "empty" };
  }
  return { kind: "text", text };
}

export class GeminiLanguageModel implements LanguageModel {
  private client: GoogleGenAI | null = null;

  constructor(private readonly options: GeminiOptions) {}

  // Created lazily so a missing key only fails the calls that need it.
  private getClient(): GoogleGenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new ModelError("GEMINI_API_KEY is not set");
      }
      this.client = new GoogleGenAI({ apiKey: this.options.apiKey });
    }
    return this.client;
  }

  async generate(prompt: string, timeoutSeconds: number): Promise<ModelResponse> {
    const client = this.getClient();

    const preview = prompt.slice(0, 60).replace(/\n/g, " ");
    console.log(`[gemini] Generating response for: "${preview}..."`);
    const startTime = Date.now();

    let response: GenerateContentResponse;
    try {
      response = await client.models.generateContent({
        model: this.options.model,
        contents: prompt,
        config: { httpOptions: { timeout: timeoutSeconds * 1000 } },
      });
    } catch (err) {
      throw new ModelError(
        `Gemini request failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    const outcome = interpretResponse(response);
    console.log(`[gemini] ${outcome.kind} response in ${elapsed}s`);
    return outcome;
  }
}
