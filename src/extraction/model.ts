/**
 * @module extraction/model
 * @fileoverview LLM boundary for atomic-fact extraction.
 *
 * The pipeline treats the model as an untrusted source: {@link ExtractionModel}
 * returns `unknown` and the pipeline validates it against
 * `ExtractionSchema` before anything reaches the graph.
 */

import OpenAI from "openai";
import { zodResponseFormat } from "openai/helpers/zod";
import { EXTRACTION_SYSTEM_PROMPT, renderHumanPrompt } from "./prompts.js";
import { ExtractionSchema } from "./schema.js";

/** Turns one chunk of text into a raw extraction result. */
export interface ExtractionModel {
  extract(input: string): Promise<unknown>;
}

export interface OpenAiExtractionModelOptions {
  apiKey: string;

  /** @example "gpt-4o-mini" */
  model: string;

  /** OpenAI-compatible endpoint; the public API when omitted. */
  baseURL?: string;

  /** Client-level retries on transient errors. */
  maxRetries: number;
}

/**
 * {@link ExtractionModel} on OpenAI chat completions with structured output.
 * Sampling is deterministic (`temperature: 0`).
 */
export class OpenAiExtractionModel implements ExtractionModel {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiExtractionModelOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: options.maxRetries,
    });
    this.model = options.model;
  }

  async extract(input: string): Promise<unknown> {
    const completion = await this.client.beta.chat.completions.parse({
      model: this.model,
      temperature: 0,
      messages: [
        { role: "system", content: EXTRACTION_SYSTEM_PROMPT },
        { role: "user", content: renderHumanPrompt(input) },
      ],
      response_format: zodResponseFormat(ExtractionSchema, "extraction"),
    });

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new Error("Model returned no choices");
    }
    if (message.refusal) {
      throw new Error(`Model refused the request: ${message.refusal}`);
    }
    return message.parsed;
  }
}
