/**
 * @module tools/preprocess
 * @fileoverview MCP Tool: preprocess_for_llm -- clean, section and chunk raw text.
 */

import { z } from "zod";
import { config } from "../config.js";
import { preprocessFile } from "../preprocess/preprocessor.js";
import { defaultTokenizer } from "../text/tokenizer.js";
import { errorResult, textResult, type ToolResult } from "./response.js";

export const PreprocessSchema = {
  input_file: z
    .string()
    .optional()
    .describe(`Raw-text JSON-lines file (default: ${config.rawTextFile})`),

  output_file: z
    .string()
    .optional()
    .describe(`LLM-ready JSON-lines file (default: ${config.llmReadyFile})`),

  max_tokens: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe(`Token budget per chunk (default: ${config.preprocessMaxTokens})`),
};

interface PreprocessParams {
  input_file?: string;
  output_file?: string;
  max_tokens?: number;
}

export async function handlePreprocess(params: PreprocessParams): Promise<ToolResult> {
  try {
    const outputFile = params.output_file ?? config.llmReadyFile;
    const summary = await preprocessFile({
      inputFile: params.input_file ?? config.rawTextFile,
      outputFile,
      maxTokens: params.max_tokens ?? config.preprocessMaxTokens,
      overflow: config.chunkOverflow,
      tokenizer: defaultTokenizer(),
    });

    return textResult(
      [
        `# Preprocessing Results`,
        `> Documents: ${summary.documents}`,
        `> Chunks written: ${summary.chunks}`,
        `> Invalid lines: ${summary.invalidLines}`,
        `> Output: ${outputFile}`,
      ].join("\n"),
    );
  } catch (error) {
    return errorResult(error);
  }
}
