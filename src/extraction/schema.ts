/**
 * @module extraction/schema
 * @fileoverview Structured output the extraction model must return.
 */

import { z } from "zod";

export const AtomicFactSchema = z.object({
  key_elements: z
    .array(z.string())
    .describe(
      "The essential nouns (characters, times, events, places, numbers), verbs and adjectives that are pivotal to the atomic fact"
    ),
  atomic_fact: z
    .string()
    .describe(
      "The smallest, indivisible fact, written as one concise sentence that names its subjects explicitly"
    ),
});

export const ExtractionSchema = z.object({
  atomic_facts: z
    .array(AtomicFactSchema)
    .describe("Every atomic fact found in the input text"),
});

export type AtomicFact = z.infer<typeof AtomicFactSchema>;
export type Extraction = z.infer<typeof ExtractionSchema>;
