/**
 * @module extraction/prompts
 * @fileoverview Prompt text for atomic-fact extraction.
 *
 * The human prompt has one variable, `{input}`, replaced by the chunk text.
 */

export const EXTRACTION_SYSTEM_PROMPT = `
You are an assistant that carefully extracts key elements and atomic facts from a long text.
1. Key Elements: the essential nouns (characters, times, events, places, numbers), verbs
(actions) and adjectives (states, feelings) that carry the text's meaning.
2. Atomic Facts: the smallest indivisible facts, each written as one concise sentence. These
include propositions, theories, existences and concepts, as well as implicit elements such as
logic, causality, event order, relationships between people and timelines.
Requirements:
#####
1. Every key element you list must appear in its atomic fact.
2. Extract key elements and atomic facts comprehensively. Keep every detail that someone might
later ask about.
3. Replace pronouns with the nouns they refer to (for example, change I, He, She to actual names).
4. Write key elements and atomic facts in the language of the original text.
`;

export const EXTRACTION_HUMAN_PROMPT = `Use the given format to extract information from the
following input: {input}`;

/**
 * Fill the human prompt's `{input}` slot.
 *
 * @example
 * ```ts
 * renderHumanPrompt("Alice met Bob.");
 * // => "Use the given format to extract information from the\nfollowing input: Alice met Bob."
 * ```
 */
export function renderHumanPrompt(input: string): string {
  return EXTRACTION_HUMAN_PROMPT.replace("{input}", () => input);
}
