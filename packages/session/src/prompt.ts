/**
 * Prompt boundary detection.
 * The interpreter is ready for input when the text it printed ends with
 * its primary prompt, possibly preceded by continuation prompts left over
 * from a compound statement.
 */

export interface PromptMatch {
  /** Offset where the prompt run starts */
  index: number;
  length: number;
}

export interface PromptBoundary {
  readonly pattern: RegExp;
  /** First prompt run that ends the text, or null */
  find(text: string): PromptMatch | null;
}

export const PYTHON_PROMPT_PATTERN = /(?:(?:>>>|\.\.\.) )*>>> $/;

export function makePromptBoundary(pattern: RegExp): PromptBoundary {
  // Stateful flags would make repeated matching depend on lastIndex
  const stateless = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));

  return {
    pattern: stateless,
    find(text) {
      const match = stateless.exec(text);
      return match ? { index: match.index, length: match[0].length } : null;
    },
  };
}

export const pythonPromptBoundary = makePromptBoundary(PYTHON_PROMPT_PATTERN);

/**
 * True when `text` ends exactly at a prompt boundary
 */
export function endsAtPrompt(boundary: PromptBoundary, text: string): boolean {
  const match = boundary.find(text);
  return match !== null && match.index + match.length === text.length;
}
