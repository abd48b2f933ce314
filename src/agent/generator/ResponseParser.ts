export const FALLBACK_EXPLANATION = 'Generated code based on the given task description.';

const TAGGED_BLOCK = /```(?:javascript|js|typescript|ts)[ \t]*\r?\n([\s\S]*?)```/i;
const BARE_BLOCK = /```[ \t]*\r?\n([\s\S]*?)```/;
const EXPLANATION_PREFIX = /^Explanation:\s*/i;

export interface ParsedGeneration {
  sourceText: string;
  explanation: string;
}

/**
 * Split a model reply into the snippet and the prose after it. Without a fenced
 * block the whole reply is treated as code.
 */
export function parseGenerationResponse(content: string): ParsedGeneration {
  const match = TAGGED_BLOCK.exec(content) ?? BARE_BLOCK.exec(content);
  if (!match) {
    return { sourceText: content.trim(), explanation: FALLBACK_EXPLANATION };
  }

  const sourceText = (match[1] ?? '').trim();
  const trailing = content
    .slice(match.index + match[0].length)
    .trim()
    .replace(EXPLANATION_PREFIX, '');

  return { sourceText, explanation: trailing || FALLBACK_EXPLANATION };
}
