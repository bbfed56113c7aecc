import { marked } from 'marked';

export const EMPTY_RESPONSE = "I'm sorry, I couldn't generate a response.";

/** Drops the `ANALYSIS RESULT:` banner and `=` rules some workflows wrap answers in. */
export function stripAnalysisMarkers(text: string): string {
  return text
    .trim()
    .replace(/^\s*ANALYSIS RESULT:\s*/, '')
    .replace(/^=+\s*/, '')
    .replace(/\s*=+$/, '');
}

export function formatChatbotResponse(text: string | null | undefined): string {
  if (!text) return EMPTY_RESPONSE;
  return marked.parse(stripAnalysisMarkers(text), { async: false, gfm: true, breaks: true });
}
