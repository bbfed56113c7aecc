import { describe, expect, it } from 'vitest';
import {
  EMPTY_RESPONSE,
  formatChatbotResponse,
  stripAnalysisMarkers
} from '../../src/format/response.formatter';

describe('response formatter', () => {
  it('falls back to an apology for empty answers', () => {
    expect(formatChatbotResponse('')).toBe(EMPTY_RESPONSE);
    expect(formatChatbotResponse(null)).toBe(EMPTY_RESPONSE);
  });

  it('removes the analysis banner and rules', () => {
    expect(stripAnalysisMarkers('  ANALYSIS RESULT:\n=====\nAnswer here\n=====  ')).toBe('Answer here');
  });

  it('leaves ordinary text alone', () => {
    expect(stripAnalysisMarkers('Plain answer')).toBe('Plain answer');
  });

  it('renders markdown with line breaks', () => {
    expect(formatChatbotResponse('**Bold** text')).toBe('<p><strong>Bold</strong> text</p>\n');
    expect(formatChatbotResponse('line one\nline two')).toBe('<p>line one<br>line two</p>\n');
  });

  it('renders the banner-free answer', () => {
    expect(formatChatbotResponse('ANALYSIS RESULT: ==== Done ====')).toBe('<p>Done</p>\n');
  });
});
