export const OPENAI_MODELS = {
  ANALYSIS: 'gpt-4.1',
  EXTRACTION: 'gpt-4.1',
} as const;
