export const GEMINI_MODELS = {
  ANALYSIS: 'gemini-2.5-pro',
  EXTRACTION: 'gemini-2.5-flash',
} as const;
