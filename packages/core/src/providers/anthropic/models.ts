export const ANTHROPIC_MODELS = {
  ANALYSIS: 'claude-sonnet-4-5-20250929',
  EXTRACTION: 'claude-sonnet-4-5-20250929',
} as const;
