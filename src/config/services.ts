export const ExtractorSubjects = {
  extract: 'extractor.extract',
  health: 'extractor.health.check',
} as const;
