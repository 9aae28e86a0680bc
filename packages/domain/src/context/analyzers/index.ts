export {
  DimensionAnalyzer,
  fallbackCaseName,
  type AnalyzerDependencies,
} from './base-analyzer.js';
export { WhoAnalyzer, WHO_ENTITY_TYPES } from './who-analyzer.js';
export { WhatAnalyzer, WHAT_ENTITY_TYPES } from './what-analyzer.js';
export {
  WhereAnalyzer,
  isKnownLocation,
  UNKNOWN_JURISDICTION,
  UNKNOWN_COURT,
  UNKNOWN_VENUE,
} from './where-analyzer.js';
export { WhenAnalyzer, calculateUrgency } from './when-analyzer.js';
export { WhyAnalyzer, calculateArgumentStrength } from './why-analyzer.js';
export { calculateQualityScore } from './quality.js';
