import { DimensionQualityMetricsSchema, type DimensionQualityMetrics } from '@casecontext/types';

/**
 * Quality heuristic: ten data points make a dimension complete
 */
export function calculateQualityScore(
  dimension: string,
  dataPoints: number,
  confidences: readonly number[]
): DimensionQualityMetrics {
  const completeness = Math.min(1, dataPoints / 10);
  const confidenceAvg =
    confidences.length > 0
      ? confidences.reduce((sum, value) => sum + value, 0) / confidences.length
      : 0;

  return DimensionQualityMetricsSchema.parse({
    dimension_name: dimension,
    completeness_score: completeness,
    data_points: dataPoints,
    confidence_avg: confidenceAvg,
  });
}
