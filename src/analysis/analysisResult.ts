import { z } from 'zod';
import { AnalysisResult, JsonObject, RiskAnalysis } from '../types';

const text = z.string().catch('');
const textList = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((i): i is string => typeof i === 'string'));

const analysisSchema = z.object({
  trust_score: z.number().catch(0),
  risk_analysis: z.record(z.string(), z.unknown()).catch({}),
  market_insights: z
    .object({
      price_trend: text,
      demand_level: text,
      investment_grade: text,
    })
    .catch({ price_trend: '', demand_level: '', investment_grade: '' }),
  executive_summary: text,
  recommendations: textList,
  risk_factors: textList,
  competitive_advantages: textList,
});

function numericEntries(raw: Record<string, unknown>): RiskAnalysis {
  const risks: RiskAnalysis = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'number') risks[key] = value;
  }
  return risks;
}

/**
 * Read-only view of the model's answer for display. Missing or mistyped
 * fields become empty or zero; the stored report keeps the parsed object.
 */
export function normalizeAnalysis(parsed: JsonObject): AnalysisResult {
  const data = analysisSchema.parse(parsed);
  return {
    ...data,
    risk_analysis: numericEntries(data.risk_analysis),
  };
}
