import { z } from 'zod';
import type { Judgment } from '../types/decision.js';

const level = z.number().finite().positive();

const closeSignalSchema = z.object({
  stopLossHit: z.boolean().default(false),
  targetHit: z.boolean().default(false),
  trigger: z.string().trim().min(1).nullable().default(null),
});

/**
 * Fields the state machine depends on are strict; anything else the producer
 * sends is kept verbatim in `notes`.
 */
const judgmentSchema = z
  .object({
    confidence: z.number().finite().min(1).max(10),
    technicalTrend: z.string().min(1),
    volumeAnalysis: z.string(),
    marketConditionImpact: z.string(),
    timeFactor: z.string(),
    portfolioAdjustmentNeeded: z.boolean(),
    adjustmentUrgency: z.enum(['Low', 'Medium', 'High']),
    newTargetPrice: level.nullable().default(null),
    newStopLoss: level.nullable().default(null),
    sellReason: z.string().default(''),
    closeSignal: closeSignalSchema.default({}),
  })
  .catchall(z.unknown());

const KNOWN_KEYS = new Set(Object.keys(judgmentSchema.shape));

export type JudgmentParseResult =
  | { ok: true; judgment: Judgment }
  | { ok: false; issues: string[] };

export function parseJudgment(raw: unknown): JudgmentParseResult {
  const result = judgmentSchema.safeParse(raw);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`),
    };
  }

  const data = result.data;
  const notes: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.has(key)) notes[key] = value;
  }

  return {
    ok: true,
    judgment: {
      confidence: data.confidence,
      technicalTrend: data.technicalTrend,
      volumeAnalysis: data.volumeAnalysis,
      marketConditionImpact: data.marketConditionImpact,
      timeFactor: data.timeFactor,
      portfolioAdjustmentNeeded: data.portfolioAdjustmentNeeded,
      adjustmentUrgency: data.adjustmentUrgency,
      newTargetPrice: data.newTargetPrice,
      newStopLoss: data.newStopLoss,
      sellReason: data.sellReason,
      closeSignal: data.closeSignal,
      notes,
    },
  };
}
