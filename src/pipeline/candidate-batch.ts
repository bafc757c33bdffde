import { readFile } from 'fs/promises';
import { z } from 'zod';
import { withHorizonTriggers } from '../engine/horizon.js';
import type { MarketCondition } from '../types/portfolio.js';
import type { CycleCandidate } from './portfolio-cycle.js';

// Shapes only; score and price ranges are the scoring gate's job so that a bad
// row fails alone instead of sinking the batch.
const scenarioSchema = z.object({
  targetPrice: z.number(),
  stopLoss: z.number(),
  investmentHorizon: z.enum(['short', 'mid', 'long']).default('mid'),
  rationale: z.string().default(''),
  supportLevels: z.array(z.number()).default([]),
  resistanceLevels: z.array(z.number()).default([]),
  sellTriggers: z.array(z.string()).default([]),
  holdConditions: z.array(z.string()).default([]),
  maxPortfolioSize: z.number().int().positive().optional(),
});

const candidateSchema = z.object({
  ticker: z.string(),
  companyName: z.string().optional(),
  sector: z.string().optional(),
  buyScore: z.number(),
  currentPrice: z.number(),
  rationale: z.string().optional(),
  analyzedAt: z.string().optional(),
  quantity: z.number().optional(),
  scenario: scenarioSchema,
});

export const candidateBatchSchema = z.object({
  marketCondition: z.enum(['bull', 'neutral', 'bear']).default('neutral'),
  candidates: z.array(candidateSchema).default([]),
});

export interface CandidateBatch {
  marketCondition: MarketCondition;
  candidates: CycleCandidate[];
}

export type RawCandidate = z.infer<typeof candidateSchema>;

/** Fill scenario defaults that depend on runtime settings, and attach the horizon exits. */
export function toCycleCandidate(raw: RawCandidate, maxPortfolioSize: number): CycleCandidate {
  const { scenario } = raw;
  return {
    ...raw,
    scenario: {
      ...scenario,
      sellTriggers: withHorizonTriggers(scenario.sellTriggers, scenario.investmentHorizon),
      maxPortfolioSize: scenario.maxPortfolioSize ?? maxPortfolioSize,
    },
  };
}

export function parseCandidateBatch(raw: unknown, maxPortfolioSize: number): CandidateBatch {
  const result = candidateBatchSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
    throw new Error(`Invalid candidate batch: ${issues}`);
  }
  return {
    marketCondition: result.data.marketCondition,
    candidates: result.data.candidates.map(c => toCycleCandidate(c, maxPortfolioSize)),
  };
}

/**
 * Read the pending batch written by the analysis layer. A missing file means
 * nothing to screen this cycle.
 */
export async function loadCandidateBatch(path: string, maxPortfolioSize: number): Promise<CandidateBatch> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.log(`[Candidates] ${path} not found — no candidates this cycle`);
      return { marketCondition: 'neutral', candidates: [] };
    }
    throw err;
  }
  return parseCandidateBatch(JSON.parse(text), maxPortfolioSize);
}
