import { v4 as uuidv4 } from 'uuid';
import { systemClock, type Clock } from '../lib/dates.js';
import type {
  DailyDecision,
  Judgment,
  TransitionKind,
  TransitionPlan,
  TransitionResult,
} from '../types/decision.js';
import type { CycleContext, Position, Scenario, ScenarioDraft } from '../types/portfolio.js';
import type { PositionLedger } from './position-ledger.js';
import type { Emit } from './events.js';
import { parseJudgment } from './judgment-schema.js';
import { DuplicateDecision, MalformedJudgment, UnknownPosition } from './errors.js';

export type PlanOutcome = { ok: true; plan: TransitionPlan } | { ok: false; issues: string[] };

export function scenarioToDraft(scenario: Scenario): ScenarioDraft {
  const { kind: _kind, revision: _revision, ...draft } = scenario;
  return draft;
}

function sameTrigger(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Decide what one judgment does to one position at `currentPrice`.
 *
 * Close conditions are checked before any adjustment, and a stop-loss breach
 * wins over a target breach reported in the same judgment.
 */
export function planTransition(position: Position, judgment: Judgment, currentPrice: number): PlanOutcome {
  const { stopLoss, targetPrice, sellTriggers } = position.scenario;
  const signal = judgment.closeSignal;
  const note = judgment.sellReason.trim();

  let firedTrigger: string | null = null;
  if (signal.trigger !== null) {
    const requested = signal.trigger;
    firedTrigger = sellTriggers.find(t => sameTrigger(t, requested)) ?? null;
    if (firedTrigger === null) {
      return { ok: false, issues: [`closeSignal.trigger '${requested}' is not a sell trigger of ${position.ticker}`] };
    }
  }

  if (signal.stopLossHit || currentPrice <= stopLoss) {
    return {
      ok: true,
      plan: { kind: 'close', closeKind: 'stop_loss', price: stopLoss, reason: note || `stop-loss ${stopLoss} reached at ${currentPrice}` },
    };
  }

  if (signal.targetHit || currentPrice >= targetPrice) {
    return {
      ok: true,
      plan: { kind: 'close', closeKind: 'target', price: targetPrice, reason: note || `target ${targetPrice} reached at ${currentPrice}` },
    };
  }

  if (firedTrigger !== null) {
    return {
      ok: true,
      plan: { kind: 'close', closeKind: 'trigger', price: currentPrice, reason: note || `sell trigger fired: ${firedTrigger}` },
    };
  }

  if (!judgment.portfolioAdjustmentNeeded) return { ok: true, plan: { kind: 'hold' } };

  if (judgment.newTargetPrice === null && judgment.newStopLoss === null) {
    return { ok: true, plan: { kind: 'hold', note: 'adjustment flagged without new levels' } };
  }

  const nextTarget = judgment.newTargetPrice ?? targetPrice;
  const nextStop = judgment.newStopLoss ?? stopLoss;
  if (nextStop >= nextTarget) {
    return { ok: false, issues: [`revised stopLoss ${nextStop} must be below revised targetPrice ${nextTarget}`] };
  }
  if (nextTarget === targetPrice && nextStop === stopLoss) {
    return { ok: true, plan: { kind: 'hold', note: 'adjustment repeats current levels' } };
  }

  return { ok: true, plan: { kind: 'revise', targetPrice: nextTarget, stopLoss: nextStop } };
}

export interface DecisionProcessorOptions {
  ledger: PositionLedger;
  clock?: Clock;
  emit?: Emit;
}

/**
 * Applies one judgment per open position per cycle:
 *   Holding ──(no adjustment)──────────────▶ Holding
 *   Holding ──(new levels)──▶ PendingRevision ──▶ Holding
 *   Holding ──(stop / target / trigger)──▶ Closing ──▶ closed trade
 *
 * The processor never writes directly; every transition goes through a ledger
 * session together with its DailyDecision.
 */
export class DecisionProcessor {
  private readonly ledger: PositionLedger;
  private readonly clock: Clock;
  private readonly emit: Emit;

  constructor(options: DecisionProcessorOptions) {
    this.ledger = options.ledger;
    this.clock = options.clock ?? systemClock;
    this.emit = options.emit ?? (async () => {});
  }

  async process(
    ticker: string,
    rawJudgment: unknown,
    currentPrice: number | undefined,
    cycle: CycleContext,
  ): Promise<TransitionResult> {
    const parsed = parseJudgment(rawJudgment);
    if (!parsed.ok) {
      throw new MalformedJudgment(ticker, cycle.cycleId, parsed.issues);
    }
    const judgment = parsed.judgment;

    const result = await this.ledger.transact(ticker, async (session): Promise<TransitionResult> => {
      if (await session.hasDecision(cycle.cycleId)) throw new DuplicateDecision(ticker, cycle.cycleId);

      const position = await session.get(cycle.cycleDate);
      if (!position) throw new UnknownPosition(ticker, cycle.cycleId);

      if (currentPrice === undefined || !Number.isFinite(currentPrice) || currentPrice <= 0) {
        console.warn(`[Decision ${cycle.cycleId}] ${ticker} skipped — no price this cycle`);
        return { ticker, outcome: 'skipped', reason: 'missing_price' };
      }

      const planned = planTransition(position, judgment, currentPrice);
      if (!planned.ok) throw new MalformedJudgment(ticker, cycle.cycleId, planned.issues);
      const plan = planned.plan;

      const decision = this.buildDecision(ticker, judgment, currentPrice, cycle, plan.kind);

      switch (plan.kind) {
        case 'hold': {
          if (plan.note) console.log(`[Decision ${cycle.cycleId}] ${ticker} hold: ${plan.note}`);
          const held = await session.hold(decision);
          return { ticker, outcome: 'held', decision, position: held };
        }
        case 'revise': {
          const draft: ScenarioDraft = {
            ...scenarioToDraft(position.scenario),
            targetPrice: plan.targetPrice,
            stopLoss: plan.stopLoss,
          };
          const revised = await session.revise(draft, { currentPrice, decision });
          return { ticker, outcome: 'revised', decision, position: revised };
        }
        case 'close': {
          const trade = await session.close(plan.price, plan.reason, {
            closeKind: plan.closeKind,
            decision,
          });
          return { ticker, outcome: 'closed', decision, trade };
        }
      }
    });

    if (result.outcome !== 'skipped') {
      console.log(
        `[Decision ${cycle.cycleId}] ${ticker} → ${result.outcome} ` +
        `(confidence=${judgment.confidence}, urgency=${judgment.adjustmentUrgency})`,
      );
      await this.emit({ type: 'decision_recorded', decision: result.decision });
    }
    return result;
  }

  private buildDecision(
    ticker: string,
    judgment: Judgment,
    currentPrice: number,
    cycle: CycleContext,
    transition: TransitionKind,
  ): DailyDecision {
    return {
      ...judgment,
      id: uuidv4(),
      ticker,
      cycleId: cycle.cycleId,
      cycleDate: cycle.cycleDate,
      decidedAt: this.clock().toISOString(),
      currentPrice,
      transition,
    };
  }
}
