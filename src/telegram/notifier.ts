import type { EngineEvent } from '../types/decision.js';
import type { NotificationSink } from '../engine/events.js';

const TELEGRAM_BASE = 'https://api.telegram.org';

type EventType = EngineEvent['type'];

const DEFAULT_EVENTS: EventType[] = ['position_opened', 'position_revised', 'position_closed', 'cycle_completed'];

export interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;
  /** Event types worth a message; per-candidate and per-decision events are off by default. */
  events?: EventType[];
}

// ── Helpers ────────────────────────────────────────────────────────────────────

function fmt(n: number | null | undefined, dp = 2): string {
  if (n == null || !Number.isFinite(n)) return 'n/a';
  return n.toFixed(dp);
}

function fmtPct(n: number, dp = 2): string {
  return `${n >= 0 ? '+' : ''}${n.toFixed(dp)}%`;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

// ── Message builders ───────────────────────────────────────────────────────────

/** Render one event as Telegram HTML. */
export function formatEvent(event: EngineEvent): string {
  switch (event.type) {
    case 'position_opened': {
      const p = event.position;
      return (
        `🟢 <b>Opened ${escapeHtml(p.ticker)}</b> (${escapeHtml(p.companyName)})\n` +
        `Sector: ${escapeHtml(p.sector)} | Qty: ${p.quantity}\n` +
        `Buy: ${fmt(p.buyPrice)} | Target: ${fmt(p.scenario.targetPrice)} | Stop: ${fmt(p.scenario.stopLoss)}\n` +
        `Horizon: ${p.scenario.investmentHorizon}`
      );
    }
    case 'position_revised': {
      const p = event.position;
      return (
        `🔧 <b>Revised ${escapeHtml(p.ticker)}</b> (scenario r${p.scenario.revision})\n` +
        `Target: ${fmt(event.previousTarget)} → <b>${fmt(p.scenario.targetPrice)}</b>\n` +
        `Stop: ${fmt(event.previousStop)} → <b>${fmt(p.scenario.stopLoss)}</b>\n` +
        `Price: ${fmt(p.currentPrice)} | Held ${p.holdingDays}d`
      );
    }
    case 'position_closed': {
      const t = event.trade;
      const icon = t.outcome === 'Win' ? '✅' : t.outcome === 'Loss' ? '❌' : '➖';
      return (
        `${icon} <b>Closed ${escapeHtml(t.ticker)}</b> — ${t.outcome} ${fmtPct(t.profitRatePercent)}\n` +
        `Buy: ${fmt(t.buyPrice)} → Sell: ${fmt(t.sellPrice)} | Held ${t.holdingDays}d\n` +
        `Reason (${t.closeKind}): ${escapeHtml(t.sellReason)}`
      );
    }
    case 'candidate_screened': {
      const c = event.candidate;
      const icon = c.decision === 'Enter' ? '👀' : '⏭';
      return (
        `${icon} <b>${escapeHtml(c.ticker)}</b> ${c.decision} — score ${c.buyScore} / min ${c.minScoreThreshold}\n` +
        escapeHtml(c.rationale)
      );
    }
    case 'decision_recorded': {
      const d = event.decision;
      return (
        `📝 <b>${escapeHtml(d.ticker)}</b> ${d.transition} @ ${fmt(d.currentPrice)} ` +
        `(confidence ${d.confidence}, urgency ${d.adjustmentUrgency})\n` +
        escapeHtml(d.technicalTrend.slice(0, 300))
      );
    }
    case 'cycle_completed': {
      const r = event.report;
      let msg = `📊 <b>Cycle ${escapeHtml(r.cycleId)}</b>\n`;
      msg += `Held ${r.held} | Revised ${r.revised} | Closed ${r.closed} | Skipped ${r.skipped}\n`;
      msg += `Opened ${r.opened} | Rejected ${r.rejected}`;
      if (r.failed > 0) msg += ` | ⚠️ Failed ${r.failed}`;
      if (r.cancelled > 0) msg += ` | Cancelled ${r.cancelled}`;
      msg += `\nPositions: <b>${r.openPositions}/${r.capacity}</b>\n`;
      msg += `Cumulative: ${fmtPct(r.cumulativeProfitRate)} | Win rate: ${r.winRate.toFixed(1)}%`;
      return msg;
    }
  }
}

/** Posts selected engine events to one Telegram chat. */
export class TelegramNotifier implements NotificationSink {
  private readonly events: Set<EventType>;

  constructor(private readonly options: TelegramNotifierOptions) {
    this.events = new Set(options.events ?? DEFAULT_EVENTS);
  }

  async publish(event: EngineEvent): Promise<void> {
    if (!this.events.has(event.type)) return;
    await this.sendMessage(formatEvent(event));
  }

  async sendMessage(text: string): Promise<void> {
    const res = await fetch(`${TELEGRAM_BASE}/bot${this.options.botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: this.options.chatId,
        text,
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      }),
    });

    if (!res.ok) {
      const err = await res.text();
      throw new Error(`Telegram send error ${res.status}: ${err}`);
    }
  }
}
