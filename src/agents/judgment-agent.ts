import { loadSkill } from '../utils/skill-loader.js';
import type { JudgmentContext, JudgmentProducer } from '../types/collaborators.js';
import type { Position } from '../types/portfolio.js';

type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

/** The slice of the OpenAI client this agent calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        max_tokens: number;
        temperature: number;
        messages: ChatMessage[];
      }): Promise<{ choices: Array<{ message?: { content?: string | null } }> }>;
    };
  };
}

export interface JudgmentAgentOptions {
  client: ChatClient;
  model: string;
  maxTokens?: number;
}

export function stripCodeFences(text: string): string {
  return text.replace(/```json\n?/g, '').replace(/```\n?/g, '').trim();
}

/**
 * Asks the model for a daily judgment on one position. The reply is returned as
 * parsed JSON and left unvalidated; the decision processor owns validation.
 */
export class JudgmentAgent implements JudgmentProducer {
  private readonly client: ChatClient;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(options: JudgmentAgentOptions) {
    this.client = options.client;
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 1024;
  }

  async judge(position: Position, context: JudgmentContext): Promise<unknown> {
    const payload = {
      cycle_id: context.cycle.cycleId,
      cycle_date: context.cycle.cycleDate,
      market_condition: context.marketCondition,
      ticker: position.ticker,
      company_name: position.companyName,
      sector: position.sector,
      buy_price: position.buyPrice,
      buy_date: position.buyDate,
      holding_days: position.holdingDays,
      current_price: context.currentPrice ?? position.currentPrice,
      scenario: position.scenario,
    };

    const msg = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: 0,
      messages: [
        { role: 'system', content: loadSkill('judgment-agent') },
        { role: 'user', content: JSON.stringify(payload, null, 2) },
      ],
    });

    const text = msg.choices[0]?.message?.content ?? '';
    const clean = stripCodeFences(text);
    try {
      return JSON.parse(clean);
    } catch {
      // Unparseable replies still reach validation, which rejects them with a MalformedJudgment.
      console.warn(`[JudgmentAgent] ${position.ticker}: reply is not JSON (${clean.slice(0, 80)})`);
      return { unparsed: clean };
    }
  }
}
