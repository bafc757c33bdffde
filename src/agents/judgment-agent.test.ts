import { describe, expect, it, vi } from 'vitest';
import { cycle, makeEngine, openPosition } from '../testing/fixtures.js';
import { JudgmentAgent, stripCodeFences, type ChatClient } from './judgment-agent.js';

type CreateParams = Parameters<ChatClient['chat']['completions']['create']>[0];

function fakeClient(content: string | null) {
  const create = vi.fn(async (_params: CreateParams) => ({ choices: [{ message: { content } }] }));
  return { create, client: { chat: { completions: { create } } } };
}

describe('stripCodeFences', () => {
  it('removes json fences', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });
});

describe('JudgmentAgent', () => {
  it('sends the position and returns the parsed reply', async () => {
    const { engine } = makeEngine();
    const position = await openPosition(engine);
    const { client, create } = fakeClient('```json\n{"confidence": 7, "adjustmentUrgency": "Low"}\n```');
    const agent = new JudgmentAgent({ client, model: 'test-model' });

    const reply = await agent.judge(position, {
      cycle: cycle('2025-03-04#1400'),
      currentPrice: 10400,
      marketCondition: 'bull',
    });

    expect(reply).toEqual({ confidence: 7, adjustmentUrgency: 'Low' });
    expect(create).toHaveBeenCalledTimes(1);

    const params = create.mock.calls[0]?.[0];
    expect(params).toMatchObject({ model: 'test-model', max_tokens: 1024, temperature: 0 });
    const [system, user] = params?.messages ?? [];
    expect(system?.role).toBe('system');
    expect(system?.content).toContain('Respond with ONLY a JSON object');
    expect(JSON.parse(user?.content ?? '{}')).toMatchObject({
      cycle_id: '2025-03-04#1400',
      market_condition: 'bull',
      ticker: 'AAA',
      buy_price: 10000,
      current_price: 10400,
      scenario: { targetPrice: 12000, stopLoss: 9000, revision: 1 },
    });
  });

  it('passes an unparseable reply through for validation to reject', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { engine } = makeEngine();
    const position = await openPosition(engine);
    const { client } = fakeClient('I think you should hold.');

    const reply = await new JudgmentAgent({ client, model: 'test-model' }).judge(position, {
      cycle: cycle('2025-03-04#1400'),
      currentPrice: 10400,
      marketCondition: 'neutral',
    });

    expect(reply).toEqual({ unparsed: 'I think you should hold.' });
    expect(warn).toHaveBeenCalledWith('[JudgmentAgent] AAA: reply is not JSON (I think you should hold.)');
    warn.mockRestore();
  });

  it('propagates client failures', async () => {
    const { engine } = makeEngine();
    const position = await openPosition(engine);
    const create = vi.fn(async () => { throw new Error('429 rate limited'); });
    const agent = new JudgmentAgent({ client: { chat: { completions: { create } } }, model: 'test-model' });

    await expect(
      agent.judge(position, { cycle: cycle('2025-03-04#1400'), currentPrice: 10400, marketCondition: 'neutral' }),
    ).rejects.toThrow('429 rate limited');
  });
});
