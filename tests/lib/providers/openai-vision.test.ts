import type { ChatCompletion } from 'openai/resources/chat/completions';
import { silentLogger } from '../../../src/lib/logger';
import { OpenAIVisionProvider } from '../../../src/lib/providers/openai-vision';
import type { ChatClient } from '../../../src/lib/providers/openai-vision';

function completion(content: string): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-4o-mini',
    choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', content } }],
  } as unknown as ChatCompletion;
}

describe('OpenAIVisionProvider', () => {
  let create: jest.Mock;
  let provider: OpenAIVisionProvider;

  beforeEach(() => {
    create = jest.fn();
    const client: ChatClient = { chat: { completions: { create } } };
    provider = new OpenAIVisionProvider({ client, model: 'gpt-4o-mini', timeoutMs: 1000, logger: silentLogger });
  });

  describe('identify', () => {
    it('parses the JSON guess and coerces the confidence', async () => {
      create.mockResolvedValue(
        completion(
          JSON.stringify({
            productName: 'Nike Air Force 1 Low',
            brand: 'Nike',
            productLine: 'Air Force 1 Low',
            size: null,
            category: 'sneakers',
            confidence: '0.82',
          })
        )
      );

      const guess = await provider.identify(['https://img.test/af1.jpg'], ['NIKE', 'US 10']);

      expect(guess).toEqual({
        productName: 'Nike Air Force 1 Low',
        brand: 'Nike',
        productLine: 'Air Force 1 Low',
        category: 'sneakers',
        confidence: 0.82,
      });
      expect(guess?.size).toBeUndefined();

      const [body, options] = create.mock.calls[0];
      expect(body).toMatchObject({ model: 'gpt-4o-mini', response_format: { type: 'json_object' } });
      expect(body.messages[1].content).toEqual([
        { type: 'text', text: expect.stringContaining('Text read from the item: NIKE | US 10') },
        { type: 'image_url', image_url: { url: 'https://img.test/af1.jpg' } },
      ]);
      expect(options.signal).toBeInstanceOf(AbortSignal);
    });

    it('skips the request without usable images', async () => {
      expect(await provider.identify([], ['NIKE'])).toBeNull();
      expect(await provider.identify(['  '], [])).toBeNull();
      expect(create).not.toHaveBeenCalled();
    });

    it('returns null for unparseable or invalid answers', async () => {
      create.mockResolvedValueOnce(completion('not json'));
      expect(await provider.identify(['https://img.test/a.jpg'], [])).toBeNull();

      create.mockResolvedValueOnce(completion(JSON.stringify({ confidence: 'high' })));
      expect(await provider.identify(['https://img.test/a.jpg'], [])).toBeNull();
    });

    it('returns null when the request fails', async () => {
      create.mockRejectedValue(new Error('503 Service Unavailable'));
      expect(await provider.identify(['https://img.test/a.jpg'], [])).toBeNull();
    });

    it('returns null when the request times out', async () => {
      const client: ChatClient = { chat: { completions: { create: () => new Promise<ChatCompletion>(() => undefined) } } };
      const slow = new OpenAIVisionProvider({ client, model: 'gpt-4o-mini', timeoutMs: 10, logger: silentLogger });
      expect(await slow.identify(['https://img.test/a.jpg'], [])).toBeNull();
    });

    it('is disabled without an API key', async () => {
      const disabled = new OpenAIVisionProvider({ apiKey: '', logger: silentLogger });
      expect(await disabled.identify(['https://img.test/a.jpg'], [])).toBeNull();
    });
  });

  describe('describeCondition', () => {
    it('returns the narrative and factors', async () => {
      create.mockResolvedValue(
        completion(
          JSON.stringify({
            narrative: 'Very Good. Light creasing on the toe box.',
            factors: [{ area: 'toe box', issue: 'creasing', severity: 'minor', valueImpactPercent: '5' }],
          })
        )
      );

      expect(await provider.describeCondition(['https://img.test/af1.jpg'])).toEqual({
        narrative: 'Very Good. Light creasing on the toe box.',
        factors: [{ area: 'toe box', issue: 'creasing', severity: 'minor', valueImpactPercent: 5 }],
      });
    });

    it('defaults missing fields', async () => {
      create.mockResolvedValue(completion('{}'));
      expect(await provider.describeCondition(['https://img.test/af1.jpg'])).toEqual({ narrative: '', factors: [] });
    });

    it('returns null when the request fails', async () => {
      create.mockRejectedValue(new Error('network down'));
      expect(await provider.describeCondition(['https://img.test/af1.jpg'])).toBeNull();
    });
  });
});
