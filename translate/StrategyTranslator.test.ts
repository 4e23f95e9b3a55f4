import { describe, it, expect } from 'vitest';
import { ChatCompletionTranslator, ChatMessage, extractStrategyJson } from './StrategyTranslator';
import { TranslationError } from '../compiler/errors';
import { TranslatorConfig } from '../config';

const config: TranslatorConfig = {
  apiKey: 'test-secret',
  baseUrl: 'http://localhost:9999/v1',
  model: 'test-model',
  temperature: 0.1,
  timeoutMs: 1000,
};

/** Replies from a queue instead of the network */
class ScriptedTranslator extends ChatCompletionTranslator {
  readonly requests: ChatMessage[][] = [];

  constructor(private readonly reply: () => string) {
    super(config);
  }

  protected async requestCompletion(messages: ChatMessage[]): Promise<string> {
    this.requests.push(messages);
    return this.reply();
  }
}

describe('extractStrategyJson', () => {
  it('pulls the JSON object out of surrounding text', () => {
    const reply =
      'Here is the strategy:\n```json\n' +
      '{"entry": [{"left": "close", "operator": ">", "right": "sma(close, 20)"}], "exit": []}\n```';

    expect(extractStrategyJson(reply)).toEqual({
      entry: [{ left: 'close', operator: '>', right: 'sma(close, 20)' }],
      exit: [],
    });
  });

  it('normalizes connectors', () => {
    const json = extractStrategyJson(
      '{"entry": [{"left": "close", "operator": ">", "right": 1, "connector": "or"}], "exit": []}'
    );
    expect(json.entry[0].connector).toBe('OR');
  });

  it('fails when there is no JSON', () => {
    expect(() => extractStrategyJson('I cannot help with that')).toThrow(TranslationError);
    expect(() => extractStrategyJson('I cannot help with that')).toThrow(/No JSON object found/);
  });

  it('fails on malformed JSON', () => {
    expect(() => extractStrategyJson('{"entry": [}')).toThrow(/Translator reply is not valid JSON/);
  });

  it('requires both sections', () => {
    expect(() => extractStrategyJson('{"entry": []}')).toThrow(
      'Translator reply does not match the strategy format: exit: Required'
    );
  });
});

describe('ChatCompletionTranslator', () => {
  it('requires an API key', () => {
    expect(() => new ChatCompletionTranslator({ ...config, apiKey: undefined })).toThrow(
      'TRANSLATOR_API_KEY (or GROQ_API_KEY) is not set'
    );
  });

  it('sends the system prompt and the request text', async () => {
    const translator = new ScriptedTranslator(() => '{"entry": [], "exit": []}');

    await expect(translator.translate('Buy when close is above 100')).resolves.toEqual({
      entry: [],
      exit: [],
    });

    const [messages] = translator.requests;
    expect(messages.map((m) => m.role)).toEqual(['system', 'user']);
    expect(messages[0].content).toContain('sma(series, period) - Simple Moving Average');
    expect(messages[1].content).toContain('Buy when close is above 100');
  });

  it('rejects empty input without a request', async () => {
    const translator = new ScriptedTranslator(() => '{}');
    await expect(translator.translate('   ')).rejects.toThrow('Natural language input is empty');
    expect(translator.requests).toHaveLength(0);
  });

  it('wraps transport failures', async () => {
    const failure = new Error('socket hang up');
    const translator = new ScriptedTranslator(() => {
      throw failure;
    });

    const error = await translator.translate('anything').catch((e: unknown) => e);
    if (!(error instanceof TranslationError)) throw new Error('expected a TranslationError');
    expect(error.message).toBe('Translator request failed: socket hang up');
    expect(error.cause).toBe(failure);
  });
});
