import { describe, it, expect } from 'vitest';
import type { ILLMService, LLMMessage, LLMResponse } from '../ai/llm';
import { JSON_ONLY_INSTRUCTION } from '../ai/prompts/templates';
import { ServiceUnavailableError, UpstreamError } from '../errors';
import { JSON_FALLBACK_NOTE } from '../utils/json-response';
import { CompletionService } from './completion.service';

class FakeLLM implements ILLMService {
  readonly calls: LLMMessage[][] = [];

  constructor(
    private readonly reply: string | Error,
    readonly available = true
  ) {}

  async chat(messages: LLMMessage[]): Promise<LLMResponse> {
    this.calls.push(messages);
    if (this.reply instanceof Error) throw this.reply;
    return { content: this.reply };
  }
}

describe('CompletionService', () => {
  it('returns raw content for text output, even when it is JSON', async () => {
    const llm = new FakeLLM('{"a": 1}');
    const result = await new CompletionService(llm).generateCompletion('Q', '', 'text');
    expect(result).toEqual({ kind: 'text', text: '{"a": 1}' });
  });

  it('sends the composed prompt as one user message', async () => {
    const llm = new FakeLLM('{}');
    await new CompletionService(llm).generateCompletion('Extract fields', 'id,name', 'json');
    expect(llm.calls).toEqual([
      [{ role: 'user', content: `Extract fields\n\nFile content:\nid,name\n\n${JSON_ONLY_INSTRUCTION}` }],
    ]);
  });

  it('parses a valid JSON reply without wrapper fields', async () => {
    const llm = new FakeLLM('{"total": 3, "tags": ["x"]}');
    const result = await new CompletionService(llm).generateCompletion('Q', '', 'json');
    expect(result).toEqual({ kind: 'structured', structured: { total: 3, tags: ['x'] } });
  });

  it('extracts an object from prose for JSON output', async () => {
    const llm = new FakeLLM('Sure! {"a":1} thanks');
    const result = await new CompletionService(llm).generateCompletion('Q', '', 'json');
    expect(result).toEqual({ kind: 'structured', structured: { a: 1 } });
  });

  it('degrades to a wrapped response instead of failing', async () => {
    const llm = new FakeLLM('not json at all');
    const result = await new CompletionService(llm).generateCompletion('Q', '', 'json');
    expect(result).toEqual({
      kind: 'structured',
      structured: { response: 'not json at all', note: JSON_FALLBACK_NOTE },
    });
  });

  it('defaults to text output and no file content', async () => {
    const llm = new FakeLLM('answer');
    const result = await new CompletionService(llm).generateCompletion('Just the prompt');
    expect(result).toEqual({ kind: 'text', text: 'answer' });
    expect(llm.calls[0]).toEqual([{ role: 'user', content: 'Just the prompt' }]);
  });

  it('fails without calling the API when the client is unavailable', async () => {
    const llm = new FakeLLM('unused', false);
    await expect(new CompletionService(llm).generateCompletion('Q', '', 'text')).rejects.toBeInstanceOf(
      ServiceUnavailableError
    );
    expect(llm.calls).toHaveLength(0);
  });

  it('propagates upstream failures', async () => {
    const llm = new FakeLLM(new UpstreamError('Invalid response from AI service.'));
    await expect(new CompletionService(llm).generateCompletion('Q', '', 'json')).rejects.toBeInstanceOf(
      UpstreamError
    );
  });
});
