import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { createChatCompletion, streamChatCompletion } from './openaiClient';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequestOptions {
  temperature: number;
  maxTokens: number;
  signal: AbortSignal;
}

export interface CompletionBackend {
  readonly model: string;
  complete(messages: readonly ChatMessage[], options: CompletionRequestOptions): Promise<string>;
  /** Text fragments in order; ending the iteration early must release the request. */
  stream(messages: readonly ChatMessage[], options: CompletionRequestOptions): AsyncIterable<string>;
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAICompletionBackend implements CompletionBackend {
  constructor(readonly model: string) {}

  async complete(messages: readonly ChatMessage[], options: CompletionRequestOptions): Promise<string> {
    const completion = await createChatCompletion(
      messages.map(toOpenAIMessage),
      { model: this.model, temperature: options.temperature, max_tokens: options.maxTokens },
      options.signal
    );
    return completion.choices[0]?.message?.content ?? '';
  }

  stream(messages: readonly ChatMessage[], options: CompletionRequestOptions): AsyncIterable<string> {
    return streamChatCompletion(messages.map(toOpenAIMessage), {
      model: this.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      signal: options.signal,
    });
  }
}
