import fetch from 'node-fetch';
import { z } from 'zod';
import type { Completion, CompletionOptions, CompletionService, EmbeddingService } from './retrieval/types';

export interface OllamaOptions {
  baseUrl: string;
  model: string;
}

const GenerateResponseSchema = z.object({
  response: z.string(),
  prompt_eval_count: z.number().int().nonnegative().optional(),
  eval_count: z.number().int().nonnegative().optional(),
});

const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

function endpoint(baseUrl: string, pathname: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${pathname}`;
}

async function postJson(url: string, body: Record<string, unknown>): Promise<unknown> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  if (!response.ok) {
    const text = await response.text();
    throw new Error(`Ollama error ${response.status}: ${text}`);
  }
  return response.json();
}

export class OllamaCompletionService implements CompletionService {
  constructor(private readonly options: OllamaOptions) {}

  async complete(prompt: string, options: CompletionOptions): Promise<Completion> {
    const raw = await postJson(endpoint(this.options.baseUrl, '/api/generate'), {
      model: this.options.model,
      prompt,
      stream: false,
      ...(options.json ? { format: 'json' } : {}),
      options: {
        num_predict: options.maxTokens,
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      },
    });
    const data = GenerateResponseSchema.parse(raw);
    const usage =
      data.prompt_eval_count !== undefined && data.eval_count !== undefined
        ? { promptTokens: data.prompt_eval_count, completionTokens: data.eval_count }
        : undefined;
    return { text: data.response, ...(usage ? { usage } : {}) };
  }
}

export class OllamaEmbeddingService implements EmbeddingService {
  constructor(private readonly options: OllamaOptions) {}

  async embed(text: string): Promise<number[]> {
    if (!text.trim()) throw new Error('Text cannot be empty');
    const raw = await postJson(endpoint(this.options.baseUrl, '/api/embeddings'), {
      model: this.options.model,
      prompt: text,
    });
    return EmbeddingResponseSchema.parse(raw).embedding;
  }
}
