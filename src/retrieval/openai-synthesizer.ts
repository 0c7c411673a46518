import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import OpenAI from 'openai';
import type { ChatCompletionContentPart, ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { SynthesizerConfig } from '../config.js';
import type { ImageReference } from '../types.js';
import type { AnswerSynthesizer, SynthesisRequest } from './synthesize.js';

const SYSTEM_PROMPT =
  'You answer questions using only the documents provided. If the documents do not contain the answer, say so. ' +
  'Mention the document names you relied on.';

const NON_RETRYABLE_STATUS = new Set([400, 401, 403, 404, 422]);

const IMAGE_MIME: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg'
};

export function buildPrompt({ question, context, images }: SynthesisRequest): string {
  const documents = context.map((entry) => `Document: ${entry.origin}\nContent:\n${entry.excerpt}\n`).join('\n---\n');
  const imageNote = images.length
    ? `\n\nAttached images, in order: ${images.map((image) => image.origin).join(', ')}`
    : '';

  return [
    'Context from documents:',
    documents || '(no text documents matched)',
    imageNote.trim(),
    `Question: ${question}`,
    'Answer:'
  ]
    .filter(Boolean)
    .join('\n\n');
}

async function imagePart(image: ImageReference): Promise<ChatCompletionContentPart | null> {
  const mime = IMAGE_MIME[extname(image.path).toLowerCase()];
  if (!mime) return null;
  try {
    const data = await readFile(image.path);
    return { type: 'image_url', image_url: { url: `data:${mime};base64,${data.toString('base64')}` } };
  } catch {
    // The file moved or was deleted after ingestion; answer from text alone.
    return null;
  }
}

/** Chat-completions synthesizer for OpenAI or any compatible endpoint (`KB_SYNTH_BASE_URL`). */
export class OpenAIChatSynthesizer implements AnswerSynthesizer {
  readonly name: string;
  readonly supportsImages = true;
  private readonly client: OpenAI;

  constructor(private readonly config: SynthesizerConfig, client?: OpenAI) {
    this.name = `openai:${config.model}`;
    // Retries are owned by the query engine.
    this.client =
      client ?? new OpenAI({ apiKey: config.apiKey ?? '', baseURL: config.baseURL ?? undefined, maxRetries: 0 });
  }

  async synthesize(request: SynthesisRequest, signal?: AbortSignal): Promise<string> {
    const prompt = buildPrompt(request);
    const parts: ChatCompletionContentPart[] = [{ type: 'text', text: prompt }];
    for (const image of request.images) {
      const part = await imagePart(image);
      if (part) parts.push(part);
    }

    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: parts.length === 1 ? prompt : parts }
    ];

    const response = await this.client.chat.completions.create(
      { model: this.config.model, temperature: this.config.temperature, messages },
      { signal }
    );

    const answer = response.choices[0]?.message?.content?.trim();
    if (!answer) throw new Error(`Empty response from ${this.config.model}`);
    return answer;
  }

  isRetryable(error: unknown): boolean {
    if (error instanceof OpenAI.APIError && error.status !== undefined) return !NON_RETRYABLE_STATUS.has(error.status);
    return true;
  }
}
