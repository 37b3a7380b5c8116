import { Injectable } from '@nestjs/common';
import axios from 'axios';
import { EmbeddingProvider } from '../types';

export const MAX_INPUT_CHARS = 8000;

/**
 * Whitespace-collapsed, trimmed and length-capped form of an embedding input.
 * Applying it twice gives the same string.
 */
export function normalizeEmbeddingInput(text: string): string {
  return String(text || '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_INPUT_CHARS);
}

@Injectable()
export class EmbeddingService implements EmbeddingProvider {
  private readonly endpoint = (process.env.EMBEDDING_ENDPOINT || 'https://api.openai.com/v1/embeddings').trim();
  private readonly key = (process.env.EMBEDDING_API_KEY || '').trim();
  private readonly model = process.env.EMBEDDING_MODEL || 'text-embedding-3-small';
  private readonly timeoutMs = Number(process.env.EMBEDDING_TIMEOUT_MS || 8000);

  isConfigured(): boolean {
    return Boolean(this.key && this.endpoint);
  }

  /**
   * One request for the whole batch. The returned vectors line up with
   * `texts` by position.
   */
  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) return [];
    if (!this.isConfigured()) {
      throw new Error('EMBEDDING_API_KEY is not configured');
    }

    const input = texts.map(normalizeEmbeddingInput);

    const response = await axios.post(
      this.endpoint,
      { model: this.model, input },
      {
        timeout: Number.isFinite(this.timeoutMs) && this.timeoutMs > 0 ? this.timeoutMs : 8000,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.key}`,
          'api-key': this.key,
        },
      },
    );

    return this.parseVectors(response.data, texts.length);
  }

  private parseVectors(payload: unknown, expected: number): number[][] {
    const rows = payload && typeof payload === 'object' && 'data' in payload ? payload.data : null;
    if (!Array.isArray(rows) || rows.length !== expected) {
      throw new Error(`Invalid embedding response: expected ${expected} vectors`);
    }

    const ordered: Array<number[] | null> = Array.from({ length: expected }, () => null);
    rows.forEach((row: unknown, position: number) => {
      if (!row || typeof row !== 'object') {
        throw new Error('Invalid embedding response: malformed row');
      }
      const record = row as Record<string, unknown>;
      const index = typeof record.index === 'number' ? record.index : position;
      const embedding = record.embedding;
      if (
        index < 0 ||
        index >= expected ||
        !Array.isArray(embedding) ||
        !embedding.length ||
        !embedding.every((x): x is number => typeof x === 'number')
      ) {
        throw new Error('Invalid embedding response: malformed row');
      }
      ordered[index] = embedding;
    });

    const vectors = ordered.filter((vector): vector is number[] => vector !== null);
    if (vectors.length !== expected) {
      throw new Error('Invalid embedding response: missing vectors');
    }
    return vectors;
  }

}
