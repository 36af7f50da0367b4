/**
 * Retrieval over ingested file chunks
 */

import { z } from 'zod';
import type { Chunk, FileCitationAnnotation } from '../models';
import type { EntityStore } from '../storage';
import { truncateText } from './chunking';

export interface RetrievalQuery {
  fileIds: string[];
  query: string;
  maxChars: number;
  signal?: AbortSignal;
}

export interface RetrievalHit {
  file_id: string;
  start_index: number;
  end_index: number;
  text: string;
  score: number;
}

export interface RetrievalSource {
  index: number;
  file_id: string;
  start_index: number;
  end_index: number;
  text: string;
}

/**
 * Ranks file content against a query. Hits come back best first.
 */
export interface Retriever {
  search(query: RetrievalQuery): Promise<RetrievalHit[]>;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]{2,}/gu) ?? [];
}

/**
 * Keyword retriever over the chunks table: a chunk scores the number of
 * occurrences of query terms it contains.
 */
export class ChunkRetriever implements Retriever {
  constructor(private readonly store: EntityStore) {}

  async search(query: RetrievalQuery): Promise<RetrievalHit[]> {
    if (query.fileIds.length === 0) return [];
    query.signal?.throwIfAborted();

    const terms = new Set(tokenize(query.query));
    const chunks = await this.store.listChunks(query.fileIds);

    const scored = chunks.map(chunk => ({ chunk, score: this.score(chunk, terms) }));
    const ranked = terms.size === 0
      ? scored
      : scored.filter(entry => entry.score > 0).sort((a, b) => b.score - a.score);

    const hits: RetrievalHit[] = [];
    let used = 0;
    for (const { chunk, score } of ranked) {
      if (used >= query.maxChars) break;
      hits.push({
        file_id: chunk.file_id,
        start_index: chunk.start_index,
        end_index: chunk.end_index,
        text: chunk.data,
        score,
      });
      used += chunk.data.length;
    }
    return hits;
  }

  private score(chunk: Chunk, terms: Set<string>): number {
    let score = 0;
    for (const token of tokenize(chunk.data)) {
      if (terms.has(token)) score++;
    }
    return score;
  }
}

/**
 * Number the hits as sources, stopping once maxChars of text is used. A first
 * hit longer than the budget is cut to it.
 */
export function selectSources(hits: RetrievalHit[], maxChars: number): RetrievalSource[] {
  const sources: RetrievalSource[] = [];
  let used = 0;

  for (const hit of hits) {
    const remaining = maxChars - used;
    if (remaining <= 0) break;

    if (hit.text.length > remaining) {
      if (sources.length > 0) break;
      const text = truncateText(hit.text, remaining);
      if (text.length > 0) {
        sources.push({
          index: 1,
          file_id: hit.file_id,
          start_index: hit.start_index,
          end_index: hit.start_index + Buffer.byteLength(text, 'utf8'),
          text,
        });
      }
      break;
    }

    sources.push({
      index: sources.length + 1,
      file_id: hit.file_id,
      start_index: hit.start_index,
      end_index: hit.end_index,
      text: hit.text,
    });
    used += hit.text.length;
  }
  return sources;
}

export function formatRetrievalOutput(sources: RetrievalSource[]): string {
  if (sources.length === 0) {
    return JSON.stringify({ sources: [], message: 'No relevant documents were found.' });
  }
  return JSON.stringify({ sources });
}

const RetrievalOutputSchema = z.object({
  sources: z.array(z.object({
    index: z.number().int(),
    file_id: z.string(),
    start_index: z.number().int(),
    end_index: z.number().int(),
    text: z.string(),
  })),
});

/**
 * Sources recorded in a retrieval tool output; empty when it holds none
 */
export function parseRetrievalOutput(output: string): RetrievalSource[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    return [];
  }
  const result = RetrievalOutputSchema.safeParse(parsed);
  return result.success ? result.data.sources : [];
}

const QUOTE_CHARS = 200;

/**
 * file_citation annotations for every [n] marker in text that names a source
 */
export function buildCitationAnnotations(text: string, sources: RetrievalSource[]): FileCitationAnnotation[] {
  if (sources.length === 0) return [];
  const byIndex = new Map(sources.map(source => [source.index, source]));

  const annotations: FileCitationAnnotation[] = [];
  for (const match of text.matchAll(/\[(\d+)\]/g)) {
    const source = byIndex.get(Number(match[1]));
    if (!source || match.index === undefined) continue;

    annotations.push({
      type: 'file_citation',
      text: match[0],
      start_index: match.index,
      end_index: match.index + match[0].length,
      file_citation: {
        file_id: source.file_id,
        quote: truncateText(source.text, QUOTE_CHARS),
      },
    });
  }
  return annotations;
}
