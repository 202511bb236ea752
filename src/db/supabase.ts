/**
 * Supabase persistence. Same layout as the SQLite tables, prefixed `rg_`:
 * rg_documents, rg_segments (body jsonb) and a single-row rg_graph.
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { NonRetryableError } from '../utils/retry.js';
import {
  GraphDataSchema, SegmentSchema, SourceDocumentSchema, type PersistedState,
} from '../types.js';
import type { GraphPersistence } from './persistence.js';

const UPSERT_CHUNK = 500;

function isConnError(err: unknown): boolean {
  return err instanceof Error &&
    (err.message.includes('ECONNREFUSED') || err.message.includes('fetch failed'));
}

function rows<T>(schema: z.ZodType<T>, data: unknown): T[] {
  return z.array(z.object({ body: schema })).parse(data ?? []).map((r) => r.body);
}

export class SupabasePersistence implements GraphPersistence {
  readonly name = 'supabase';
  private readonly client: SupabaseClient;
  private readonly savedDocuments = new Set<string>();
  private readonly savedSegments = new Set<string>();

  constructor(url: string, serviceKey: string) {
    this.client = createClient(url, serviceKey, { auth: { persistSession: false } });
  }

  private fail(op: string, message: string): never {
    const err = new Error(`Supabase ${op} failed: ${message}`);
    // Connection problems are worth retrying; schema or auth errors are not.
    if (isConnError(err)) throw err;
    throw new NonRetryableError(err.message, err);
  }

  async load(): Promise<PersistedState | null> {
    const graph = await this.client.from('rg_graph').select('body').eq('id', 1).maybeSingle();
    if (graph.error) this.fail('load graph', graph.error.message);
    if (!graph.data) return null;

    const documents = await this.client.from('rg_documents').select('body').order('id');
    if (documents.error) this.fail('load documents', documents.error.message);
    const segments = await this.client.from('rg_segments').select('body').order('id');
    if (segments.error) this.fail('load segments', segments.error.message);

    const state: PersistedState = {
      documents: rows(SourceDocumentSchema, documents.data),
      segments: rows(SegmentSchema, segments.data),
      graph: z.object({ body: GraphDataSchema }).parse(graph.data).body,
    };
    for (const d of state.documents) this.savedDocuments.add(d.id);
    for (const s of state.segments) this.savedSegments.add(s.id);
    logger.info('Supabase state loaded', { documents: state.documents.length, version: state.graph.version });
    return state;
  }

  async save(state: PersistedState): Promise<void> {
    const newDocuments = state.documents.filter((d) => !this.savedDocuments.has(d.id));
    if (newDocuments.length > 0) {
      const { error } = await this.client.from('rg_documents').upsert(
        newDocuments.map((d) => ({ id: d.id, kind: d.kind, title: d.title, body: d })),
      );
      if (error) this.fail('save documents', error.message);
      for (const d of newDocuments) this.savedDocuments.add(d.id);
    }

    const newSegments = state.segments.filter((s) => !this.savedSegments.has(s.id));
    for (let i = 0; i < newSegments.length; i += UPSERT_CHUNK) {
      const chunk = newSegments.slice(i, i + UPSERT_CHUNK);
      const { error } = await this.client.from('rg_segments').upsert(
        chunk.map((s) => ({ id: s.id, document_id: s.documentId, ordinal: s.ordinal, body: s })),
      );
      if (error) this.fail('save segments', error.message);
      for (const s of chunk) this.savedSegments.add(s.id);
    }

    const { error } = await this.client.from('rg_graph').upsert({
      id: 1, version: state.graph.version, body: state.graph, updated_at: new Date().toISOString(),
    });
    if (error) this.fail('save graph', error.message);
  }
}
