/**
 * Ingestion pipeline: parse, extract, integrate.
 *
 * Parsing and extraction of different documents run in parallel; integration
 * goes through the store lock. Each document's timeout covers parsing and
 * extraction; once its mutation holds the lock it runs to completion, so a
 * caller never sees a failure for a document that was committed. A failure
 * never reaches the other documents of a batch.
 */
import { randomUUID } from 'node:crypto';
import { INGESTION } from '../config.js';
import { describeError, isFusionError } from '../errors.js';
import { EntityExtractor } from '../extract/index.js';
import { GraphBuilder } from '../graph/builder.js';
import {
  parseDocument, PaletteVisualAnalyzer, toBytes,
  type ParseResult, type PdfReader, type RawContent, type VisualAnalyzer,
} from '../parser/index.js';
import { logger } from '../utils/logger.js';
import { throwIfAborted, withTimeout } from '../utils/retry.js';
import { hashString, shortHash } from '../utils/hash.js';
import type { ExtractionReport } from '../extract/index.js';
import type { GraphStore } from '../graph/store.js';
import type { DocumentKind, SourceDocument } from '../types.js';

const log = logger.child('Ingest');

export interface IngestRequest {
  kind: DocumentKind;
  title?: string;
  /** where the content came from (a file name); titles the document when neither a title is given nor one is embedded */
  sourceName?: string;
  content: RawContent;
}

export interface IngestReport {
  documentId: string;
  kind: DocumentKind;
  title: string;
  segments: number;
  candidates: number;
  entitiesCreated: number;
  entitiesMatched: number;
  relations: number;
  discarded: { candidate: string; confidence: number }[];
  conflicts: string[];
  warnings: string[];
  graphVersion: number;
}

export interface IngestFailure {
  index: number;
  kind: DocumentKind;
  title: string | null;
  code: string;
  error: string;
}

export interface BatchSummary {
  succeeded: IngestReport[];
  failed: IngestFailure[];
  graphVersion: number;
}

export interface PipelineOptions {
  extractor?: EntityExtractor;
  builder?: GraphBuilder;
  analyzer?: VisualAnalyzer;
  pdf?: PdfReader;
  timeoutMs?: number;
  /** extra entropy for document ids; re-ingesting identical content still yields a new document */
  nonce?: () => string;
  clock?: () => Date;
}

interface Prepared {
  document: SourceDocument;
  parsed: ParseResult;
  extraction: ExtractionReport;
}

export class IngestionPipeline {
  private readonly extractor: EntityExtractor;
  private readonly builder: GraphBuilder;
  private readonly analyzer: VisualAnalyzer;
  private readonly pdf: PdfReader | undefined;
  private readonly timeoutMs: number;
  private readonly nonce: () => string;
  private readonly clock: () => Date;

  constructor(private readonly store: GraphStore, opts: PipelineOptions = {}) {
    this.extractor = opts.extractor ?? new EntityExtractor();
    this.builder = opts.builder ?? new GraphBuilder();
    this.analyzer = opts.analyzer ?? new PaletteVisualAnalyzer();
    this.pdf = opts.pdf;
    this.timeoutMs = opts.timeoutMs ?? INGESTION.timeoutMs;
    this.nonce = opts.nonce ?? randomUUID;
    this.clock = opts.clock ?? (() => new Date());
  }

  async ingest(request: IngestRequest, signal?: AbortSignal): Promise<IngestReport> {
    const label = `ingest ${request.kind}${request.title ? ` "${request.title}"` : ''}`;
    const prepared = await withTimeout((s) => this.prepare(request, s), this.timeoutMs, label, signal);
    return this.commit(prepared, signal);
  }

  async ingestMany(requests: readonly IngestRequest[], signal?: AbortSignal): Promise<BatchSummary> {
    const settled = await Promise.allSettled(requests.map((r) => this.ingest(r, signal)));
    const summary: BatchSummary = { succeeded: [], failed: [], graphVersion: this.store.graph.version };
    settled.forEach((result, index) => {
      const request = requests[index];
      if (!request) return;
      if (result.status === 'fulfilled') {
        summary.succeeded.push(result.value);
        return;
      }
      const err: unknown = result.reason;
      summary.failed.push({
        index,
        kind: request.kind,
        title: request.title ?? null,
        code: isFusionError(err) ? err.code : 'UNEXPECTED',
        error: describeError(err),
      });
      log.warn('document failed', { index, kind: request.kind, error: err });
    });
    log.info('batch finished', {
      succeeded: summary.succeeded.length, failed: summary.failed.length, version: summary.graphVersion,
    });
    return summary;
  }

  private async prepare(request: IngestRequest, signal: AbortSignal): Promise<Prepared> {
    const bytes = toBytes(request.content);
    const contentHash = hashString(bytes);
    const givenTitle = request.title?.trim() ?? '';
    const documentId = `doc_${shortHash(`${request.kind}\n${givenTitle}\n${contentHash}\n${this.nonce()}`)}`;

    const parsed = await parseDocument(documentId, request.kind, bytes, { analyzer: this.analyzer, pdf: this.pdf, signal });
    const document: SourceDocument = {
      id: documentId,
      kind: request.kind,
      title: givenTitle || parsed.embeddedTitle || request.sourceName?.trim() || `Untitled ${request.kind}`,
      contentHash,
      byteLength: bytes.byteLength,
      ingestedAt: this.clock().toISOString(),
    };
    throwIfAborted(signal, 'ingest');

    const extraction = await this.extractor.extract(document, parsed.segments, signal);
    throwIfAborted(signal, 'ingest');
    return { document, parsed, extraction };
  }

  private commit({ document, parsed, extraction }: Prepared, signal?: AbortSignal): Promise<IngestReport> {
    const documentId = document.id;
    return this.store.mutate(`ingest ${documentId}`, (state) => {
      // Last point at which the caller can still cancel; past it the document commits.
      throwIfAborted(signal, 'ingest');
      const integration = this.builder.integrate(state.graph.toData(), extraction.batch);
      const report: IngestReport = {
        documentId,
        kind: document.kind,
        title: document.title,
        segments: parsed.segments.length,
        candidates: extraction.batch.entities.length,
        entitiesCreated: integration.created,
        entitiesMatched: integration.matched,
        relations: integration.relations,
        discarded: extraction.discarded.map((d) => ({ candidate: d.candidate, confidence: d.confidence })),
        conflicts: integration.conflicts.map((c) => c.message),
        warnings: [...parsed.warnings, ...extraction.warnings],
        graphVersion: integration.data.version,
      };
      log.info('document ingested', {
        documentId, title: document.title, segments: report.segments, created: report.entitiesCreated, version: report.graphVersion,
      });
      return { graph: integration.data, documents: [document], segments: parsed.segments, result: report };
    });
  }
}
