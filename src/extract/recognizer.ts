import type { EntityType, RelationType, Segment, SourceDocument } from '../types.js';

export interface Mention {
  type: EntityType;
  surface: string;
  segmentId: string;
  confidence: number;
  description?: string;
  aliases?: string[];
}

export interface EndpointRef {
  type: EntityType;
  surface: string;
}

export interface RelationMention {
  type: Exclude<RelationType, 'ALIGNED_WITH'>;
  source: EndpointRef;
  target: EndpointRef;
  segmentId: string;
  weight: number;
}

export interface Recognition {
  mentions: Mention[];
  relations: RelationMention[];
  warnings: string[];
}

/**
 * Pluggable recognition capability. Implementations only read the segments of
 * one document and report raw mentions; aggregation and thresholds are applied
 * by the extractor.
 */
export interface EntityRecognizer {
  readonly name: string;
  recognize(document: SourceDocument, segments: Segment[], signal?: AbortSignal): Promise<Recognition>;
}

export const emptyRecognition = (): Recognition => ({ mentions: [], relations: [], warnings: [] });
