import { z } from 'zod';

// ── Documents & segments ──────────────────────────────────────────────────────

export const DOCUMENT_KINDS = ['screenplay', 'moodboard'] as const;
export type DocumentKind = typeof DOCUMENT_KINDS[number];

export interface SourceDocument {
  id: string;
  kind: DocumentKind;
  title: string;
  /** sha256 of the raw bytes; the bytes themselves are not retained */
  contentHash: string;
  byteLength: number;
  ingestedAt: string;
}

export type Modality = 'text' | 'image' | 'mixed';

export type SegmentRole =
  | 'title_page'
  | 'scene_heading'
  | 'character_cue'
  | 'parenthetical'
  | 'dialogue'
  | 'action'
  | 'transition'
  | 'paragraph'
  | 'region';

export interface Span {
  start: number;
  end: number;
}

export type Brightness = 'low' | 'medium' | 'high';

export interface VisualDescriptor {
  palette: string[];
  colorTerms: string[];
  brightness: Brightness | null;
  lightingTerms: string[];
  summary: string;
}

export interface Segment {
  id: string;
  documentId: string;
  ordinal: number;
  modality: Modality;
  role: SegmentRole;
  text: string;
  /** board region label; null for screenplay segments */
  label: string | null;
  visual: VisualDescriptor | null;
  /** character offsets for screenplays, region range for mood boards */
  span: Span;
  page: number | null;
}

export function segmentId(documentId: string, ordinal: number): string {
  return `${documentId}:${String(ordinal).padStart(5, '0')}`;
}

export function documentOfSegment(id: string): string {
  const idx = id.lastIndexOf(':');
  return idx === -1 ? id : id.slice(0, idx);
}

// ── Entities & relations ──────────────────────────────────────────────────────

export const ENTITY_TYPES = [
  'character', 'location', 'scene', 'visual-motif', 'color-palette', 'lighting-style',
] as const;
export type EntityType = typeof ENTITY_TYPES[number];

/** Screenplay-side types that the aligner links to visual types. */
export const NARRATIVE_TYPES: readonly EntityType[] = ['scene', 'location', 'character'];
export const VISUAL_TYPES: readonly EntityType[] = ['visual-motif', 'color-palette', 'lighting-style'];

export const RELATION_TYPES = [
  'APPEARS_IN', 'LOCATED_AT', 'SPEAKS_WITH', 'EVOKES_MOOD', 'ALIGNED_WITH',
] as const;
export type RelationType = typeof RELATION_TYPES[number];

export interface Entity {
  id: string;
  type: EntityType;
  canonicalName: string;
  aliases: string[];
  descriptions: string[];
  support: string[];
  documents: string[];
  createdSeq: number;
}

export interface Relation {
  source: string;
  target: string;
  type: RelationType;
  weight: number;
  support: string[];
}

export function relationKey(r: Pick<Relation, 'source' | 'type' | 'target'>): string {
  return `${r.source}|${r.type}|${r.target}`;
}

// ── Extractor output ──────────────────────────────────────────────────────────

export interface CandidateEntity {
  /** document-local id: `<documentId>/<type>/<normalized name>` */
  localId: string;
  documentId: string;
  type: EntityType;
  name: string;
  aliases: string[];
  descriptions: string[];
  support: string[];
  confidence: number;
}

export interface CandidateRelation {
  source: string;
  target: string;
  type: Exclude<RelationType, 'ALIGNED_WITH'>;
  weight: number;
  support: string[];
}

export interface CandidateBatch {
  documentId: string;
  entities: CandidateEntity[];
  relations: CandidateRelation[];
}

// ── Persisted state ───────────────────────────────────────────────────────────

const VisualDescriptorSchema = z.object({
  palette:       z.array(z.string()),
  colorTerms:    z.array(z.string()),
  brightness:    z.enum(['low', 'medium', 'high']).nullable(),
  lightingTerms: z.array(z.string()),
  summary:       z.string(),
});

export const SourceDocumentSchema = z.object({
  id:          z.string(),
  kind:        z.enum(DOCUMENT_KINDS),
  title:       z.string(),
  contentHash: z.string(),
  byteLength:  z.number().int().nonnegative(),
  ingestedAt:  z.string(),
});

export const SegmentSchema = z.object({
  id:         z.string(),
  documentId: z.string(),
  ordinal:    z.number().int().nonnegative(),
  modality:   z.enum(['text', 'image', 'mixed']),
  role:       z.enum([
    'title_page', 'scene_heading', 'character_cue', 'parenthetical', 'dialogue',
    'action', 'transition', 'paragraph', 'region',
  ]),
  text:       z.string(),
  label:      z.string().nullable(),
  visual:     VisualDescriptorSchema.nullable(),
  span:       z.object({ start: z.number().int(), end: z.number().int() }),
  page:       z.number().int().nullable(),
});

export const EntitySchema = z.object({
  id:            z.string(),
  type:          z.enum(ENTITY_TYPES),
  canonicalName: z.string(),
  aliases:       z.array(z.string()),
  descriptions:  z.array(z.string()),
  support:       z.array(z.string()).min(1),
  documents:     z.array(z.string()),
  createdSeq:    z.number().int().nonnegative(),
});

export const RelationSchema = z.object({
  source:  z.string(),
  target:  z.string(),
  type:    z.enum(RELATION_TYPES),
  weight:  z.number().min(0).max(1),
  support: z.array(z.string()).min(1),
});

export const GraphDataSchema = z.object({
  version:   z.number().int().nonnegative(),
  nextSeq:   z.number().int().nonnegative(),
  entities:  z.array(EntitySchema),
  relations: z.array(RelationSchema),
  redirects: z.record(z.string()),
});

export type GraphData = z.infer<typeof GraphDataSchema>;

export const PersistedStateSchema = z.object({
  documents: z.array(SourceDocumentSchema),
  segments:  z.array(SegmentSchema),
  graph:     GraphDataSchema,
});

export type PersistedState = z.infer<typeof PersistedStateSchema>;
