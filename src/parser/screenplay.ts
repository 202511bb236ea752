/**
 * Screenplay segmentation for Fountain-style plain text.
 *
 * Every line is classified (heading, cue, parenthetical, dialogue, action,
 * transition, title page) and a new segment starts whenever the role changes,
 * on every heading/cue/transition line, and after a blank line. Blank lines are
 * absorbed by the segment before them, so spans tile the whole text.
 *
 * Text with neither a scene heading nor a character cue falls back to
 * paragraph segmentation.
 */
import { getLexicon } from '../extract/lexicon.js';
import { segmentId, type Segment, type SegmentRole } from '../types.js';

const SCENE_HEADING  = /^(?:INT\.?\/EXT|INT|EXT|EST|I\/E)[.\s]/i;
const FORCED_HEADING = /^\.[A-Za-z0-9]/;
const HEADING_PREFIX = /^(?:INT\.?\/EXT|INT|EXT|EST|I\/E)\.?\s*/i;
const TITLE_KEY      = /^(?:title|credit|author|authors|source|draft date|date|contact|copyright|notes|revision)\s*:/i;
const CUE_NAME       = /^[A-Z][A-Z0-9 .'\-]*[A-Z0-9']$|^[A-Z]$/;

interface Line {
  text: string;
  trimmed: string;
  start: number;
  end: number;
  blank: boolean;
}

interface OpenSegment {
  role: SegmentRole;
  start: number;
  end: number;
}

export interface ScreenplaySegmentation {
  segments: Segment[];
  structured: boolean;
  warnings: string[];
}

function splitLines(content: string): Line[] {
  const lines: Line[] = [];
  let pos = 0;
  while (pos < content.length) {
    const nl = content.indexOf('\n', pos);
    const end = nl === -1 ? content.length : nl + 1;
    const text = content.slice(pos, end).replace(/\r?\n$/, '');
    const trimmed = text.trim();
    lines.push({ text, trimmed, start: pos, end, blank: trimmed === '' });
    pos = end;
  }
  return lines;
}

export function isSceneHeading(trimmed: string): boolean {
  return SCENE_HEADING.test(trimmed) || (FORCED_HEADING.test(trimmed) && !trimmed.startsWith('..'));
}

function isTransition(trimmed: string): boolean {
  if (trimmed.startsWith('>')) return !trimmed.endsWith('<');
  if (trimmed !== trimmed.toUpperCase() || !/[A-Z]/.test(trimmed)) return false;
  return trimmed.endsWith('TO:') || getLexicon().transitions.includes(trimmed);
}

/** Character name of a cue line with extensions such as (V.O.) and (CONT'D) removed. */
export function cueName(trimmed: string): string | null {
  if (trimmed.startsWith('@')) {
    const forced = trimmed.slice(1).replace(/\^$/, '').replace(/\s*\(.*\)\s*$/, '').trim();
    return forced || null;
  }
  if (trimmed !== trimmed.toUpperCase()) return null;
  const name = trimmed.replace(/\s*\^$/, '').replace(/\s*\(.*\)\s*$/, '').trim();
  if (!CUE_NAME.test(name)) return null;
  if (name.split(/\s+/).length > 4) return null;
  return name;
}

export interface HeadingParts {
  prefix: string;
  place: string;
  time: string | null;
}

export function sceneHeadingParts(heading: string): HeadingParts {
  const cleaned = heading.trim().replace(/^\./, '').replace(/\s*#[^#]*#\s*$/, '');
  const prefixMatch = cleaned.match(HEADING_PREFIX);
  const prefix = prefixMatch ? prefixMatch[0].trim() : '';
  const rest = cleaned.slice(prefixMatch ? prefixMatch[0].length : 0);
  const [place = '', ...time] = rest.split(/\s+-+\s+/);
  return { prefix, place: place.trim(), time: time.length ? time.join(' - ').trim() : null };
}

function finish(documentId: string, content: string, open: OpenSegment[]): Segment[] {
  return open.map((s, ordinal) => ({
    id: segmentId(documentId, ordinal),
    documentId,
    ordinal,
    modality: 'text',
    role: s.role,
    text: content.slice(s.start, s.end).trim(),
    label: null,
    visual: null,
    span: { start: s.start, end: s.end },
    page: null,
  }));
}

function classifyStructured(lines: Line[]): OpenSegment[] {
  const out: OpenSegment[] = [];
  let current: OpenSegment | null = null;
  let prevBlank = true;
  let inDialogue = false;
  let titleOpen = true;
  let sawTitle = false;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line) continue;

    if (line.blank) {
      if (current) current.end = line.end;
      prevBlank = true;
      inDialogue = false;
      if (sawTitle) titleOpen = false;
      continue;
    }

    const t = line.trimmed;
    let role: SegmentRole;
    if (titleOpen && (TITLE_KEY.test(t) || (sawTitle && /^\s+\S/.test(line.text)))) {
      role = 'title_page';
      sawTitle = true;
    } else {
      titleOpen = false;
      const next = lines[i + 1];
      if (inDialogue) {
        role = t.startsWith('(') ? 'parenthetical' : 'dialogue';
      } else if (t.startsWith('!')) {
        role = 'action';
      } else if (isSceneHeading(t)) {
        role = 'scene_heading';
      } else if (isTransition(t)) {
        role = 'transition';
      } else if (prevBlank && next !== undefined && !next.blank && cueName(t) !== null) {
        role = 'character_cue';
      } else {
        role = 'action';
      }
    }

    const lineBoundary = role === 'scene_heading' || role === 'character_cue' || role === 'transition';
    if (!current || current.role !== role || lineBoundary || prevBlank) {
      current = { role, start: current ? line.start : 0, end: line.end };
      out.push(current);
    } else {
      current.end = line.end;
    }

    inDialogue = role === 'character_cue' || role === 'parenthetical' || role === 'dialogue';
    prevBlank = false;
  }
  return out;
}

function classifyParagraphs(lines: Line[]): OpenSegment[] {
  const out: OpenSegment[] = [];
  let current: OpenSegment | null = null;
  let prevBlank = true;
  for (const line of lines) {
    if (line.blank) {
      if (current) current.end = line.end;
      prevBlank = true;
      continue;
    }
    if (!current || prevBlank) {
      current = { role: 'paragraph', start: current ? line.start : 0, end: line.end };
      out.push(current);
    } else {
      current.end = line.end;
    }
    prevBlank = false;
  }
  return out;
}

export function segmentScreenplay(documentId: string, content: string): ScreenplaySegmentation {
  const lines = splitLines(content);
  const structuredSegments = classifyStructured(lines);
  const structured = structuredSegments.some((s) => s.role === 'scene_heading' || s.role === 'character_cue');
  if (structured) {
    return { segments: finish(documentId, content, structuredSegments), structured, warnings: [] };
  }
  return {
    segments: finish(documentId, content, classifyParagraphs(lines)),
    structured,
    warnings: ['no scene headings or character cues found; segmented by paragraph'],
  };
}
