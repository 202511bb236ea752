/**
 * Small screenplay and mood board shared by the tests.
 *
 * Screenplay segment ordinals:
 *   0 title page        4 dialogue        8 parenthetical
 *   1 INT. WAREHOUSE    5 cue BEN (O.S.)  9 dialogue
 *   2 action (ADA)      6 dialogue        10 EXT. HARBOR - DAWN
 *   3 cue ADA           7 cue ADA         11 action (BEN)
 */
import { NoModel } from '../ai/model.js';
import { MemoryPersistence } from '../db/persistence.js';
import { FusionService, type FusionServiceOptions } from '../service.js';

export const WAREHOUSE_SCRIPT = [
  'Title: Cold Storage',
  'Author: Test Writer',
  '',
  'INT. WAREHOUSE - NIGHT',
  '',
  'Rain hammers the skylights. ADA (30s, soaked) slips between the shelves.',
  '',
  'ADA',
  'Anyone here?',
  '',
  'BEN (O.S.)',
  'Over by the loading dock.',
  '',
  'ADA',
  '(whispering)',
  'Stay where you are.',
  '',
  'EXT. HARBOR - DAWN',
  '',
  'Gulls circle. BEN waits alone.',
  '',
].join('\n');

export const LOOK_BOOK = JSON.stringify({
  title: 'Look Book',
  pages: [
    {
      regions: [
        { label: 'cold-blue-palette', caption: 'desaturated blue, harsh rim light' },
      ],
    },
  ],
});

/** Deterministic document-id entropy. */
export function counterNonce(prefix = 'n'): () => string {
  let n = 0;
  return () => `${prefix}-${n++}`;
}

export function offlineService(opts: FusionServiceOptions = {}): Promise<FusionService> {
  return FusionService.create({
    persistence: new MemoryPersistence(),
    models: { generation: new NoModel(), embedding: new NoModel(), vision: new NoModel() },
    nonce: counterNonce(),
    clock: () => new Date('2026-01-01T00:00:00.000Z'),
    ...opts,
  });
}
