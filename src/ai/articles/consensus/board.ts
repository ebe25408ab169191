/**
 * Default editorial board, loaded from data/editorial-board.json.
 */

import { z } from 'zod';

import boardData from '../data/editorial-board.json';
import { ConfigValidationError } from '../config';
import type { VoterSpec } from '../types';

const VoterSpecSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  weight: z.number().positive().optional(),
  persona: z.string().min(1),
});

const BoardSchema = z.object({
  voters: z.array(VoterSpecSchema).min(1),
});

/**
 * Validates board data. Voter ids must be unique.
 *
 * @throws ConfigValidationError on malformed data
 */
export function parseEditorialBoard(data: unknown): VoterSpec[] {
  const parsed = BoardSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigValidationError(`Invalid editorial board: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }

  const ids = new Set<string>();
  for (const voter of parsed.data.voters) {
    if (ids.has(voter.id)) {
      throw new ConfigValidationError(`Duplicate voter id in editorial board: ${voter.id}`);
    }
    ids.add(voter.id);
  }
  return parsed.data.voters;
}

export function loadEditorialBoard(): VoterSpec[] {
  return parseEditorialBoard(boardData);
}
