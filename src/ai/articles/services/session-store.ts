/**
 * Session Store
 *
 * Persists the session after every stage as `<sessionId>.json`, replacing
 * the previous snapshot atomically.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { PipelineSession } from '../types';
import { isNodeError, writeFileAtomic } from './atomic-write';
import { PipelineSessionSchema } from './session-schema';

/**
 * A stored snapshot that cannot be read back as a session.
 */
export class CorruptSessionError extends Error {
  readonly name = 'CorruptSessionError';
}

export interface SessionStore {
  save(session: PipelineSession): Promise<string>;
  load(sessionId: string): Promise<PipelineSession | null>;
}

export class FileSessionStore implements SessionStore {
  constructor(private readonly directory: string) {}

  pathFor(sessionId: string): string {
    return join(this.directory, `${sessionId}.json`);
  }

  async save(session: PipelineSession): Promise<string> {
    const filePath = this.pathFor(session.id);
    await writeFileAtomic(filePath, `${JSON.stringify(session, null, 2)}\n`);
    return filePath;
  }

  /**
   * Reads a stored snapshot back.
   *
   * @throws CorruptSessionError when the file is not valid JSON or not a session
   */
  async load(sessionId: string): Promise<PipelineSession | null> {
    const filePath = this.pathFor(sessionId);
    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isNodeError(error, 'ENOENT')) return null;
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CorruptSessionError(`Session file ${filePath} is not valid JSON: ${reason}`);
    }

    const parsed = PipelineSessionSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CorruptSessionError(
        `Session file ${filePath} is invalid at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'unknown error'}`
      );
    }
    return parsed.data;
  }
}
