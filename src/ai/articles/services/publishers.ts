/**
 * Article Publishers
 *
 * The persistence collaborator behind the Publish stage. A publisher either
 * returns a receipt or throws PublishError; the orchestrator treats the
 * latter as fatal.
 *
 * - FilePublisher: `<postsDir>/<date>-<slug>.md`, chart copied beside the site assets
 * - CmsPublisher: POSTs the article as JSON to an HTTP endpoint
 */

import { copyFile, mkdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { z } from 'zod';

import type { Logger } from '../../../utils/logger';
import { PublishError } from '../types';
import { writeFileWithUniqueName } from './atomic-write';

// ============================================================================
// Types
// ============================================================================

export interface PublishMetadata {
  readonly sessionId: string;
  readonly title: string;
  readonly slug: string;
  /** ISO date (YYYY-MM-DD) */
  readonly date: string;
  readonly topicTitle: string;
  /** Weighted board score, null when topics were not voted on */
  readonly boardScore: number | null;
}

export interface PublishRequest {
  readonly articleMarkdown: string;
  /** Local path of the exported chart PNG, null when there is no chart */
  readonly chartImagePath: string | null;
  readonly metadata: PublishMetadata;
}

export interface PublishReceipt {
  readonly destination: 'file' | 'cms';
  /** File path or CMS URL of the published article */
  readonly location: string;
  readonly publishedAt: string;
}

export interface ArticlePublisher {
  publish(request: PublishRequest): Promise<PublishReceipt>;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// File Publisher
// ============================================================================

export interface FilePublisherOptions {
  readonly postsDir: string;
  /** Directory the chart is copied into; omit when charts are exported in place */
  readonly assetsDir?: string;
  readonly logger?: Logger;
}

export class FilePublisher implements ArticlePublisher {
  constructor(private readonly options: FilePublisherOptions) {}

  async publish(request: PublishRequest): Promise<PublishReceipt> {
    const { postsDir, assetsDir, logger } = this.options;
    const { date, slug } = request.metadata;

    try {
      if (request.chartImagePath && assetsDir) {
        const target = join(assetsDir, basename(request.chartImagePath));
        if (target !== request.chartImagePath) {
          await mkdir(assetsDir, { recursive: true });
          await copyFile(request.chartImagePath, target);
        }
      }

      const location = await writeFileWithUniqueName(postsDir, `${date}-${slug}`, '.md', request.articleMarkdown);
      logger?.info(`[FilePublisher] Published ${location}`);
      return { destination: 'file', location, publishedAt: new Date().toISOString() };
    } catch (error) {
      throw new PublishError(`Could not write article ${slug}: ${describeError(error)}`, error);
    }
  }
}

// ============================================================================
// CMS Publisher
// ============================================================================

export interface CmsPublisherOptions {
  /** Full URL of the article collection endpoint */
  readonly endpoint: string;
  readonly apiToken: string;
  readonly timeoutMs?: number;
  readonly logger?: Logger;
}

const CmsResponseSchema = z.object({
  id: z.union([z.string(), z.number()]),
  url: z.string().url(),
});

const DEFAULT_CMS_TIMEOUT_MS = 30_000;

export class CmsPublisher implements ArticlePublisher {
  constructor(private readonly options: CmsPublisherOptions) {}

  async publish(request: PublishRequest): Promise<PublishReceipt> {
    const { endpoint, apiToken, timeoutMs = DEFAULT_CMS_TIMEOUT_MS, logger } = this.options;
    const { metadata } = request;

    let chartImage: { fileName: string; base64: string } | null = null;
    if (request.chartImagePath) {
      try {
        const bytes = await readFile(request.chartImagePath);
        chartImage = { fileName: basename(request.chartImagePath), base64: bytes.toString('base64') };
      } catch (error) {
        throw new PublishError(`Could not read chart ${request.chartImagePath}: ${describeError(error)}`, error);
      }
    }

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          Authorization: `Bearer ${apiToken}`,
        },
        body: JSON.stringify({
          title: metadata.title,
          slug: metadata.slug,
          date: metadata.date,
          markdown: request.articleMarkdown,
          chartImage,
          sessionId: metadata.sessionId,
        }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new PublishError(`CMS request failed: ${describeError(error)}`, error);
    }

    if (!response.ok) {
      throw new PublishError(`CMS rejected article ${metadata.slug}: HTTP ${response.status}`);
    }

    const body: unknown = await response.json().catch(() => null);
    const parsed = CmsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PublishError(`CMS response for ${metadata.slug} had no id and url`);
    }

    logger?.info(`[CmsPublisher] Published ${metadata.slug} as ${parsed.data.id}`);
    return { destination: 'cms', location: parsed.data.url, publishedAt: new Date().toISOString() };
  }
}
