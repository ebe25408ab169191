/**
 * Editor Agent
 *
 * Fixes the draft and returns a verdict per editorial area. Always runs at
 * temperature 0: its verdicts feed the editorial gate, which must give the
 * same answer for the same draft.
 *
 * The editor only sees the body. Front matter is carried over from the draft
 * unchanged.
 */

import { z } from 'zod';

import { createPrefixedLogger } from '../../../utils/logger';
import { ORACLE_CONFIG } from '../config';
import { getArticleBody, parseFrontMatter, renderArticle } from '../markdown-utils';
import { getEditorSystemPrompt, getEditorUserPrompt } from '../prompts/editor-prompts';
import { withRetry } from '../retry';
import type { ArticleDraft, EditorialReview, OracleAgentDeps, ResearchFindings } from '../types';

// ============================================================================
// Schema
// ============================================================================

const VerdictSchema = z.object({
  verdict: z.enum(['pass', 'fail', 'n/a']),
  rationale: z.string().min(1),
});

export const EditorResponseSchema = z.object({
  editedBody: z.string().min(1),
  verdicts: z.object({
    opening: VerdictSchema,
    evidence: VerdictSchema,
    voice: VerdictSchema,
    structure: VerdictSchema,
    chart: VerdictSchema,
  }),
  fixesApplied: z.array(z.string()),
});

/** Temperature is fixed; only the oracle, retry policy and logger are injectable */
export type EditorDeps = Omit<OracleAgentDeps, 'temperature'>;

export interface EditorInput {
  readonly draft: ArticleDraft;
  readonly findings: ResearchFindings;
  readonly chartFileName: string | null;
}

// ============================================================================
// Main Editor Function
// ============================================================================

/**
 * Edits the draft.
 *
 * @throws FatalOracleError when the oracle cannot produce a review
 */
export async function runEditor(input: EditorInput, deps: EditorDeps): Promise<EditorialReview> {
  const log = deps.logger ?? createPrefixedLogger('[Editor]');
  const { draft, findings, chartFileName } = input;

  log.info(`Editing "${draft.title}"...`);

  const { content } = await withRetry(
    () =>
      deps.oracle.generate({
        task: 'edit',
        system: getEditorSystemPrompt(),
        prompt: getEditorUserPrompt({
          title: draft.title,
          body: getArticleBody(draft.markdown),
          findings,
          chartFileName,
        }),
        schema: EditorResponseSchema,
        temperature: ORACLE_CONFIG.EDIT_TEMPERATURE,
        maxOutputTokens: deps.maxOutputTokens,
      }),
    { logger: log, ...deps.retry, context: 'Editorial review' }
  );

  const frontMatter = parseFrontMatter(draft.markdown);
  const editedMarkdown = frontMatter
    ? renderArticle(frontMatter.fields, content.editedBody)
    : `${content.editedBody.trim()}\n`;

  const failed = Object.entries(content.verdicts)
    .filter(([, verdict]) => verdict.verdict === 'fail')
    .map(([area]) => area);
  log.info(
    `Edit complete: ${content.fixesApplied.length} fixes${failed.length > 0 ? `, editor failed ${failed.join(', ')}` : ''}`
  );

  return { editedMarkdown, verdicts: content.verdicts, fixesApplied: content.fixesApplied };
}
