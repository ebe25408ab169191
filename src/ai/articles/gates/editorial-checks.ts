/**
 * Editorial Checks
 *
 * The editorial gate, in order: Opening-strength, Evidence-sourcing,
 * Voice-compliance, Structural-flow, Chart-integration.
 *
 * Each check combines deterministic text rules (data/editorial-rules.json)
 * with the editor's own verdict for that area. The editor runs at
 * temperature 0, so the same draft gets the same verdicts.
 */

import { z } from 'zod';

import rulesData from '../data/editorial-rules.json';
import { ConfigValidationError } from '../config';
import {
  embedsImage,
  getArticleBody,
  parseFrontMatter,
  splitParagraphs,
  splitSentences,
} from '../markdown-utils';
import type { EditorGateVerdict, EditorialGateName } from '../types';
import { fromIssues, notApplicable, QualityGate, type CheckSpec } from './quality-gate';

// ============================================================================
// Types
// ============================================================================

export interface EditorialArtifact {
  /** Edited article, front matter included */
  readonly markdown: string;
  /** Editor verdicts per area; null when no editor ran */
  readonly verdicts: Readonly<Record<EditorialGateName, EditorGateVerdict>> | null;
  /** File name of the exported chart, null when the article has no chart */
  readonly chartFileName: string | null;
}

const EditorialRulesSchema = z.object({
  bannedOpenings: z.array(z.string().min(1)),
  bannedPhrases: z.array(z.string().min(1)),
  bannedClosings: z.array(z.string().min(1)),
  verificationFlags: z.array(z.string().min(1)),
  placeholders: z.array(z.string().min(1)),
  requiredFrontMatter: z.array(z.string().min(1)),
  attributionCues: z.array(z.string().min(1)),
});

export type EditorialRules = z.infer<typeof EditorialRulesSchema>;

export const EDITORIAL_GATE_NAME = 'editorial';

export const EDITORIAL_CHECK_NAMES = [
  'Opening-strength',
  'Evidence-sourcing',
  'Voice-compliance',
  'Structural-flow',
  'Chart-integration',
] as const;

// ============================================================================
// Rules
// ============================================================================

export function parseEditorialRules(data: unknown): EditorialRules {
  const parsed = EditorialRulesSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigValidationError(
      `Invalid editorial rules at ${issue?.path.join('.') ?? '(root)'}: ${issue?.message ?? 'unknown error'}`
    );
  }
  return parsed.data;
}

export const DEFAULT_EDITORIAL_RULES: EditorialRules = parseEditorialRules(rulesData);

// ============================================================================
// Helpers
// ============================================================================

const STATISTIC = /\d(?:[\d,.]*)\s?%|\bper cent\b/i;
const LINKED_SOURCE = /\]\(https?:\/\//;
const EXCLAMATION = /!(?!\[)/g;

function truncate(text: string, max = 80): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function findPhrases(text: string, phrases: readonly string[]): string[] {
  const lower = text.toLowerCase();
  return phrases.filter((phrase) => lower.includes(phrase.toLowerCase()));
}

function frontMatterIssues(markdown: string, rules: EditorialRules): string[] {
  const frontMatter = parseFrontMatter(markdown);
  if (!frontMatter) {
    return ['Missing front matter block'];
  }
  const missing = rules.requiredFrontMatter.filter((field) => !frontMatter.fields[field]);
  return missing.length > 0 ? [`Front matter missing: ${missing.join(', ')}`] : [];
}

function openingOf(body: string): string | null {
  const [firstParagraph] = splitParagraphs(body);
  return firstParagraph ? splitSentences(firstParagraph).slice(0, 2).join(' ') : null;
}

function closingOf(body: string): string {
  return splitParagraphs(body).slice(-2).join(' ');
}

function placeholderIssues(body: string, rules: EditorialRules): string[] {
  const placeholders = rules.placeholders.filter((placeholder) => body.includes(placeholder));
  return placeholders.length > 0 ? [`Placeholder text: ${placeholders.join(', ')}`] : [];
}

function flagIssues(body: string, rules: EditorialRules): string[] {
  return rules.verificationFlags.filter((flag) => body.includes(flag)).map((flag) => `Unresolved ${flag} flag`);
}

function editorIssues(artifact: EditorialArtifact, area: EditorialGateName): string[] {
  const verdict = artifact.verdicts?.[area];
  return verdict?.verdict === 'fail' ? [`Editor: ${verdict.rationale}`] : [];
}

function editorNote(artifact: EditorialArtifact, area: EditorialGateName): string {
  const verdict = artifact.verdicts?.[area];
  return verdict && verdict.verdict !== 'n/a' ? ` Editor: ${verdict.rationale}` : '';
}

// ============================================================================
// Checks
// ============================================================================

function openingStrength(rules: EditorialRules): CheckSpec<EditorialArtifact> {
  return {
    name: 'Opening-strength',
    evaluate(artifact) {
      const opening = openingOf(getArticleBody(artifact.markdown));
      if (opening === null) {
        return fromIssues(['Article has no opening paragraph'], '');
      }

      const issues = [
        ...findPhrases(opening, rules.bannedOpenings).map((phrase) => `Banned opening "${phrase}"`),
        ...editorIssues(artifact, 'opening'),
      ];
      return fromIssues(issues, `Opening leads without throat-clearing.${editorNote(artifact, 'opening')}`);
    },
  };
}

function evidenceSourcing(rules: EditorialRules): CheckSpec<EditorialArtifact> {
  return {
    name: 'Evidence-sourcing',
    evaluate(artifact) {
      const body = getArticleBody(artifact.markdown);
      const issues = flagIssues(body, rules);

      for (const paragraph of splitParagraphs(body)) {
        for (const sentence of splitSentences(paragraph)) {
          if (!STATISTIC.test(sentence)) continue;
          const attributed =
            LINKED_SOURCE.test(sentence) || findPhrases(sentence, rules.attributionCues).length > 0;
          if (!attributed) {
            issues.push(`Unattributed statistic: "${truncate(sentence)}"`);
          }
        }
      }

      issues.push(...editorIssues(artifact, 'evidence'));
      return fromIssues(issues, `Statistics are attributed and no verification flags remain.${editorNote(artifact, 'evidence')}`);
    },
  };
}

function voiceCompliance(rules: EditorialRules): CheckSpec<EditorialArtifact> {
  return {
    name: 'Voice-compliance',
    evaluate(artifact) {
      const body = getArticleBody(artifact.markdown);
      const exclamations = (body.match(EXCLAMATION) ?? []).length;
      const issues = [
        ...findPhrases(body, rules.bannedPhrases).map((phrase) => `Banned phrase "${phrase}"`),
        ...(exclamations > 0 ? [`${exclamations} exclamation mark${exclamations === 1 ? '' : 's'}`] : []),
        ...editorIssues(artifact, 'voice'),
      ];
      return fromIssues(issues, `No banned phrases or exclamations.${editorNote(artifact, 'voice')}`);
    },
  };
}

function structuralFlow(rules: EditorialRules): CheckSpec<EditorialArtifact> {
  return {
    name: 'Structural-flow',
    evaluate(artifact) {
      const body = getArticleBody(artifact.markdown);
      const issues = [
        ...frontMatterIssues(artifact.markdown, rules),
        ...findPhrases(closingOf(body), rules.bannedClosings).map((phrase) => `Banned closing "${phrase}"`),
        ...placeholderIssues(body, rules),
        ...editorIssues(artifact, 'structure'),
      ];
      return fromIssues(issues, `Front matter complete and the ending avoids summary.${editorNote(artifact, 'structure')}`);
    },
  };
}

function chartIntegration(): CheckSpec<EditorialArtifact> {
  return {
    name: 'Chart-integration',
    evaluate(artifact) {
      if (artifact.chartFileName === null) {
        return notApplicable('Article has no chart');
      }

      const issues = [
        ...(embedsImage(artifact.markdown, artifact.chartFileName)
          ? []
          : [`Chart ${artifact.chartFileName} is not embedded in the article`]),
        ...editorIssues(artifact, 'chart'),
      ];
      return fromIssues(issues, `Chart ${artifact.chartFileName} is embedded.${editorNote(artifact, 'chart')}`);
    },
  };
}

// ============================================================================
// Gate
// ============================================================================

export function createEditorialChecks(rules: EditorialRules = DEFAULT_EDITORIAL_RULES): CheckSpec<EditorialArtifact>[] {
  return [openingStrength(rules), evidenceSourcing(rules), voiceCompliance(rules), structuralFlow(rules), chartIntegration()];
}

export function createEditorialGate(rules?: EditorialRules): QualityGate<EditorialArtifact> {
  return new QualityGate(EDITORIAL_GATE_NAME, createEditorialChecks(rules));
}

// ============================================================================
// Writer self-check
// ============================================================================

export interface DraftSelfCheck {
  /** Rule breaks worth one regeneration */
  readonly critical: readonly string[];
  /** Left for the editor to resolve */
  readonly warnings: readonly string[];
}

/**
 * The deterministic editorial rules, applied to a draft before it reaches
 * the editor. Verification flags are warnings: the writer is told to flag
 * unsourced claims and the editor resolves them.
 */
export function checkDraft(markdown: string, rules: EditorialRules = DEFAULT_EDITORIAL_RULES): DraftSelfCheck {
  const body = getArticleBody(markdown);
  const opening = openingOf(body) ?? '';

  return {
    critical: [
      ...frontMatterIssues(markdown, rules),
      ...findPhrases(opening, rules.bannedOpenings).map((phrase) => `Banned opening "${phrase}"`),
      ...findPhrases(body, rules.bannedPhrases).map((phrase) => `Banned phrase "${phrase}"`),
      ...findPhrases(closingOf(body), rules.bannedClosings).map((phrase) => `Banned closing "${phrase}"`),
      ...placeholderIssues(body, rules),
    ],
    warnings: flagIssues(body, rules),
  };
}
