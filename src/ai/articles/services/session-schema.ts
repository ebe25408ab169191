/**
 * Session Schema
 *
 * Zod schema for stored session snapshots. Annotated with the domain types
 * so the schema and the interfaces cannot drift apart.
 */

import { z } from 'zod';

import { ResearchResponseSchema } from '../agents/researcher';
import type { ChartImageRef } from '../chart/chart-exporter';
import type { ChartSpec, LayoutResult } from '../chart/types';
import {
  PIPELINE_STAGES,
  type ArticleDraft,
  type ConsensusResult,
  type EditorialReview,
  type GateResult,
  type PipelineSession,
  type SessionAnnotation,
  type Topic,
} from '../types';

// ============================================================================
// Topics & Consensus
// ============================================================================

const TopicSchema: z.ZodType<Topic> = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  relevanceScore: z.number(),
});

const VoteSchema = z.object({
  voterId: z.string(),
  topicId: z.string(),
  score: z.number().int().min(0).max(10),
  rationale: z.string(),
});

const ConsensusResultSchema: z.ZodType<ConsensusResult> = z.object({
  winningTopic: TopicSchema,
  weightedScore: z.number(),
  perVoterScores: z.record(z.number()),
  rankings: z.array(z.object({ rank: z.number().int(), topic: TopicSchema, weightedScore: z.number() })),
  unanimous: z.boolean(),
  dissentingVotes: z.array(VoteSchema),
  voterCount: z.number().int(),
  votes: z.array(VoteSchema),
});

// ============================================================================
// Chart
// ============================================================================

const ChartTypeSchema = z.enum(['line', 'bar', 'scatter']);
const ZoneNameSchema = z.enum(['RedBar', 'Title', 'PlotArea', 'XAxis', 'Source']);
const PointSchema = z.object({ x: z.number(), y: z.number() });
const RectSchema = z.object({ x: z.number(), y: z.number(), width: z.number(), height: z.number() });

const ChartSpecSchema: z.ZodType<ChartSpec> = z.object({
  title: z.string(),
  subtitle: z.string(),
  type: ChartTypeSchema,
  categories: z.array(z.string()),
  series: z.array(
    z.object({
      name: z.string(),
      values: z.array(z.number()),
      label: z.string().optional(),
      inlineLabel: z.boolean().optional(),
    })
  ),
  sourceLine: z.string(),
});

const LayoutElementSchema = z.object({
  id: z.string(),
  kind: z.enum([
    'red-bar',
    'title',
    'subtitle',
    'gridline',
    'baseline',
    'y-tick-label',
    'series-line',
    'series-bar',
    'series-marker',
    'inline-label',
    'x-tick',
    'x-tick-label',
    'source',
  ]),
  zone: ZoneNameSchema,
  box: RectSchema,
  text: z.string().optional(),
  fontSize: z.number().optional(),
  fontWeight: z.enum(['normal', 'bold']).optional(),
  textAnchor: z.enum(['start', 'middle', 'end']).optional(),
  color: z.string().optional(),
  seriesIndex: z.number().int().optional(),
});

const LayoutResultSchema: z.ZodType<LayoutResult> = z.object({
  canvas: z.object({ width: z.number(), height: z.number() }),
  zones: z.array(
    z.object({ name: ZoneNameSchema, yMin: z.number(), yMax: z.number(), top: z.number(), bottom: z.number() })
  ),
  plotFrame: RectSchema,
  elements: z.array(LayoutElementSchema),
  labels: z.array(
    z.object({
      seriesName: z.string(),
      seriesIndex: z.number().int(),
      text: z.string(),
      anchorPoint: PointSchema,
      anchorKind: z.enum(['primary', 'secondary']),
      direction: z.enum(['end', 'above']),
      offset: z.object({ dx: z.number(), dy: z.number() }),
      finalBox: RectSchema,
      fontSize: z.number(),
      attempts: z.number().int(),
    })
  ),
  unplacedLabels: z.array(
    z.object({
      seriesName: z.string(),
      seriesIndex: z.number().int(),
      text: z.string(),
      reason: z.string(),
      attempts: z.number().int(),
    })
  ),
  series: z.array(
    z.object({
      name: z.string(),
      index: z.number().int(),
      color: z.string(),
      points: z.array(PointSchema),
      segments: z.array(z.object({ from: PointSchema, to: PointSchema })),
      shapes: z.array(RectSchema),
      labelled: z.boolean(),
    })
  ),
  yScale: z.object({ min: z.number(), max: z.number(), step: z.number(), ticks: z.array(z.number()) }),
  categoryX: z.array(z.number()),
  titleFontSize: z.number(),
  subtitleFontSize: z.number(),
});

const ChartImageRefSchema: z.ZodType<ChartImageRef> = z.object({
  fileName: z.string(),
  imagePath: z.string(),
  specPath: z.string(),
  publicPath: z.string(),
  format: z.string(),
  width: z.number(),
  height: z.number(),
  bytes: z.number(),
});

// ============================================================================
// Articles & Gates
// ============================================================================

const ArticleDraftSchema: z.ZodType<ArticleDraft> = z.object({
  title: z.string(),
  slug: z.string(),
  markdown: z.string(),
  regenerated: z.boolean(),
  selfCheckIssues: z.array(z.string()),
});

const VerdictSchema = z.object({ verdict: z.enum(['pass', 'fail', 'n/a']), rationale: z.string() });

const EditorialReviewSchema: z.ZodType<EditorialReview> = z.object({
  editedMarkdown: z.string(),
  verdicts: z.object({
    opening: VerdictSchema,
    evidence: VerdictSchema,
    voice: VerdictSchema,
    structure: VerdictSchema,
    chart: VerdictSchema,
  }),
  fixesApplied: z.array(z.string()),
});

const GateResultSchema: z.ZodType<GateResult> = z.object({
  gateName: z.string(),
  checks: z.array(
    z.object({ name: z.string(), passed: z.boolean(), notApplicable: z.boolean(), rationale: z.string() })
  ),
  overallPassed: z.boolean(),
});

// ============================================================================
// Session
// ============================================================================

const StageSchema = z.enum(PIPELINE_STAGES);

const SessionAnnotationSchema: z.ZodType<SessionAnnotation> = z.object({
  kind: z.enum(['fatal-error', 'gate-failure', 'layout-error']),
  stage: StageSchema,
  message: z.string(),
  at: z.string(),
});

export const PipelineSessionSchema: z.ZodType<PipelineSession> = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),
  status: z.enum(['running', 'published', 'quarantined', 'failed']),
  lastCompletedStage: StageSchema.nullable(),
  topic: TopicSchema,
  consensus: ConsensusResultSchema.nullable(),
  researchFindings: ResearchResponseSchema.nullable(),
  chartSpec: ChartSpecSchema.nullable(),
  articleDraft: ArticleDraftSchema.nullable(),
  chartLayout: LayoutResultSchema.nullable(),
  chartImageRef: ChartImageRefSchema.nullable(),
  editorialReview: EditorialReviewSchema.nullable(),
  gateResults: z.array(GateResultSchema),
  annotations: z.array(SessionAnnotationSchema),
});
