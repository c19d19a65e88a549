import { z } from 'zod';

/**
 * Response schemas for each stage. Lists and text default to empty values so a
 * sparse but well-formed answer still validates; a field of the wrong shape
 * fails. Unknown keys pass through untouched.
 */

const text = z.string().default('');

// Models answer list items either as plain strings or as small objects.
export const FlexibleItemSchema = z.union([z.string(), z.record(z.string(), z.unknown())]);

export type FlexibleItem = z.infer<typeof FlexibleItemSchema>;

const items = z.array(FlexibleItemSchema).default([]);

const numericLike = z.union([z.number(), z.string()]);

// Stage 1

export const KETER_DIMENSIONS = [
  'reduces_suffering',
  'respects_free_will',
  'promotes_harmony',
  'justice_mercy_balance',
  'aligned_with_truth',
] as const;

export type KeterDimension = typeof KETER_DIMENSIONS[number];

export const KeterRawFieldsSchema = z.object({
  scores: z.object({
    reduces_suffering: numericLike,
    respects_free_will: numericLike,
    promotes_harmony: numericLike,
    justice_mercy_balance: numericLike,
    aligned_with_truth: numericLike,
  }).passthrough(),
  corruptions: z.array(z.object({
    type: z.string().default('unspecified'),
    severity: z.string().optional(),
    description: text,
  }).passthrough()).default([]),
  reasoning: text,
}).passthrough();

export type KeterRawFields = z.infer<typeof KeterRawFieldsSchema>;

// Stage 2

export const ChochmahRawFieldsSchema = z.object({
  understanding: text,
  insights: items,
  patterns: items,
  uncertainties: items,
  implications: items,
  precedents: items,
  confidence_level: numericLike.optional(),
  meta_reflection: text,
}).passthrough();

export type ChochmahRawFields = z.infer<typeof ChochmahRawFieldsSchema>;

// Stage 3

export const BinahRawFieldsSchema = z.object({
  context_9d: items,
  stakeholders: items,
  effects_cascade: z.object({
    first_order: items,
    second_order: items,
    third_order: items,
  }).passthrough().default({}),
  systemic_risks: items,
  ethical_considerations: items,
  synthesis: text,
  contextual_complexity_rating: numericLike.optional(),
}).passthrough();

export type BinahRawFields = z.infer<typeof BinahRawFieldsSchema>;

export const PerspectiveAnalysisSchema = z.object({
  stakeholders: items,
  contextual_dimensions: z.record(z.string(), z.unknown()).default({}),
  key_insights: z.array(z.string()).default([]),
}).passthrough();

export type PerspectiveAnalysis = z.infer<typeof PerspectiveAnalysisSchema>;

export const PerspectiveSynthesisSchema = z.object({
  a_blind_spots: items,
  b_blind_spots: items,
  convergence_points: items,
  integrated_synthesis: text,
  recommended_balance: text,
}).passthrough();

export type PerspectiveSynthesis = z.infer<typeof PerspectiveSynthesisSchema>;

export interface DualPerspectiveRawFields {
  perspective_a: PerspectiveAnalysis & { label: string };
  perspective_b: PerspectiveAnalysis & { label: string };
  synthesis: PerspectiveSynthesis;
}

// Stage 4

export const ChesedRawFieldsSchema = z.object({
  opportunities: items,
  benefits_by_stakeholder: z.array(z.object({
    stakeholder: text,
    specific_benefits: items,
  }).passthrough()).default([]),
  expansion_potential: z.object({
    areas_for_growth: items,
  }).passthrough().default({}),
  abundance_mindset: items,
  synergies: items,
  generative_possibilities: text,
}).passthrough();

export type ChesedRawFields = z.infer<typeof ChesedRawFieldsSchema>;

// Stage 5

export const GevurahRawFieldsSchema = z.object({
  risks: z.object({
    short_term: items,
    medium_term: items,
    long_term: items,
  }).passthrough().default({}),
  constraints: items,
  boundaries: items,
  red_lines: items,
  failure_modes: items,
  mitigation_requirements: items,
  guardrails: items,
}).passthrough();

export type GevurahRawFields = z.infer<typeof GevurahRawFieldsSchema>;

// Stage 6

export const TiferetRawFieldsSchema = z.object({
  synthesis_points: items,
  balanced_recommendations: items,
  trade_offs: items,
  optimal_path: z.object({
    phase_1: FlexibleItemSchema.optional(),
    phase_2: FlexibleItemSchema.optional(),
    phase_3: FlexibleItemSchema.optional(),
    strategic_direction: text,
  }).passthrough().default({}),
  integration_strategy: text,
  harmony_assessment: text,
}).passthrough();

export type TiferetRawFields = z.infer<typeof TiferetRawFieldsSchema>;

// Stage 7

export const NetzachRawFieldsSchema = z.object({
  implementation_strategy: text,
  implementation_phases: items,
  milestones: items,
  persistence_requirements: items,
  resilience_planning: z.object({
    common_obstacles: items,
    setback_recovery: text,
    adaptation_mechanisms: text,
  }).passthrough().default({}),
  momentum_builders: items,
  long_term_sustainability: text,
}).passthrough();

export type NetzachRawFields = z.infer<typeof NetzachRawFieldsSchema>;

// Stage 8

export const NARRATIVE_COMPONENTS = [
  'opening',
  'context',
  'vision',
  'journey',
  'call_to_action',
  'ongoing_story',
] as const;

export const HodRawFieldsSchema = z.object({
  communication_strategy: text,
  key_messages: z.array(z.union([
    z.string(),
    z.object({
      message: text,
      talking_points: items,
    }).passthrough(),
  ])).default([]),
  messaging_by_stakeholder: items,
  narrative_arc: z.record(z.string(), z.unknown()).default({}),
  documentation_requirements: items,
  communication_channels: items,
  transparency_framework: text,
}).passthrough();

export type HodRawFields = z.infer<typeof HodRawFieldsSchema>;

// Stage 9

const alignmentEntry = z.object({ alignment_status: text }).passthrough().default({});
const statusEntry = z.object({ status: text }).passthrough().default({});

export const GO_NO_GO_DECISIONS = ['GO', 'CONDITIONAL_GO', 'NO_GO'] as const;

export const YesodRawFieldsSchema = z.object({
  integrated_assessment: text,
  sefirot_alignment: z.object({
    keter_chochmah_binah: alignmentEntry,
    chesed_gevurah_tiferet: alignmentEntry,
    netzach_hod: alignmentEntry,
    overall_coherence: statusEntry,
  }).passthrough().default({}),
  readiness_verification: z.object({
    ethical_readiness: statusEntry,
    strategic_readiness: statusEntry,
    communication_readiness: statusEntry,
    resource_readiness: statusEntry,
  }).passthrough().default({}),
  gaps_identified: items,
  strengths_confirmed: items,
  final_synthesis: text,
  go_no_go_recommendation: z.object({
    decision: text,
    confidence: numericLike.optional(),
    rationale: text,
  }).passthrough().default({}),
}).passthrough();

export type YesodRawFields = z.infer<typeof YesodRawFieldsSchema>;

// Stage 10

export const RESOURCE_CATEGORIES = [
  'human_resources',
  'financial_resources',
  'technological_resources',
  'physical_resources',
] as const;

export const MalchutRawFieldsSchema = z.object({
  executive_summary: text,
  go_no_go_decision: z.record(z.string(), z.unknown()).default({}),
  immediate_actions: items,
  action_plan: items,
  resource_requirements: z.record(z.string(), z.unknown()).default({}),
  timeline: z.object({
    key_milestones: items,
  }).passthrough().default({}),
  success_metrics: items,
  governance_structure: z.unknown().optional(),
  risk_mitigation_execution: items,
  first_step: text,
}).passthrough();

export type MalchutRawFields = z.infer<typeof MalchutRawFieldsSchema>;

/** Best human-readable label for a list item, trying `keys` in order. */
export function describeItem(item: FlexibleItem, keys: readonly string[] = []): string {
  if (typeof item === 'string') {
    return item;
  }
  for (const key of keys) {
    const value = item[key];
    if (typeof value === 'string' && value.trim()) {
      return value;
    }
  }
  const firstText = Object.values(item).find((value): value is string => typeof value === 'string' && value.trim().length > 0);
  return firstText ?? JSON.stringify(item);
}

/** Reads a string property from an object-shaped item; strings have none. */
export function itemField(item: FlexibleItem, key: string): string {
  if (typeof item === 'string') {
    return '';
  }
  const value = item[key];
  return typeof value === 'string' ? value : '';
}

export function hasContent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}
