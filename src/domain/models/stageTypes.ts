import type {
  BinahRawFields,
  ChesedRawFields,
  ChochmahRawFields,
  DualPerspectiveRawFields,
  GevurahRawFields,
  HodRawFields,
  KeterDimension,
  KeterRawFields,
  MalchutRawFields,
  NetzachRawFields,
  TiferetRawFields,
  YesodRawFields,
} from './rawFields';

export const STAGE_ORDER = [
  'keter',
  'chochmah',
  'binah',
  'chesed',
  'gevurah',
  'tiferet',
  'netzach',
  'hod',
  'yesod',
  'malchut',
] as const;

export type StageId = typeof STAGE_ORDER[number];

export type QualityLabel = 'exceptional' | 'high' | 'moderate' | 'low';

export type PerspectiveMode = 'single' | 'dual';

export interface StageDefinition {
  id: StageId;
  position: number;
  title: string;
  temperature: number;
  dependencies: readonly StageId[];
  keyMetric: string;
}

export const STAGE_DEFINITIONS: { readonly [Id in StageId]: StageDefinition & { id: Id } } = {
  keter: {
    id: 'keter', position: 1, title: 'Ethical alignment', temperature: 0.3,
    dependencies: [], keyMetric: 'alignment_percentage',
  },
  chochmah: {
    id: 'chochmah', position: 2, title: 'Deep reasoning', temperature: 0.7,
    dependencies: ['keter'], keyMetric: 'insight_depth_score',
  },
  binah: {
    id: 'binah', position: 3, title: 'Contextual understanding', temperature: 0.5,
    dependencies: ['keter', 'chochmah'], keyMetric: 'contextual_depth_score',
  },
  chesed: {
    id: 'chesed', position: 4, title: 'Opportunities and benefits', temperature: 0.7,
    dependencies: ['binah'], keyMetric: 'expansion_score',
  },
  gevurah: {
    id: 'gevurah', position: 5, title: 'Risks and boundaries', temperature: 0.3,
    dependencies: ['binah', 'chesed'], keyMetric: 'severity_score',
  },
  tiferet: {
    id: 'tiferet', position: 6, title: 'Balanced synthesis', temperature: 0.6,
    dependencies: ['chesed', 'gevurah'], keyMetric: 'harmony_score',
  },
  netzach: {
    id: 'netzach', position: 7, title: 'Implementation persistence', temperature: 0.5,
    dependencies: ['tiferet'], keyMetric: 'persistence_score',
  },
  hod: {
    id: 'hod', position: 8, title: 'Communication', temperature: 0.7,
    dependencies: ['netzach'], keyMetric: 'splendor_score',
  },
  yesod: {
    id: 'yesod', position: 9, title: 'Integration and readiness', temperature: 0.4,
    dependencies: ['keter', 'chochmah', 'binah', 'chesed', 'gevurah', 'tiferet', 'netzach', 'hod'],
    keyMetric: 'readiness_score',
  },
  malchut: {
    id: 'malchut', position: 10, title: 'Manifestation plan', temperature: 0.3,
    dependencies: ['yesod'], keyMetric: 'manifestation_score',
  },
};

export function isStageId(value: string): value is StageId {
  return STAGE_ORDER.some(id => id === value);
}

// Derived metrics

export type CorruptionSeverity = 'none' | 'minor' | 'moderate' | 'critical';

export interface KeterMetrics {
  scores: Record<KeterDimension, number>;
  total_score: number;
  alignment_score: number;
  alignment_percentage: number;
  threshold: number;
  threshold_met: boolean;
  corruption_count: number;
  corruption_severity: CorruptionSeverity;
  manifestation_valid: boolean;
  attempts: number;
}

export interface ChochmahMetrics {
  insight_depth_score: number;
  insight_count: number;
  uncertainty_count: number;
  precedent_count: number;
  pattern_recognition_count: number;
  epistemic_humility_ratio: number;
  confidence_level: number;
}

export interface EffectsMapped {
  first_order: number;
  second_order: number;
  third_order: number;
}

export interface BinahMetrics {
  contextual_depth_score: number;
  dimension_count: number;
  stakeholder_coverage: number;
  systemic_risk_count: number;
  effects_mapped: EffectsMapped;
  temporal_horizon: string;
}

export type DivergenceLevel = 'minimal' | 'low' | 'moderate' | 'high' | 'extreme';

export interface DualPerspectiveMetrics {
  contextual_depth_score: number;
  divergence: number;
  divergence_level: DivergenceLevel;
  blind_spots_detected: number;
  convergence_points: number;
  perspective_a_model: string;
  perspective_b_model: string;
}

export interface ChesedMetrics {
  expansion_score: number;
  opportunity_count: number;
  high_impact_count: number;
  benefit_count: number;
  benefit_coverage: string;
  growth_area_count: number;
  synergy_count: number;
}

export interface GevurahMetrics {
  severity_score: number;
  risk_count: number;
  critical_risk_count: number;
  high_risk_count: number;
  red_line_count: number;
  boundary_strength: string;
}

export interface TiferetMetrics {
  harmony_score: number;
  synthesis_point_count: number;
  recommendation_count: number;
  trade_off_count: number;
  balance_ratio: string;
}

export interface NetzachMetrics {
  persistence_score: number;
  phase_count: number;
  milestone_count: number;
  obstacle_count: number;
  resilience_rating: string;
}

export interface HodMetrics {
  splendor_score: number;
  message_count: number;
  stakeholder_message_count: number;
  channel_count: number;
  clarity_rating: string;
}

export interface YesodMetrics {
  readiness_score: number;
  ready_count: number;
  aligned_count: number;
  gap_count: number;
  strength_count: number;
  decision: string;
  integration_quality: string;
  foundation_strength: string;
}

export interface MalchutMetrics {
  manifestation_score: number;
  action_count: number;
  owner_count: number;
  resource_category_count: number;
  milestone_count: number;
  feasibility_rating: string;
}

// Results

interface StageResultBase<Id extends StageId> {
  stage_id: Id;
  position: number;
  timestamp: string;
  model_identifier: string;
  attempts: number;
}

export interface SuccessfulStageResult<Id extends StageId, Raw, Metrics, Mode extends PerspectiveMode = 'single'>
  extends StageResultBase<Id> {
  status: 'ok';
  mode: Mode;
  raw_fields: Raw;
  derived_metrics: Metrics;
  quality_label: QualityLabel;
}

export interface FailedStageResult<Id extends StageId> extends StageResultBase<Id> {
  status: 'error';
  error: string;
  error_type: string;
}

export type StageResult<Id extends StageId, Raw, Metrics> =
  | SuccessfulStageResult<Id, Raw, Metrics>
  | FailedStageResult<Id>;

export type DualPerspectiveResult = SuccessfulStageResult<'binah', DualPerspectiveRawFields, DualPerspectiveMetrics, 'dual'>;

export interface StageResultsById {
  keter: StageResult<'keter', KeterRawFields, KeterMetrics>;
  chochmah: StageResult<'chochmah', ChochmahRawFields, ChochmahMetrics>;
  binah: StageResult<'binah', BinahRawFields, BinahMetrics> | DualPerspectiveResult;
  chesed: StageResult<'chesed', ChesedRawFields, ChesedMetrics>;
  gevurah: StageResult<'gevurah', GevurahRawFields, GevurahMetrics>;
  tiferet: StageResult<'tiferet', TiferetRawFields, TiferetMetrics>;
  netzach: StageResult<'netzach', NetzachRawFields, NetzachMetrics>;
  hod: StageResult<'hod', HodRawFields, HodMetrics>;
  yesod: StageResult<'yesod', YesodRawFields, YesodMetrics>;
  malchut: StageResult<'malchut', MalchutRawFields, MalchutMetrics>;
}

export type AnyStageResult = StageResultsById[StageId];

/** The numeric headline score of a successful stage. */
export function keyScoreOf(result: AnyStageResult): number | undefined {
  if (result.status !== 'ok') {
    return undefined;
  }
  switch (result.stage_id) {
    case 'keter': return result.derived_metrics.alignment_percentage;
    case 'chochmah': return result.derived_metrics.insight_depth_score;
    case 'binah': return result.derived_metrics.contextual_depth_score;
    case 'chesed': return result.derived_metrics.expansion_score;
    case 'gevurah': return result.derived_metrics.severity_score;
    case 'tiferet': return result.derived_metrics.harmony_score;
    case 'netzach': return result.derived_metrics.persistence_score;
    case 'hod': return result.derived_metrics.splendor_score;
    case 'yesod': return result.derived_metrics.readiness_score;
    case 'malchut': return result.derived_metrics.manifestation_score;
  }
}
