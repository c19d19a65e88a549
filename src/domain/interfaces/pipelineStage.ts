import type { StageId, StageResultsById } from '../models/stageTypes';
import type { PipelineContext } from '../models/pipelineContext';

export interface StageRunOptions {
  signal?: AbortSignal;
}

export interface PipelineStage<Id extends StageId> {
  readonly stageId: Id;
  readonly dependencies: readonly StageId[];

  process(scenario: string, context: PipelineContext, options?: StageRunOptions): Promise<StageResultsById[Id]>;
}

export type PipelineStages = { [Id in StageId]: PipelineStage<Id> };

export type AnyPipelineStage = PipelineStages[StageId];
