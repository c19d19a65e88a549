import { STAGE_ORDER, StageId, StageResultsById } from './stageTypes';

/**
 * Append-only record of the stage results produced so far in one run.
 * Every mutation returns a new context; existing instances never change.
 */
export class PipelineContext {
  private constructor(
    readonly runId: string,
    private readonly results: Readonly<Partial<StageResultsById>>
  ) {
    Object.freeze(this);
  }

  static empty(runId: string): PipelineContext {
    return new PipelineContext(runId, Object.freeze({}));
  }

  with<Id extends StageId>(stageId: Id, result: StageResultsById[Id]): PipelineContext {
    if (this.results[stageId] !== undefined) {
      throw new Error(`Stage '${stageId}' already has a result in run ${this.runId}`);
    }
    const next: Partial<StageResultsById> = { ...this.results };
    next[stageId] = result;
    return new PipelineContext(this.runId, Object.freeze(next));
  }

  get<Id extends StageId>(stageId: Id): StageResultsById[Id] | undefined {
    return this.results[stageId];
  }

  has(stageId: StageId): boolean {
    return this.results[stageId] !== undefined;
  }

  /** A view holding only the listed stages, for prompt building. */
  only(stageIds: readonly StageId[]): PipelineContext {
    const subset: Partial<StageResultsById> = {};
    for (const stageId of stageIds) {
      copyResult(this.results, subset, stageId);
    }
    return new PipelineContext(this.runId, Object.freeze(subset));
  }

  completedStages(): StageId[] {
    return STAGE_ORDER.filter(stageId => this.has(stageId));
  }

  /** Every stage's result, in pipeline order. Throws while any stage has yet to run. */
  toCompleteRecord(): StageResultsById {
    const { keter, chochmah, binah, chesed, gevurah, tiferet, netzach, hod, yesod, malchut } = this.results;
    if (
      keter === undefined || chochmah === undefined || binah === undefined || chesed === undefined ||
      gevurah === undefined || tiferet === undefined || netzach === undefined || hod === undefined ||
      yesod === undefined || malchut === undefined
    ) {
      const missing = STAGE_ORDER.filter(stageId => !this.has(stageId));
      throw new Error(`Run ${this.runId} has no result for: ${missing.join(', ')}`);
    }
    return { keter, chochmah, binah, chesed, gevurah, tiferet, netzach, hod, yesod, malchut };
  }
}

function copyResult<Id extends StageId>(
  source: Readonly<Partial<StageResultsById>>,
  target: Partial<StageResultsById>,
  stageId: Id
): void {
  const result = source[stageId];
  if (result !== undefined) {
    target[stageId] = result;
  }
}
