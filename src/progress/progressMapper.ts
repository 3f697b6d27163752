import {
  DEFAULT_STAGE_WEIGHTS,
  PIPELINE_STAGES,
  validateStageWeights,
  type StageWeights,
} from '../config.js';
import type { PipelineStage, ProgressStatus } from '../types.js';

/**
 * Translates stage-local percentages into one overall percentage for a job.
 *
 * Each pipeline stage owns a band of the 0–100 range. Values are interpolated
 * into the band and then clamped against the last emitted value, so the
 * sequence returned for a job never decreases even when a collaborator
 * reports out of order or repeats itself.
 */
export class ProgressMapper {
  private readonly weights: StageWeights;
  private currentStage: ProgressStatus = 'pending';
  private currentProgress = 0;

  constructor(weights: StageWeights = DEFAULT_STAGE_WEIGHTS) {
    validateStageWeights(weights);
    this.weights = weights;
  }

  mapProgress(stage: ProgressStatus, stageLocalPercent: number): number {
    const candidate = this.interpolate(stage, stageLocalPercent);
    this.currentStage = stage;
    this.currentProgress = Math.max(this.currentProgress, candidate);
    return this.currentProgress;
  }

  getCurrentStage(): ProgressStatus {
    return this.currentStage;
  }

  getCurrentProgress(): number {
    return this.currentProgress;
  }

  bandOf(stage: PipelineStage): readonly [number, number] {
    return this.weights[stage];
  }

  private interpolate(stage: ProgressStatus, stageLocalPercent: number): number {
    if (stage === 'completed') {
      return 100;
    }

    if (!isPipelineStage(stage)) {
      return this.currentProgress;
    }

    const [start, end] = this.weights[stage];
    const local = clampPercent(stageLocalPercent);
    return Math.round(start + ((end - start) * local) / 100);
  }
}

export function isPipelineStage(value: string): value is PipelineStage {
  return PIPELINE_STAGES.some((stage) => stage === value);
}

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.min(100, Math.max(0, value));
}
