import type { PipelineStage, ProgressDetails, ProgressSink } from '../types.js';
import type { ProgressMapper } from './progressMapper.js';

/**
 * Single-method progress surface handed to fetchers and processors. Callers
 * report stage-local percentages and never see the overall mapping.
 */
export interface ProgressCallback {
  report(stageLocalPercent: number, message: string, details?: ProgressDetails): Promise<void>;
}

export const NOOP_PROGRESS: ProgressCallback = {
  report: async () => undefined,
};

export class MappedProgressCallback implements ProgressCallback {
  constructor(
    private readonly sink: ProgressSink,
    private readonly mapper: ProgressMapper,
    readonly stage: PipelineStage,
  ) {}

  async report(stageLocalPercent: number, message: string, details?: ProgressDetails): Promise<void> {
    const mapped = this.mapper.mapProgress(this.stage, stageLocalPercent);
    await this.sink.update(this.stage, mapped, message, details);
  }
}

export function createProgressCallback(
  sink: ProgressSink | undefined,
  mapper: ProgressMapper,
  stage: PipelineStage,
): ProgressCallback {
  if (!sink) {
    return NOOP_PROGRESS;
  }

  return new MappedProgressCallback(sink, mapper, stage);
}
