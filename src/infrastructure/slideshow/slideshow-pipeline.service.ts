import type {
  PipelineResult,
  PipelineRunOptions,
  SlideshowJob,
  SlideshowPipeline,
} from '@domain/slideshow/index.js';

import { PipelineWorker, type PipelineWorkerDependencies } from './pipeline-worker.js';

/** Each run gets its own worker, since a worker's terminal state is final. */
export class SlideshowPipelineService implements SlideshowPipeline {
  public constructor(private readonly dependencies: PipelineWorkerDependencies = {}) {}

  public async run(job: SlideshowJob, options?: PipelineRunOptions): Promise<PipelineResult> {
    const worker = new PipelineWorker(this.dependencies);
    return worker.run(job, options);
  }
}
