import type { PipelineConfig } from '../value-objects/pipeline-config.js';

export interface SlideshowJobProps {
  readonly id: string;
  readonly sources: readonly string[];
  readonly outputPath: string;
  readonly config: PipelineConfig;
  readonly createdAt: Date;
}

export class SlideshowJob {
  public readonly id: string;

  public readonly sources: readonly string[];

  public readonly outputPath: string;

  public readonly config: PipelineConfig;

  public readonly createdAt: Date;

  private constructor(props: SlideshowJobProps) {
    this.id = props.id;
    this.sources = Object.freeze([...props.sources]);
    this.outputPath = props.outputPath;
    this.config = props.config;
    this.createdAt = props.createdAt;
  }

  public static create(props: SlideshowJobProps): SlideshowJob {
    if (props.id.trim().length === 0) {
      throw new Error('Slideshow job requires an identifier');
    }

    if (props.outputPath.trim().length === 0) {
      throw new Error('Slideshow job requires an output path');
    }

    if (props.sources.some((source) => source.trim().length === 0)) {
      throw new Error('Source image paths must not be blank');
    }

    return new SlideshowJob(props);
  }

  public get imageCount(): number {
    return this.sources.length;
  }

  /** Hold frames plus the fades between each consecutive pair. */
  public get expectedFrameCount(): number {
    return expectedFrameCount(this.sources.length, this.config.fadeSteps);
  }
}

export function expectedFrameCount(imageCount: number, fadeSteps: number): number {
  if (imageCount <= 0) {
    return 0;
  }

  return imageCount + (imageCount - 1) * fadeSteps;
}
