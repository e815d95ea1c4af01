import metrics from '../metrics/index.js';
import {
  GrayscaleFrame,
  MotionScore,
  blurFrame,
  createChangedAreaScore,
  readFrameAsGrayscale
} from './utils.js';

export interface MotionDetectorOptions {
  camera: string;
  threshold: number;
  referenceRefreshFrames?: number;
  quietRatio?: number;
  diffThreshold?: number;
  blurPasses?: number;
  dilateIterations?: number;
  score?: MotionScore;
}

export type ReferenceRefresh = 'initial' | 'resize' | 'interval' | 'quiet';

export type MotionSample = {
  area: number;
  frame: number;
  referenceSet: boolean;
  refresh: ReferenceRefresh | null;
};

const DEFAULT_REFERENCE_REFRESH_FRAMES = 300;
const DEFAULT_QUIET_RATIO = 0.1;
const DEFAULT_BLUR_PASSES = 2;

/**
 * Owns the reference image for one camera and turns frames into motion
 * scores. Not safe for concurrent use: one supervisor loop drives it.
 *
 * The reference is replaced on two independent triggers: every
 * `referenceRefreshFrames` frames to absorb slow lighting drift, and on any
 * frame scoring below `threshold * quietRatio` so an empty scene keeps the
 * baseline current.
 */
export class MotionDetector {
  private reference: GrayscaleFrame | null = null;
  private frameCount = 0;
  private readonly score: MotionScore;

  constructor(private readonly options: MotionDetectorOptions) {
    this.score =
      options.score ??
      createChangedAreaScore({
        diffThreshold: options.diffThreshold,
        dilateIterations: options.dilateIterations
      });
  }

  nextScore(frame: Buffer): MotionSample {
    const current = blurFrame(
      readFrameAsGrayscale(frame),
      this.options.blurPasses ?? DEFAULT_BLUR_PASSES
    );
    this.frameCount += 1;

    if (!this.reference) {
      return this.replaceReference(current, 'initial');
    }

    if (this.reference.width !== current.width || this.reference.height !== current.height) {
      return this.replaceReference(current, 'resize');
    }

    const area = Math.max(0, this.score(this.reference, current));
    const refreshFrames = this.options.referenceRefreshFrames ?? DEFAULT_REFERENCE_REFRESH_FRAMES;
    const quietRatio = this.options.quietRatio ?? DEFAULT_QUIET_RATIO;

    const intervalDue = this.frameCount % refreshFrames === 0;
    const quiet = area < this.options.threshold * quietRatio;

    let refresh: ReferenceRefresh | null = null;
    if (intervalDue) {
      refresh = 'interval';
    } else if (quiet) {
      refresh = 'quiet';
    }

    if (refresh) {
      this.reference = current;
      metrics.incrementCameraCounter(this.options.camera, `referenceRefresh.${refresh}`);
    }

    metrics.setCameraGauge(this.options.camera, 'motionArea', area);

    return { area, frame: this.frameCount, referenceSet: false, refresh };
  }

  hasReference() {
    return this.reference !== null;
  }

  getFrameCount() {
    return this.frameCount;
  }

  reset() {
    this.reference = null;
    this.frameCount = 0;
  }

  private replaceReference(frame: GrayscaleFrame, reason: 'initial' | 'resize'): MotionSample {
    this.reference = frame;
    metrics.incrementCameraCounter(this.options.camera, `referenceRefresh.${reason}`);
    return { area: 0, frame: this.frameCount, referenceSet: true, refresh: reason };
  }
}

export default MotionDetector;
