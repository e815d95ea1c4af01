import { PNG } from 'pngjs';

export type GrayscaleFrame = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type ChangeMask = {
  width: number;
  height: number;
  data: Uint8Array;
};

/** Scores `current` against `reference`; both frames share dimensions. */
export type MotionScore = (reference: GrayscaleFrame, current: GrayscaleFrame) => number;

export function readFrameAsGrayscale(pngBuffer: Buffer): GrayscaleFrame {
  const image = PNG.sync.read(pngBuffer);
  const { width, height, data } = image;
  const grayscale = new Uint8Array(width * height);

  for (let i = 0; i < width * height; i += 1) {
    const offset = i * 4;
    const r = data[offset];
    const g = data[offset + 1];
    const b = data[offset + 2];
    // Rec. 709 luma coefficients
    grayscale[i] = Math.round(0.2126 * r + 0.7152 * g + 0.0722 * b);
  }

  return { width, height, data: grayscale };
}

export function gaussianBlur(frame: GrayscaleFrame): GrayscaleFrame {
  const { width, height, data } = frame;
  const output = new Uint8Array(width * height);
  const kernel = [
    [1, 2, 1],
    [2, 4, 2],
    [1, 2, 1]
  ];
  const kernelSum = 16;

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let total = 0;

      for (let ky = -1; ky <= 1; ky += 1) {
        for (let kx = -1; kx <= 1; kx += 1) {
          const weight = kernel[ky + 1][kx + 1];
          const sampleX = clamp(x + kx, 0, width - 1);
          const sampleY = clamp(y + ky, 0, height - 1);
          total += data[sampleY * width + sampleX] * weight;
        }
      }

      output[y * width + x] = Math.round(total / kernelSum);
    }
  }

  return {
    width,
    height,
    data: output
  };
}

export function blurFrame(frame: GrayscaleFrame, passes: number): GrayscaleFrame {
  let result = frame;
  for (let i = 0; i < passes; i += 1) {
    result = gaussianBlur(result);
  }
  return result;
}

export function thresholdDiff(
  reference: GrayscaleFrame,
  current: GrayscaleFrame,
  threshold: number
): ChangeMask {
  if (reference.width !== current.width || reference.height !== current.height) {
    throw new Error('Frame dimensions must match for diff comparison');
  }

  const total = current.data.length;
  const mask = new Uint8Array(total);

  for (let i = 0; i < total; i += 1) {
    if (Math.abs(current.data[i] - reference.data[i]) > threshold) {
      mask[i] = 1;
    }
  }

  return { width: current.width, height: current.height, data: mask };
}

/** 3x3 square dilation, repeated `iterations` times. */
export function dilate(mask: ChangeMask, iterations: number): ChangeMask {
  let { data } = mask;
  const { width, height } = mask;

  for (let pass = 0; pass < iterations; pass += 1) {
    const next = new Uint8Array(width * height);
    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        if (data[y * width + x] === 0) {
          continue;
        }
        for (let ky = -1; ky <= 1; ky += 1) {
          const sampleY = y + ky;
          if (sampleY < 0 || sampleY >= height) {
            continue;
          }
          for (let kx = -1; kx <= 1; kx += 1) {
            const sampleX = x + kx;
            if (sampleX < 0 || sampleX >= width) {
              continue;
            }
            next[sampleY * width + sampleX] = 1;
          }
        }
      }
    }
    data = next;
  }

  return { width, height, data };
}

export function maskArea(mask: ChangeMask): number {
  let area = 0;
  for (let i = 0; i < mask.data.length; i += 1) {
    area += mask.data[i];
  }
  return area;
}

export type ChangedAreaScoreOptions = {
  diffThreshold?: number;
  dilateIterations?: number;
};

export const DEFAULT_DIFF_THRESHOLD = 25;
export const DEFAULT_DILATE_ITERATIONS = 2;

/**
 * Default motion score: pixels whose absolute difference exceeds
 * `diffThreshold`, dilated so neighbouring changes merge into regions,
 * counted as an area in pixels.
 */
export function createChangedAreaScore(options: ChangedAreaScoreOptions = {}): MotionScore {
  const diffThreshold = options.diffThreshold ?? DEFAULT_DIFF_THRESHOLD;
  const iterations = options.dilateIterations ?? DEFAULT_DILATE_ITERATIONS;

  return (reference, current) => maskArea(dilate(thresholdDiff(reference, current, diffThreshold), iterations));
}

function clamp(value: number, min: number, max: number) {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}
