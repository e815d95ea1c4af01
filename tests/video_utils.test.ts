import { describe, expect, it } from 'vitest';
import {
  createChangedAreaScore,
  dilate,
  gaussianBlur,
  maskArea,
  readFrameAsGrayscale,
  thresholdDiff,
  type ChangeMask,
  type GrayscaleFrame
} from '../src/video/utils.js';
import { blockFill, createColourPng, createGreyPng } from './helpers/frames.js';

function frame(width: number, height: number, values: number[]): GrayscaleFrame {
  return { width, height, data: Uint8Array.from(values) };
}

function singlePixelMask(width: number, height: number, x: number, y: number): ChangeMask {
  const data = new Uint8Array(width * height);
  data[y * width + x] = 1;
  return { width, height, data };
}

describe('video utils', () => {
  it('ReadFrameUsesRec709Luma', () => {
    expect(readFrameAsGrayscale(createColourPng(2, 1, [255, 0, 0])).data).toEqual(Uint8Array.from([54, 54]));
    expect(readFrameAsGrayscale(createColourPng(1, 1, [0, 255, 0])).data).toEqual(Uint8Array.from([182]));

    const grey = readFrameAsGrayscale(createGreyPng(3, 2, 90));
    expect(grey.width).toBe(3);
    expect(grey.height).toBe(2);
    expect(Array.from(grey.data)).toEqual([90, 90, 90, 90, 90, 90]);
  });

  it('GaussianBlurSpreadsSinglePixel', () => {
    const blurred = gaussianBlur(frame(3, 3, [0, 0, 0, 0, 160, 0, 0, 0, 0]));
    expect(Array.from(blurred.data)).toEqual([10, 20, 10, 20, 40, 20, 10, 20, 10]);

    const uniform = gaussianBlur(frame(4, 4, new Array(16).fill(77)));
    expect(Array.from(uniform.data)).toEqual(new Array(16).fill(77));
  });

  it('ThresholdDiffCountsStrictlyGreaterDifferences', () => {
    const reference = frame(3, 1, [100, 100, 100]);
    const current = frame(3, 1, [125, 126, 74]);
    expect(Array.from(thresholdDiff(reference, current, 25).data)).toEqual([0, 1, 1]);
  });

  it('ThresholdDiffRejectsMismatchedDimensions', () => {
    expect(() => thresholdDiff(frame(2, 1, [0, 0]), frame(1, 2, [0, 0]), 25)).toThrow(
      'Frame dimensions must match for diff comparison'
    );
  });

  it('DilateGrowsSquareRegions', () => {
    const mask = singlePixelMask(5, 5, 2, 2);
    expect(maskArea(dilate(mask, 0))).toBe(1);
    expect(maskArea(dilate(mask, 1))).toBe(9);
    expect(maskArea(dilate(mask, 2))).toBe(25);
    expect(maskArea(dilate(singlePixelMask(5, 5, 0, 0), 1))).toBe(4);
  });

  it('ChangedAreaScoreMeasuresChangedPixels', () => {
    const reference = readFrameAsGrayscale(createGreyPng(8, 8, 10));
    const current = readFrameAsGrayscale(
      createGreyPng(8, 8, blockFill(10, { x: 3, y: 3, width: 2, height: 2, value: 200 }))
    );

    expect(createChangedAreaScore({ dilateIterations: 0 })(reference, current)).toBe(4);
    expect(createChangedAreaScore({ dilateIterations: 1 })(reference, current)).toBe(16);
    expect(createChangedAreaScore()(reference, current)).toBe(36);
    expect(createChangedAreaScore({ diffThreshold: 190 })(reference, current)).toBe(0);
    expect(createChangedAreaScore()(reference, reference)).toBe(0);
  });
});
