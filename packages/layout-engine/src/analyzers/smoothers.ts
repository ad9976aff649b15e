import type { ResolvedDensityHistogramOptions } from '../config/options';

/**
 * One-dimensional smoothing of histogram counts. Output has the input's
 * length; values outside the array count as zero.
 */
export interface Smoother {
  readonly name: string;
  smooth(values: readonly number[]): number[];
}

function convolve(
  values: readonly number[],
  kernel: readonly number[],
): number[] {
  const radius = Math.floor(kernel.length / 2);
  const result = new Array<number>(values.length).fill(0);

  for (let i = 0; i < values.length; i++) {
    let sum = 0;
    for (let k = 0; k < kernel.length; k++) {
      const j = i + k - radius;
      if (j >= 0 && j < values.length) {
        sum += values[j] * kernel[k];
      }
    }
    result[i] = sum;
  }
  return result;
}

/**
 * Box filter over an odd window.
 */
export class MovingAverageSmoother implements Smoother {
  readonly name = 'moving-average';
  private readonly kernel: number[];

  constructor(readonly window: number) {
    this.kernel = new Array<number>(window).fill(1 / window);
  }

  smooth(values: readonly number[]): number[] {
    return convolve(values, this.kernel);
  }
}

/**
 * Normalized Gaussian kernel truncated at 4 sigma.
 */
export class GaussianSmoother implements Smoother {
  readonly name = 'gaussian';
  private readonly kernel: number[];

  constructor(readonly sigma: number) {
    const radius = Math.max(1, Math.ceil(4 * sigma));
    const raw: number[] = [];
    for (let offset = -radius; offset <= radius; offset++) {
      raw.push(Math.exp(-(offset * offset) / (2 * sigma * sigma)));
    }
    const total = raw.reduce((sum, value) => sum + value, 0);
    this.kernel = raw.map((value) => value / total);
  }

  smooth(values: readonly number[]): number[] {
    return convolve(values, this.kernel);
  }
}

export function createSmoother(
  options: Pick<
    ResolvedDensityHistogramOptions,
    'smoothing' | 'smoothingWindow' | 'gaussianSigma'
  >,
): Smoother {
  switch (options.smoothing) {
    case 'gaussian':
      return new GaussianSmoother(options.gaussianSigma);
    case 'moving-average':
      return new MovingAverageSmoother(options.smoothingWindow);
  }
}
