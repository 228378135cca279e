/**
 * Radix-2 FFT and short-time transforms used by the denoiser.
 */

function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

/**
 * In-place iterative Cooley-Tukey FFT. The inverse transform is scaled by 1/n.
 */
export function fft(re: Float64Array, im: Float64Array, inverse = false): void {
  const n = re.length;
  if (im.length !== n) {
    throw new RangeError('Real and imaginary parts must have the same length');
  }
  if (!isPowerOfTwo(n)) {
    throw new RangeError(`FFT length must be a power of two, got ${n}`);
  }

  // Bit-reversal permutation
  for (let i = 1, j = 0; i < n; i++) {
    let bit = n >> 1;
    for (; j & bit; bit >>= 1) {
      j ^= bit;
    }
    j ^= bit;
    if (i < j) {
      let tmp = re[i]; re[i] = re[j]; re[j] = tmp;
      tmp = im[i]; im[i] = im[j]; im[j] = tmp;
    }
  }

  const sign = inverse ? 1 : -1;
  for (let size = 2; size <= n; size <<= 1) {
    const half = size >> 1;
    const theta = (sign * 2 * Math.PI) / size;
    const wRe = Math.cos(theta);
    const wIm = Math.sin(theta);
    for (let start = 0; start < n; start += size) {
      let curRe = 1;
      let curIm = 0;
      for (let k = 0; k < half; k++) {
        const a = start + k;
        const b = a + half;
        const tRe = re[b] * curRe - im[b] * curIm;
        const tIm = re[b] * curIm + im[b] * curRe;
        re[b] = re[a] - tRe;
        im[b] = im[a] - tIm;
        re[a] += tRe;
        im[a] += tIm;
        const nextRe = curRe * wRe - curIm * wIm;
        curIm = curRe * wIm + curIm * wRe;
        curRe = nextRe;
      }
    }
  }

  if (inverse) {
    for (let i = 0; i < n; i++) {
      re[i] /= n;
      im[i] /= n;
    }
  }
}

/** Periodic Hann window */
export function hannWindow(size: number): Float64Array {
  const w = new Float64Array(size);
  for (let i = 0; i < size; i++) {
    w[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / size);
  }
  return w;
}

export interface SpectrumFrame {
  index: number;
  /** bins = nFft / 2 + 1 */
  re: Float64Array;
  im: Float64Array;
}

/** Frames of a centered STFT over `length` samples */
export function stftFrameCount(length: number, hop: number): number {
  return 1 + Math.floor(length / hop);
}

/**
 * Centered STFT, one frame at a time. The signal is reflect-padded by
 * nFft / 2 on both sides. Yielded arrays are reused between frames.
 */
export function* stftFrames(
  signal: Float64Array,
  nFft: number,
  hop: number,
  window: Float64Array
): Generator<SpectrumFrame> {
  const n = signal.length;
  const pad = nFft >> 1;
  const paddedLength = n + 2 * pad;
  const frames = stftFrameCount(n, hop);
  const bins = pad + 1;

  const bufRe = new Float64Array(nFft);
  const bufIm = new Float64Array(nFft);
  const re = new Float64Array(bins);
  const im = new Float64Array(bins);

  for (let f = 0; f < frames; f++) {
    const offset = f * hop;
    for (let i = 0; i < nFft; i++) {
      const p = offset + i;
      const sample = n > 0 && p < paddedLength ? signal[reflectIndex(p - pad, n)] : 0;
      bufRe[i] = sample * window[i];
      bufIm[i] = 0;
    }
    fft(bufRe, bufIm);
    re.set(bufRe.subarray(0, bins));
    im.set(bufIm.subarray(0, bins));
    yield { index: f, re, im };
  }
}

/**
 * Weighted overlap-add inverse of stftFrames(). Frames must be pushed in
 * order; samples are written to the output as soon as no later frame can
 * touch them, so only one frame of accumulator is held.
 */
export class OverlapAdd {
  readonly output: Float64Array;
  private readonly acc: Float64Array;
  private readonly norm: Float64Array;
  private readonly bufRe: Float64Array;
  private readonly bufIm: Float64Array;
  private readonly pad: number;
  private next = 0;

  constructor(
    private readonly nFft: number,
    private readonly hop: number,
    private readonly window: Float64Array,
    length: number
  ) {
    if (nFft % hop !== 0) {
      throw new RangeError(`FFT length ${nFft} must be a multiple of hop ${hop}`);
    }
    this.output = new Float64Array(length);
    this.acc = new Float64Array(nFft);
    this.norm = new Float64Array(nFft);
    this.bufRe = new Float64Array(nFft);
    this.bufIm = new Float64Array(nFft);
    this.pad = nFft >> 1;
  }

  push(re: Float64Array, im: Float64Array): void {
    const { nFft, bufRe, bufIm, window } = this;
    const bins = (nFft >> 1) + 1;
    // Rebuild the Hermitian-symmetric full spectrum
    for (let k = 0; k < bins; k++) {
      bufRe[k] = re[k];
      bufIm[k] = im[k];
    }
    for (let k = bins; k < nFft; k++) {
      bufRe[k] = re[nFft - k];
      bufIm[k] = -im[nFft - k];
    }
    fft(bufRe, bufIm, true);

    const offset = this.next * this.hop;
    for (let i = 0; i < nFft; i++) {
      const slot = (offset + i) % nFft;
      this.acc[slot] += bufRe[i] * window[i];
      this.norm[slot] += window[i] * window[i];
    }
    this.flush(offset, offset + this.hop);
    this.next++;
  }

  /** Write out what the last frame left in the accumulator */
  finish(): Float64Array {
    if (this.next > 0) {
      const start = this.next * this.hop;
      this.flush(start, start - this.hop + this.nFft);
    }
    return this.output;
  }

  private flush(from: number, to: number): void {
    for (let p = from; p < to; p++) {
      const slot = p % this.nFft;
      const i = p - this.pad;
      if (i >= 0 && i < this.output.length) {
        this.output[i] = this.norm[slot] > 1e-10 ? this.acc[slot] / this.norm[slot] : 0;
      }
      this.acc[slot] = 0;
      this.norm[slot] = 0;
    }
  }
}

/** Mirror an index back into [0, n) without repeating the edge */
function reflectIndex(i: number, n: number): number {
  if (n === 1) return 0;
  const period = 2 * (n - 1);
  let m = ((i % period) + period) % period;
  if (m >= n) m = period - m;
  return m;
}
