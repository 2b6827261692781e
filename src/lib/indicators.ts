/**
 * Technical indicators: pure math functions over price series.
 *
 * Every `*Series` function returns an array aligned with its input: index i
 * holds the value computed from data[0..i], or NaN while the lookback is not
 * yet filled. Strategies read the tail with `last()` / `prev()`.
 */

export function last(series: number[]): number {
  return series.length > 0 ? series[series.length - 1] : NaN;
}

export function prev(series: number[], back: number = 1): number {
  const i = series.length - 1 - back;
  return i >= 0 ? series[i] : NaN;
}

function nanArray(n: number): number[] {
  return new Array<number>(n).fill(NaN);
}

export function sma(data: number[], period: number): number {
  if (period <= 0 || data.length < period) return NaN;
  const slice = data.slice(-period);
  return slice.reduce((a, b) => a + b, 0) / period;
}

/** Rolling simple mean. Any NaN inside the window yields NaN. */
export function smaSeries(data: number[], period: number): number[] {
  const out = nanArray(data.length);
  if (period <= 0) return out;
  let sum = 0;
  let nans = 0;
  for (let i = 0; i < data.length; i++) {
    const v = data[i];
    if (Number.isNaN(v)) nans++;
    else sum += v;
    if (i >= period) {
      const old = data[i - period];
      if (Number.isNaN(old)) nans--;
      else sum -= old;
    }
    if (i >= period - 1 && nans === 0) out[i] = sum / period;
  }
  return out;
}

/**
 * EMA with alpha = 2/(period+1), seeded by the SMA of the first `period`
 * finite values. Leading NaNs (e.g. a MACD line) are skipped.
 */
export function emaSeries(data: number[], period: number): number[] {
  const out = nanArray(data.length);
  if (period <= 0) return out;
  let start = 0;
  while (start < data.length && Number.isNaN(data[start])) start++;
  if (data.length - start < period) return out;

  const alpha = 2 / (period + 1);
  let value = 0;
  for (let i = start; i < start + period; i++) value += data[i];
  value /= period;
  out[start + period - 1] = value;
  for (let i = start + period; i < data.length; i++) {
    value = data[i] * alpha + value * (1 - alpha);
    out[i] = value;
  }
  return out;
}

export function ema(data: number[], period: number): number {
  return last(emaSeries(data, period));
}

/**
 * RSI from simple rolling means of gains and losses over `period` deltas.
 * A flat window reads 50; a window with no losses reads 100.
 */
export function rsiSeries(closes: number[], period: number = 14): number[] {
  const out = nanArray(closes.length);
  if (period <= 0) return out;
  const gains: number[] = [0];
  const losses: number[] = [0];
  for (let i = 1; i < closes.length; i++) {
    const diff = closes[i] - closes[i - 1];
    gains.push(diff > 0 ? diff : 0);
    losses.push(diff < 0 ? -diff : 0);
  }
  let gainSum = 0;
  let lossSum = 0;
  for (let i = 1; i < closes.length; i++) {
    gainSum += gains[i];
    lossSum += losses[i];
    if (i > period) {
      gainSum -= gains[i - period];
      lossSum -= losses[i - period];
    }
    if (i >= period) {
      const avgGain = gainSum / period;
      const avgLoss = lossSum / period;
      if (avgLoss <= 1e-12) out[i] = avgGain <= 1e-12 ? 50 : 100;
      else out[i] = 100 - 100 / (1 + avgGain / avgLoss);
    }
  }
  return out;
}

export function rsi(closes: number[], period: number = 14): number {
  return last(rsiSeries(closes, period));
}

export function trueRangeSeries(
  highs: number[],
  lows: number[],
  closes: number[]
): number[] {
  const out: number[] = [];
  for (let i = 0; i < highs.length; i++) {
    if (i === 0) {
      out.push(highs[0] - lows[0]);
      continue;
    }
    out.push(
      Math.max(
        highs[i] - lows[i],
        Math.abs(highs[i] - closes[i - 1]),
        Math.abs(lows[i] - closes[i - 1])
      )
    );
  }
  return out;
}

/** ATR as the rolling mean of true range. */
export function atrSeries(
  highs: number[],
  lows: number[],
  closes: number[],
  period: number = 14
): number[] {
  return smaSeries(trueRangeSeries(highs, lows, closes), period);
}

export function atr(
  highs: number[],
  lows: number[],
  closes: number[],
  period: number = 14
): number {
  return last(atrSeries(highs, lows, closes, period));
}

export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

export function macdSeries(
  closes: number[],
  fast: number = 12,
  slow: number = 26,
  signalPeriod: number = 9
): MacdSeries {
  const fastEma = emaSeries(closes, fast);
  const slowEma = emaSeries(closes, slow);
  const line = fastEma.map((f, i) => f - slowEma[i]);
  const signal = emaSeries(line, signalPeriod);
  const histogram = line.map((m, i) => m - signal[i]);
  return { macd: line, signal, histogram };
}

export interface BollingerSeries {
  upper: number[];
  middle: number[];
  lower: number[];
  /** (upper - lower) / middle */
  width: number[];
}

/** Bollinger Bands with population standard deviation. */
export function bollingerSeries(
  closes: number[],
  period: number = 20,
  k: number = 2
): BollingerSeries {
  const n = closes.length;
  const upper = nanArray(n);
  const middle = nanArray(n);
  const lower = nanArray(n);
  const width = nanArray(n);
  for (let i = period - 1; i < n; i++) {
    const slice = closes.slice(i - period + 1, i + 1);
    const mean = slice.reduce((a, b) => a + b, 0) / period;
    const variance = slice.reduce((sum, v) => sum + (v - mean) ** 2, 0) / period;
    const std = Math.sqrt(variance);
    middle[i] = mean;
    upper[i] = mean + k * std;
    lower[i] = mean - k * std;
    width[i] = mean !== 0 ? (upper[i] - lower[i]) / mean : 0;
  }
  return { upper, middle, lower, width };
}

export interface StochasticSeries {
  k: number[];
  d: number[];
}

/**
 * Slow stochastic: raw %K over `kPeriod`, smoothed by `smoothK`; %D is the
 * rolling mean of smoothed %K over `dPeriod`. A zero high-low range gives NaN.
 */
export function stochasticSeries(
  highs: number[],
  lows: number[],
  closes: number[],
  kPeriod: number = 14,
  dPeriod: number = 3,
  smoothK: number = 3
): StochasticSeries {
  const raw = nanArray(closes.length);
  for (let i = kPeriod - 1; i < closes.length; i++) {
    const hh = highest(highs.slice(i - kPeriod + 1, i + 1));
    const ll = lowest(lows.slice(i - kPeriod + 1, i + 1));
    const range = hh - ll;
    if (range > 0) raw[i] = (100 * (closes[i] - ll)) / range;
  }
  const k = smoothK > 1 ? smaSeries(raw, smoothK) : raw;
  return { k, d: smaSeries(k, dPeriod) };
}

export function highest(data: number[]): number {
  return data.length > 0 ? Math.max(...data) : NaN;
}

export function lowest(data: number[]): number {
  return data.length > 0 ? Math.min(...data) : NaN;
}

/** Percentile with linear interpolation between closest ranks (0..100). */
export function percentile(data: number[], p: number): number {
  const values = data.filter((v) => !Number.isNaN(v)).sort((a, b) => a - b);
  if (values.length === 0) return NaN;
  const rank = (Math.min(100, Math.max(0, p)) / 100) * (values.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return values[lo] + (values[hi] - values[lo]) * (rank - lo);
}

export type Cross = "up" | "down" | null;

/**
 * Crossover between the last two points of `fast` and `slow`:
 * "up" when fast goes from <= slow to > slow, "down" for >= to <.
 * Any NaN among the four points means no cross.
 */
export function crossover(fast: number[], slow: number[]): Cross {
  const f1 = last(fast);
  const s1 = last(slow);
  const f0 = prev(fast);
  const s0 = prev(slow);
  if ([f0, s0, f1, s1].some((v) => Number.isNaN(v))) return null;
  if (f0 <= s0 && f1 > s1) return "up";
  if (f0 >= s0 && f1 < s1) return "down";
  return null;
}
