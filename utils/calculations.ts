import type { WeirParams, WeirParamBounds, ParamBounds, DischargePoint, SamplingOptions, UnitSystem, WeirFlowResult } from '../types';
import { InvalidParameterError } from './errors';

export const DEFAULT_SAMPLE_COUNT = 300;
// Lower sampling bound. Keeps H off zero; no hydraulic meaning.
export const DEFAULT_MIN_HEAD = 0.01;

// Unit Constants
export const UNIT_CONSTANTS = {
  SI: { G: 9.81 },
  Imperial: { G: 32.2 }
};

const FT_PER_M = 3.28084;

// --- Core Equation ---

/**
 * Broad-crested weir discharge, Q = Cd * b * H * sqrt(2gH).
 */
export const computeDischarge = (cd: number, b: number, h: number, unit: UnitSystem = 'SI'): number => {
  const { G } = UNIT_CONSTANTS[unit];
  return cd * b * h * Math.sqrt(2 * G * h);
};

export const linspace = (start: number, end: number, count: number): number[] => {
  if (count < 2) return count === 1 ? [end] : [];
  const step = (end - start) / (count - 1);
  const values: number[] = [];
  for (let i = 0; i < count - 1; i++) {
    values.push(start + i * step);
  }
  values.push(end);
  return values;
};

// --- Validation ---

const requirePositive = (name: string, value: number) => {
  if (!Number.isFinite(value)) throw new InvalidParameterError(name, 'must be a finite number');
  if (value <= 0) throw new InvalidParameterError(name, 'must be positive');
};

const validate = (p: WeirParams, sampleCount: number, minHead: number) => {
  requirePositive('dischargeCoefficient', p.dischargeCoefficient);
  requirePositive('crestWidth', p.crestWidth);
  requirePositive('maxHead', p.maxHead);
  requirePositive('minHead', minHead);
  if (minHead >= p.maxHead) {
    throw new InvalidParameterError('maxHead', `must exceed the minimum sampled head (${minHead})`);
  }
  if (!Number.isInteger(sampleCount) || sampleCount < 2) {
    throw new InvalidParameterError('sampleCount', 'must be an integer of at least 2');
  }
};

// --- Curve ---

/**
 * Samples the discharge curve from `minHead` to `maxHead` inclusive.
 * Throws InvalidParameterError before sampling if the inputs cannot give
 * strictly increasing, positive heads.
 */
export const evaluateDischargeCurve = (
  p: WeirParams,
  options: SamplingOptions = {},
  unit: UnitSystem = 'SI'
): DischargePoint[] => {
  const sampleCount = options.sampleCount ?? DEFAULT_SAMPLE_COUNT;
  const minHead = options.minHead ?? DEFAULT_MIN_HEAD;
  validate(p, sampleCount, minHead);

  return linspace(minHead, p.maxHead, sampleCount).map(head => ({
    head,
    discharge: computeDischarge(p.dischargeCoefficient, p.crestWidth, head, unit)
  }));
};

export const calculateWeirFlow = (
  p: WeirParams,
  unit: UnitSystem = 'SI',
  options: SamplingOptions = {}
): WeirFlowResult => {
  try {
    const curve = evaluateDischargeCurve(p, options, unit);
    const Q = curve[curve.length - 1].discharge;
    // Flow passes critical over a broad crest at 2/3 of the upstream head
    const yc = (2 / 3) * p.maxHead;

    return {
      curve,
      maxDischarge: Q,
      unitDischarge: Q / p.crestWidth,
      criticalDepth: yc,
      crestVelocity: Q / (p.crestWidth * yc),
    };
  } catch (e) {
    return {
      curve: [], maxDischarge: 0, unitDischarge: 0, criticalDepth: 0, crestVelocity: 0,
      error: e instanceof Error ? e.message : String(e)
    };
  }
};

// --- Units & Bounds ---

export const convertLength = (value: number, from: UnitSystem, to: UnitSystem): number => {
  if (from === to) return value;
  return to === 'Imperial' ? value * FT_PER_M : value / FT_PER_M;
};

// Cd is dimensionless and carries over as is
export const convertParams = (p: WeirParams, from: UnitSystem, to: UnitSystem): WeirParams => {
  if (from === to) return p;
  return {
    dischargeCoefficient: p.dischargeCoefficient,
    crestWidth: convertLength(p.crestWidth, from, to),
    maxHead: convertLength(p.maxHead, from, to),
  };
};

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

// Range inputs only rest on min + k * step; the readout must agree with the thumb
const snapToBounds = (value: number, { min, max, step }: ParamBounds): number => {
  const decimals = (String(step).split('.')[1] ?? '').length;
  const snapped = min + Math.round((clamp(value, min, max) - min) / step) * step;
  return Number(clamp(snapped, min, max).toFixed(decimals));
};

export const clampParams = (p: WeirParams, bounds: WeirParamBounds): WeirParams => ({
  dischargeCoefficient: snapToBounds(p.dischargeCoefficient, bounds.dischargeCoefficient),
  crestWidth: snapToBounds(p.crestWidth, bounds.crestWidth),
  maxHead: snapToBounds(p.maxHead, bounds.maxHead),
});

export const formatCurveTitle = (p: WeirParams, unit: UnitSystem): string => {
  const L = unit === 'SI' ? 'm' : 'ft';
  return `Weir discharge (b = ${p.crestWidth.toFixed(1)} ${L}, Cd = ${p.dischargeCoefficient.toFixed(2)})`;
};
