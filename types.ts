export type UnitSystem = 'SI' | 'Imperial';

export interface WeirParams {
  dischargeCoefficient: number; // Cd
  crestWidth: number; // b
  maxHead: number; // H_max
}

export interface DischargePoint {
  head: number; // H
  discharge: number; // Q
}

export interface SamplingOptions {
  sampleCount?: number;
  minHead?: number;
}

export interface WeirFlowResult {
  curve: DischargePoint[];
  maxDischarge: number; // Q at H_max
  unitDischarge: number; // q = Q / b
  criticalDepth: number; // yc over the crest
  crestVelocity: number; // Vc
  error?: string;
}

export interface ParamBounds {
  min: number;
  max: number;
  step: number;
}

export type WeirParamBounds = Record<keyof WeirParams, ParamBounds>;

export const DEFAULT_PARAMS: Record<UnitSystem, WeirParams> = {
  SI: { dischargeCoefficient: 0.5, crestWidth: 2.0, maxHead: 1.0 },
  Imperial: { dischargeCoefficient: 0.5, crestWidth: 6.5, maxHead: 3.0 },
};

// Slider ranges. The evaluator does not enforce these.
export const PARAM_BOUNDS: Record<UnitSystem, WeirParamBounds> = {
  SI: {
    dischargeCoefficient: { min: 0.4, max: 0.7, step: 0.01 },
    crestWidth: { min: 0.1, max: 5.0, step: 0.1 },
    maxHead: { min: 0.1, max: 2.0, step: 0.05 },
  },
  Imperial: {
    dischargeCoefficient: { min: 0.4, max: 0.7, step: 0.01 },
    crestWidth: { min: 0.5, max: 16.5, step: 0.5 },
    maxHead: { min: 0.5, max: 6.5, step: 0.25 },
  },
};

export const SAMPLE_COUNT_OPTIONS = [100, 300, 600] as const;
