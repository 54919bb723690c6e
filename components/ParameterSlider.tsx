import React from 'react';
import type { ParamBounds } from '../types';

interface Props {
  label: string;
  value: number;
  bounds: ParamBounds;
  decimals: number;
  onChange: (value: number) => void;
}

const ParameterSlider: React.FC<Props> = ({ label, value, bounds, decimals, onChange }) => (
  <label className="block">
    <span className="text-sm font-medium text-slate-700 mb-1 flex justify-between">
      {label}
      <span className="font-mono text-slate-900">{value.toFixed(decimals)}</span>
    </span>
    <input
      type="range"
      aria-label={label}
      min={bounds.min}
      max={bounds.max}
      step={bounds.step}
      value={value}
      onChange={(e) => {
        const numVal = parseFloat(e.target.value);
        if (!isNaN(numVal)) onChange(numVal);
      }}
      className="w-full accent-sky-600"
    />
    <span className="flex justify-between text-[10px] text-slate-400">
      <span>{bounds.min}</span>
      <span>{bounds.max}</span>
    </span>
  </label>
);

export default ParameterSlider;
