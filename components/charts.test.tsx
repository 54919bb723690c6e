// @vitest-environment jsdom
import React, { act } from 'react';
import { createRoot, type Root } from 'react-dom/client';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import DischargeChart from './DischargeChart';
import WeirVisualizer from './WeirVisualizer';
import { evaluateDischargeCurve } from '../utils/calculations';

declare global {
  // eslint-disable-next-line no-var
  var IS_REACT_ACT_ENVIRONMENT: boolean | undefined;
}
globalThis.IS_REACT_ACT_ENVIRONMENT = true;

// jsdom ships no 2-D context; record the drawing calls instead
const CONTEXT_METHODS = [
  'clearRect', 'beginPath', 'closePath', 'moveTo', 'lineTo', 'arc', 'stroke', 'fill',
  'fillRect', 'strokeRect', 'fillText', 'setLineDash', 'save', 'restore', 'translate', 'rotate',
];

let calls: { name: string; args: unknown[] }[];
let originalGetContext: PropertyDescriptor | undefined;
let container: HTMLDivElement;
let root: Root;

beforeEach(() => {
  calls = [];
  const recorder: Record<string, unknown> = {};
  CONTEXT_METHODS.forEach(name => {
    recorder[name] = (...args: unknown[]) => { calls.push({ name, args }); };
  });
  originalGetContext = Object.getOwnPropertyDescriptor(HTMLCanvasElement.prototype, 'getContext');
  Object.defineProperty(HTMLCanvasElement.prototype, 'getContext', {
    configurable: true,
    value: () => recorder,
  });

  container = document.createElement('div');
  document.body.appendChild(container);
  root = createRoot(container);
});

afterEach(() => {
  act(() => root.unmount());
  container.remove();
  if (originalGetContext) {
    Object.defineProperty(HTMLCanvasElement.prototype, 'getContext', originalGetContext);
  }
});

const textsDrawn = () => calls.filter(c => c.name === 'fillText').map(c => c.args[0]);
const countOf = (name: string) => calls.filter(c => c.name === name).length;

describe('DischargeChart', () => {
  const data = evaluateDischargeCurve({ dischargeCoefficient: 0.5, crestWidth: 2.0, maxHead: 1.0 }, { sampleCount: 10 });

  it('draws the title and both axis labels', () => {
    act(() => root.render(
      <DischargeChart
        data={data}
        title="Weir discharge (b = 2.0 m, Cd = 0.50)"
        xLabel="Head (m)"
        yLabel="Discharge (m³/s)"
        color="#0ea5e9"
      />
    ));
    const texts = textsDrawn();
    expect(texts).toContain('Weir discharge (b = 2.0 m, Cd = 0.50)');
    expect(texts).toContain('Head (m)');
    expect(texts).toContain('Discharge (m³/s)');
  });

  it('labels the head axis from zero to H max', () => {
    act(() => root.render(<DischargeChart data={data} title="t" xLabel="x" yLabel="y" color="#0ea5e9" />));
    const texts = textsDrawn();
    expect(texts).toContain('0.00');
    expect(texts).toContain('1.00');
  });

  it('traces one segment per sample after the first', () => {
    act(() => root.render(<DischargeChart data={data} title="t" xLabel="x" yLabel="y" color="#0ea5e9" />));
    // 9 curve segments, 2 closing the fill, 12 grid lines
    expect(countOf('lineTo')).toBe(9 + 2 + 12);
    expect(countOf('arc')).toBe(0);
  });

  it('marks the probe point', () => {
    act(() => root.render(
      <DischargeChart data={data} title="t" xLabel="x" yLabel="y" color="#0ea5e9" marker={data[4]} />
    ));
    expect(countOf('arc')).toBe(1);
  });

  it('draws nothing for an empty curve', () => {
    act(() => root.render(<DischargeChart data={[]} title="t" xLabel="x" yLabel="y" color="#0ea5e9" />));
    expect(calls).toEqual([]);
  });
});

describe('WeirVisualizer', () => {
  it('labels the head and the critical depth', () => {
    act(() => root.render(<WeirVisualizer head={1.0} criticalDepth={2 / 3} maxHeadBound={2.0} unitLabel="m" />));
    expect(textsDrawn()).toEqual(['H = 1.000 m', 'yc = 0.667 m']);
  });

  it('draws only the weir and bed when there is no head', () => {
    act(() => root.render(<WeirVisualizer head={0} criticalDepth={0} maxHeadBound={2.0} unitLabel="ft" />));
    expect(textsDrawn()).toEqual([]);
    expect(countOf('strokeRect')).toBe(1);
  });
});
