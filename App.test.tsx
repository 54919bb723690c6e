// @vitest-environment jsdom
import React, { act } from 'react';
import { createRoot, type Root } from 'react-dom/client';
import { renderToStaticMarkup } from 'react-dom/server';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import App from './App';

declare global {
  // eslint-disable-next-line no-var
  var IS_REACT_ACT_ENVIRONMENT: boolean | undefined;
}
globalThis.IS_REACT_ACT_ENVIRONMENT = true;

let container: HTMLDivElement;
let root: Root;

beforeEach(() => {
  container = document.createElement('div');
  document.body.appendChild(container);
  root = createRoot(container);
  act(() => root.render(<App />));
});

afterEach(() => {
  act(() => root.unmount());
  container.remove();
});

const textOf = (testId: string) =>
  container.querySelector(`[data-testid="${testId}"]`)?.textContent ?? null;

// Controlled inputs only see a change when the value goes through the
// native setter before the input event fires
const setInput = (label: string, value: string) => {
  const input = container.querySelector<HTMLInputElement>(`input[aria-label="${label}"]`);
  if (!input) throw new Error(`No input labelled ${label}`);
  const setter = Object.getOwnPropertyDescriptor(HTMLInputElement.prototype, 'value')?.set;
  act(() => {
    setter?.call(input, value);
    input.dispatchEvent(new Event('input', { bubbles: true }));
  });
};

const setSelect = (label: string, value: string) => {
  const select = container.querySelector<HTMLSelectElement>(`select[aria-label="${label}"]`);
  if (!select) throw new Error(`No select labelled ${label}`);
  const setter = Object.getOwnPropertyDescriptor(HTMLSelectElement.prototype, 'value')?.set;
  act(() => {
    setter?.call(select, value);
    select.dispatchEvent(new Event('change', { bubbles: true }));
  });
};

const clickButton = (text: string) => {
  const button = Array.from(container.querySelectorAll('button')).find(b => b.textContent?.trim() === text);
  if (!button) throw new Error(`No button reading ${text}`);
  act(() => button.click());
};

describe('App – initial render', () => {
  it('shows the default curve title and discharge', () => {
    expect(textOf('curve-title')).toBe('Weir discharge (b = 2.0 m, Cd = 0.50)');
    expect(textOf('max-discharge')).toBe('4.429');
  });

  it('reports the probe discharge at H = 0.6 m', () => {
    expect(textOf('probe-discharge')).toBe('2.059');
  });

  it('has a curve on the very first paint, before any effect runs', () => {
    const html = renderToStaticMarkup(<App />);
    expect(html).toContain('<span data-testid="max-discharge">4.429</span>');
    expect(html).toContain('300 samples');
    expect(html).not.toContain('Calculation Error');
  });
});

describe('App – reactive recompute', () => {
  it('recomputes when the crest width changes', () => {
    setInput('Crest width b (m)', '3');
    expect(textOf('curve-title')).toBe('Weir discharge (b = 3.0 m, Cd = 0.50)');
    expect(textOf('max-discharge')).toBe('6.644');
  });

  it('recomputes when the coefficient changes', () => {
    setInput('Discharge coefficient Cd', '0.6');
    expect(textOf('curve-title')).toBe('Weir discharge (b = 2.0 m, Cd = 0.60)');
    expect(textOf('max-discharge')).toBe('5.315');
  });

  it('clamps a negative probe head up to the lower sampling bound', () => {
    setInput('Probe head', '-3');
    expect(textOf('probe-head')).toBe('0.010');
    expect(textOf('probe-discharge')).toBe('0.004');
  });

  it('treats an empty probe head as the lower sampling bound', () => {
    setInput('Probe head', '');
    expect(textOf('probe-head')).toBe('0.010');
  });

  it('clamps the probe to the new maximum head', () => {
    setInput('Maximum head H (m)', '0.5');
    expect(textOf('max-discharge')).toBe('1.566');
    expect(textOf('probe-discharge')).toBe('1.566');
  });
});

describe('App – settings', () => {
  it('converts parameters when switching to Imperial', () => {
    clickButton('Switch to Imperial');
    expect(textOf('curve-title')).toBe('Weir discharge (b = 6.5 ft, Cd = 0.50)');
    expect(container.querySelector<HTMLInputElement>('input[aria-label="Crest width b (ft)"]')?.value).toBe('6.5');
    expect(container.querySelector<HTMLInputElement>('input[aria-label="Maximum head H (ft)"]')?.value).toBe('3.25');
  });

  it('resets to the defaults of the current unit system', () => {
    clickButton('Switch to Imperial');
    setInput('Discharge coefficient Cd', '0.7');
    clickButton('Reset');
    expect(textOf('curve-title')).toBe('Weir discharge (b = 6.5 ft, Cd = 0.50)');
    expect(container.querySelector<HTMLInputElement>('input[aria-label="Maximum head H (ft)"]')?.value).toBe('3');
  });

  it('resamples the curve when the resolution changes', () => {
    expect(textOf('sample-count')).toBe('300 samples');
    clickButton('Settings');
    setSelect('Curve resolution', '100');
    clickButton('Calculator');
    expect(textOf('sample-count')).toBe('100 samples');
  });

  it('hides the summary cards in Simple mode', () => {
    clickButton('Settings');
    clickButton('Simple');
    clickButton('Calculator');
    expect(textOf('curve-title')).toBe('Weir discharge (b = 2.0 m, Cd = 0.50)');
    expect(textOf('max-discharge')).toBeNull();
    expect(textOf('probe-discharge')).toBeNull();
  });
});
