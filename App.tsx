import React, { useState, useMemo } from 'react';
import {
  Calculator,
  Droplets,
  Settings as SettingsIcon,
  Activity,
  Waves,
  Ruler,
  RotateCcw,
  Zap,
  ArrowRightLeft,
  SlidersHorizontal
} from 'lucide-react';
import {
  type WeirParams,
  type WeirFlowResult,
  type DischargePoint,
  type UnitSystem,
  DEFAULT_PARAMS,
  PARAM_BOUNDS,
  SAMPLE_COUNT_OPTIONS
} from './types';
import {
  calculateWeirFlow,
  computeDischarge,
  convertLength,
  convertParams,
  clampParams,
  formatCurveTitle,
  DEFAULT_MIN_HEAD,
  DEFAULT_SAMPLE_COUNT
} from './utils/calculations';
import DischargeChart from './components/DischargeChart';
import ParameterSlider from './components/ParameterSlider';
import WeirVisualizer from './components/WeirVisualizer';

type AppView = 'Calculator' | 'Settings';
type ViewMode = 'Simple' | 'Advanced';

const App: React.FC = () => {
  // Navigation & App State
  const [currentView, setCurrentView] = useState<AppView>('Calculator');
  const [viewMode, setViewMode] = useState<ViewMode>('Advanced');
  const [unit, setUnit] = useState<UnitSystem>('SI');
  const [sampleCount, setSampleCount] = useState<number>(DEFAULT_SAMPLE_COUNT);

  // Calculator State
  const [params, setParams] = useState<WeirParams>(DEFAULT_PARAMS.SI);

  // Probe State
  const [probeHead, setProbeHead] = useState<number>(0.6);

  const switchUnit = (next: UnitSystem) => {
    if (next === unit) return;
    setParams(clampParams(convertParams(params, unit, next), PARAM_BOUNDS[next]));
    setProbeHead(convertLength(probeHead, unit, next));
    setUnit(next);
  };

  const handleChange = (field: keyof WeirParams, value: number) => {
    setParams(prev => ({ ...prev, [field]: value }));
  };

  const resetParams = () => {
    setParams(DEFAULT_PARAMS[unit]);
    setProbeHead(DEFAULT_PARAMS[unit].maxHead * 0.6);
  };

  // Derived during render so the first paint already has a curve
  const result = useMemo<WeirFlowResult>(
    () => calculateWeirFlow(params, unit, { sampleCount }),
    [params, unit, sampleCount]
  );

  const probe = useMemo<DischargePoint | null>(() => {
    if (result.error) return null;
    const head = Math.min(Math.max(probeHead, DEFAULT_MIN_HEAD), params.maxHead);
    return {
      head,
      discharge: computeDischarge(params.dischargeCoefficient, params.crestWidth, head, unit)
    };
  }, [params, unit, probeHead, result]);

  // Labels
  const U = {
    L: unit === 'SI' ? 'm' : 'ft',
    Q: unit === 'SI' ? 'm³/s' : 'ft³/s',
    q: unit === 'SI' ? 'm²/s' : 'ft²/s',
    V: unit === 'SI' ? 'm/s' : 'ft/s',
  };

  const bounds = PARAM_BOUNDS[unit];
  const title = formatCurveTitle(params, unit);

  // --- VIEWS ---

  const CalculatorView = () => (
    <div className="grid grid-cols-1 xl:grid-cols-12 gap-6">
      {/* INPUTS */}
      <div className="xl:col-span-4 space-y-6">
        <div className="bg-white rounded-xl shadow-sm border border-slate-200 overflow-hidden">
          <div className="px-6 py-4 border-b border-slate-100 bg-slate-50/50 flex items-center justify-between">
            <h2 className="font-semibold text-slate-800 flex items-center gap-2">
              <SlidersHorizontal className="w-4 h-4 text-slate-400" />
              Parameters ({unit})
            </h2>
            <button
              type="button"
              onClick={resetParams}
              className="flex items-center gap-1 px-2 py-1 text-xs font-medium text-slate-500 hover:text-slate-800 rounded-md hover:bg-slate-100"
            >
              <RotateCcw className="w-3 h-3" />
              Reset
            </button>
          </div>

          <div className="p-6 space-y-5">
            <ParameterSlider
              label="Discharge coefficient Cd"
              value={params.dischargeCoefficient}
              bounds={bounds.dischargeCoefficient}
              decimals={2}
              onChange={(v) => handleChange('dischargeCoefficient', v)}
            />
            <ParameterSlider
              label={`Crest width b (${U.L})`}
              value={params.crestWidth}
              bounds={bounds.crestWidth}
              decimals={2}
              onChange={(v) => handleChange('crestWidth', v)}
            />
            <ParameterSlider
              label={`Maximum head H (${U.L})`}
              value={params.maxHead}
              bounds={bounds.maxHead}
              decimals={2}
              onChange={(v) => handleChange('maxHead', v)}
            />
          </div>
        </div>

        {/* Probe - ADVANCED ONLY */}
        {viewMode === 'Advanced' && (
          <div className="bg-white rounded-xl shadow-sm border border-slate-200 overflow-hidden">
            <div className="px-6 py-4 border-b border-slate-100 bg-slate-50/50">
              <h2 className="font-semibold text-slate-800 flex items-center gap-2">
                <Ruler className="w-4 h-4 text-slate-400" />
                Probe Head
              </h2>
            </div>
            <div className="p-6 space-y-4">
              <label className="block">
                <span className="text-xs font-medium text-slate-500 uppercase mb-1 block">Head H ({U.L})</span>
                <input
                  type="number"
                  aria-label="Probe head"
                  step="0.01"
                  value={probeHead}
                  onChange={(e) => setProbeHead(parseFloat(e.target.value) || 0)}
                  className="w-full bg-white text-slate-900 rounded-md border-slate-300 shadow-sm focus:border-sky-500 focus:ring-sky-500 sm:text-sm p-2 border"
                />
              </label>
              {probe && (
                <p className="text-sm text-slate-600">
                  Q at H = <span data-testid="probe-head">{probe.head.toFixed(3)}</span> {U.L}:{' '}
                  <span data-testid="probe-discharge" className="font-mono font-bold text-slate-900">{probe.discharge.toFixed(3)}</span> {U.Q}
                </p>
              )}
            </div>
          </div>
        )}
      </div>

      {/* RESULTS */}
      <div className="xl:col-span-8 space-y-6">

        <div className="bg-white rounded-xl shadow-sm border border-slate-200 p-1 overflow-hidden h-[460px] flex flex-col">
          <div className="px-5 py-3 flex items-center justify-between bg-white border-b border-slate-100">
            <h2 data-testid="curve-title" className="font-semibold text-slate-800 flex items-center gap-2">
              {title}
            </h2>
            <span data-testid="sample-count" className="text-xs font-medium text-slate-400">{result.curve.length} samples</span>
          </div>
          <div className="flex-1 bg-slate-50 relative flex items-center justify-center">
            {!result.error && (
              <DischargeChart
                data={result.curve}
                title={title}
                xLabel={`Head (${U.L})`}
                yLabel={`Discharge (${U.Q})`}
                color="#0ea5e9"
                marker={viewMode === 'Advanced' && probe ? probe : undefined}
              />
            )}
          </div>
        </div>

        {!result.error ? (
          viewMode === 'Advanced' && (
            <>
              <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
                <div className="bg-white p-5 rounded-xl shadow-sm border border-slate-200 relative overflow-hidden group md:col-span-1">
                  <div className="absolute top-0 right-0 p-4 opacity-5 group-hover:opacity-10 transition-opacity">
                    <Activity className="w-16 h-16 text-sky-600" />
                  </div>
                  <p className="text-sm text-slate-500 font-medium mb-1">Discharge at H max</p>
                  <div className="text-2xl font-bold text-slate-900">
                    <span data-testid="max-discharge">{result.maxDischarge.toFixed(3)}</span>{' '}
                    <span className="text-sm font-normal text-slate-400">{U.Q}</span>
                  </div>
                </div>

                <div className="bg-white p-5 rounded-xl shadow-sm border border-slate-200 flex flex-col justify-center md:col-span-2">
                  <div className="grid grid-cols-3 gap-4 text-center">
                    <div>
                      <p className="text-xs text-slate-400 uppercase tracking-wide font-semibold mb-1">Unit Discharge</p>
                      <p className="text-xl font-bold text-sky-600">{result.unitDischarge.toFixed(3)} <span className="text-sm font-normal text-slate-400">{U.q}</span></p>
                    </div>
                    <div>
                      <p className="text-xs text-slate-400 uppercase tracking-wide font-semibold mb-1">Critical Depth</p>
                      <p className="text-xl font-bold text-slate-800">{result.criticalDepth.toFixed(3)} <span className="text-sm font-normal text-slate-400">{U.L}</span></p>
                    </div>
                    <div>
                      <p className="text-xs text-slate-400 uppercase tracking-wide font-semibold mb-1">Crest Velocity</p>
                      <p className="text-xl font-bold text-slate-800">{result.crestVelocity.toFixed(2)} <span className="text-sm font-normal text-slate-400">{U.V}</span></p>
                    </div>
                  </div>
                </div>
              </div>

              <div className="bg-white rounded-xl shadow-sm border border-slate-200 p-1 overflow-hidden h-[320px] flex flex-col">
                <div className="px-5 py-3 flex items-center justify-between bg-white border-b border-slate-100">
                  <h2 className="font-semibold text-slate-800 flex items-center gap-2">
                    <Droplets className="w-4 h-4 text-sky-500" />
                    Weir Elevation
                  </h2>
                  <span className="text-[10px] text-slate-400 flex items-center gap-1">
                    <Zap className="w-3 h-3 text-amber-500" />
                    Q = Cd · b · H · √(2gH)
                  </span>
                </div>
                <div className="flex-1 bg-slate-50 relative flex items-center justify-center">
                  <WeirVisualizer
                    head={params.maxHead}
                    criticalDepth={result.criticalDepth}
                    maxHeadBound={bounds.maxHead.max}
                    unitLabel={U.L}
                  />
                </div>
              </div>
            </>
          )
        ) : (
          <div className="bg-rose-50 border border-rose-200 rounded-xl p-6 text-center text-rose-800">
            <h3 className="font-bold mb-1">Calculation Error</h3>
            <p data-testid="calculation-error" className="text-sm">{result.error}</p>
          </div>
        )}
      </div>
    </div>
  );

  const SettingsView = () => (
    <div className="max-w-2xl mx-auto bg-white rounded-xl shadow-sm border border-slate-200 overflow-hidden">
      <div className="px-8 py-6 border-b border-slate-100 bg-slate-50/50">
        <h2 className="text-2xl font-bold text-slate-800 flex items-center gap-2">
          <SettingsIcon className="w-6 h-6 text-slate-600" />
          Settings
        </h2>
      </div>
      <div className="p-8 space-y-6">
        <div className="flex items-center justify-between pb-6 border-b border-slate-100">
          <div>
            <h3 className="text-lg font-medium text-slate-900">Interface Mode</h3>
            <p className="text-sm text-slate-500">Simple shows the curve only.</p>
          </div>
          <div className="flex items-center bg-slate-100 rounded-lg p-1">
            {(['Simple', 'Advanced'] as const).map(mode => (
              <button
                key={mode}
                onClick={() => setViewMode(mode)}
                className={`px-4 py-2 text-sm font-medium rounded-md transition-all ${viewMode === mode ? 'bg-white text-slate-900 shadow-sm' : 'text-slate-500 hover:text-slate-700'}`}
              >
                {mode}
              </button>
            ))}
          </div>
        </div>

        <div className="flex items-center justify-between pb-6 border-b border-slate-100">
          <div>
            <h3 className="text-lg font-medium text-slate-900">Unit System</h3>
            <p className="text-sm text-slate-500">Switch between SI (Metric) and Imperial units.</p>
          </div>
          <button
            onClick={() => switchUnit(unit === 'SI' ? 'Imperial' : 'SI')}
            className="flex items-center gap-2 px-4 py-2 bg-white border border-slate-300 rounded-lg text-sm font-medium text-slate-700 hover:bg-slate-50 active:bg-slate-100 transition-colors"
          >
            <ArrowRightLeft className="w-4 h-4" />
            Currently: {unit}
          </button>
        </div>

        <div className="flex items-center justify-between">
          <div>
            <h3 className="text-lg font-medium text-slate-900">Curve Resolution</h3>
            <p className="text-sm text-slate-500">Number of head samples between {DEFAULT_MIN_HEAD} {U.L} and H max.</p>
          </div>
          <select
            aria-label="Curve resolution"
            value={sampleCount}
            onChange={(e) => setSampleCount(parseInt(e.target.value, 10))}
            className="bg-white border border-slate-300 rounded-lg text-sm p-2"
          >
            {SAMPLE_COUNT_OPTIONS.map(n => (
              <option key={n} value={n}>{n}</option>
            ))}
          </select>
        </div>
      </div>
    </div>
  );

  return (
    <div className="min-h-screen flex flex-col md:flex-row bg-slate-100 text-slate-900 font-sans">

      {/* Sidebar */}
      <aside className="w-full md:w-72 bg-white border-r border-slate-200 flex-shrink-0 flex flex-col z-10 shadow-[4px_0_24px_rgba(0,0,0,0.02)]">
        <div className="p-6 border-b border-slate-100">
          <div className="flex items-center gap-2 text-sky-600">
            <Waves className="w-8 h-8" />
            <span className="text-2xl font-bold tracking-tight">Weir Lab</span>
          </div>
          <p className="text-xs text-slate-400 mt-1">Broad-Crested Weir Discharge</p>
        </div>

        <nav className="flex-1 p-4 space-y-1 overflow-y-auto">
          <button
            onClick={() => setCurrentView('Calculator')}
            className={`w-full flex items-center gap-3 px-3 py-2.5 rounded-lg text-sm font-medium transition-all
              ${currentView === 'Calculator' ? 'bg-slate-100 text-slate-900' : 'text-slate-600 hover:bg-slate-50'}`}
          >
            <Calculator className="w-4 h-4" />
            Calculator
          </button>
          <button
            onClick={() => setCurrentView('Settings')}
            className={`w-full flex items-center gap-3 px-3 py-2.5 rounded-lg text-sm font-medium transition-all
              ${currentView === 'Settings' ? 'bg-slate-100 text-slate-900' : 'text-slate-600 hover:bg-slate-50'}`}
          >
            <SettingsIcon className="w-4 h-4" />
            Settings
          </button>
        </nav>

        <div className="p-4 border-t border-slate-100 bg-slate-50">
          <button
            onClick={() => switchUnit(unit === 'SI' ? 'Imperial' : 'SI')}
            className="w-full flex items-center justify-center gap-2 px-3 py-2 bg-white border border-slate-200 hover:bg-slate-50 rounded-md text-xs font-semibold text-slate-600 transition-colors"
          >
            <ArrowRightLeft className="w-3 h-3" />
            Switch to {unit === 'SI' ? 'Imperial' : 'Metric'}
          </button>
        </div>
      </aside>

      {/* Main Content */}
      <main className="flex-1 overflow-y-auto h-screen p-4 md:p-8 scroll-smooth">
        <div className="max-w-7xl mx-auto">
          {/* Called, not mounted, so sliders keep their element across renders */}
          {currentView === 'Calculator' && CalculatorView()}
          {currentView === 'Settings' && SettingsView()}
        </div>
      </main>
    </div>
  );
};

export default App;
