import React, { Component } from 'react';
import type { ReactNode } from 'react';

interface ErrorBoundaryState { error: Error | null }

class ErrorBoundary extends Component<{ children: ReactNode }, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null };
  static getDerivedStateFromError(error: Error) { return { error }; }
  render() {
    if (this.state.error) {
      return (
        <div className="max-w-xl mx-auto px-4 py-8 font-sans">
          <h2 className="text-rose-700 font-bold mb-3">Something went wrong</h2>
          <p className="text-slate-600 mb-4">Reload the page to start again.</p>
          <button
            onClick={() => window.location.reload()}
            className="px-5 py-2 bg-sky-600 text-white rounded-lg text-sm font-medium"
          >
            Reload
          </button>
          <pre data-testid="boundary-error" className="mt-6 p-3 bg-rose-50 border border-rose-200 rounded text-xs text-rose-700 whitespace-pre-wrap">
            {this.state.error.message}
          </pre>
        </div>
      );
    }
    return this.props.children;
  }
}

export default ErrorBoundary;
