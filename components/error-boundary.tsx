"use client";

import React, { Component, type ReactNode } from "react";
import { AlertCircle, RefreshCw } from "lucide-react";

export type ErrorFallback = (error: Error, reset: () => void) => ReactNode;

interface ErrorBoundaryProps {
  children: ReactNode;
  /** Replaces the default panel. */
  renderFallback?: ErrorFallback;
  /** Label used in the console when a render throws. */
  name?: string;
  /** Called after the boundary resets itself. */
  onReset?: () => void;
}

interface ErrorBoundaryState {
  error: Error | null;
}

export class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null };

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo): void {
    console.error(`[${this.props.name ?? "ErrorBoundary"}]`, error, errorInfo.componentStack);
  }

  reset = (): void => {
    this.setState({ error: null });
    this.props.onReset?.();
  };

  render(): ReactNode {
    const { error } = this.state;
    if (!error) return this.props.children;
    if (this.props.renderFallback) return this.props.renderFallback(error, this.reset);

    return (
      <div role="alert" className="mx-auto flex max-w-sm flex-col items-center gap-3 p-8 text-center">
        <AlertCircle className="h-8 w-8 text-destructive" />
        <p className="text-sm font-semibold">Something went wrong</p>
        <p className="text-xs text-muted-foreground">{error.message || "Unexpected error."}</p>
        <button
          type="button"
          onClick={this.reset}
          className="inline-flex items-center gap-1.5 rounded border border-border px-3 py-1.5 text-xs hover:bg-secondary"
        >
          <RefreshCw className="h-3.5 w-3.5" />
          Try again
        </button>
      </div>
    );
  }
}
