"use client";

import type { ReactNode } from "react";
import { Map, RefreshCw } from "lucide-react";
import { ErrorBoundary } from "@/components/error-boundary";

interface MapErrorBoundaryProps {
  children: ReactNode;
  onRetry?: () => void;
}

/** Keeps a Leaflet failure (tiles, markers, popups) inside the map frame. */
export function MapErrorBoundary({ children, onRetry }: MapErrorBoundaryProps) {
  return (
    <ErrorBoundary
      name="MapErrorBoundary"
      onReset={onRetry}
      renderFallback={(error, reset) => (
        <div role="alert" className="flex h-full flex-col items-center justify-center gap-3 bg-secondary/40 p-6">
          <Map className="h-8 w-8 text-muted-foreground" />
          <p className="text-sm font-semibold">Map failed to load</p>
          <p className="text-xs text-muted-foreground">{error.message || "The map could not be displayed."}</p>
          <button
            type="button"
            onClick={reset}
            className="inline-flex items-center gap-1.5 rounded border border-border px-3 py-1.5 text-xs hover:bg-secondary"
          >
            <RefreshCw className="h-3.5 w-3.5" />
            Reload map
          </button>
        </div>
      )}
    >
      {children}
    </ErrorBoundary>
  );
}
