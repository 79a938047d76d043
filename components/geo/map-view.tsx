"use client";

import { MapPin } from "lucide-react";
import { useLocations } from "@/lib/hooks";
import { LocationsMapLoader } from "./locations-map-loader";
import { MapErrorBoundary } from "./map-error-boundary";
import { MapSkeleton } from "./map-skeleton";

/** Full-screen map of every location the caller may see. */
export function MapView() {
  const { data, loading, error, refetch } = useLocations();

  if (error) {
    return (
      <div role="alert" className="flex flex-col items-center justify-center gap-3 py-24 text-center">
        <p className="text-sm text-destructive">{error}</p>
        <button
          type="button"
          onClick={() => void refetch()}
          className="rounded border border-border px-3 py-1.5 text-xs hover:bg-secondary"
        >
          Retry
        </button>
      </div>
    );
  }

  if (loading || !data) return <MapSkeleton />;

  return (
    <div className="relative h-full w-full">
      <MapErrorBoundary onRetry={() => void refetch()}>
        <LocationsMapLoader features={data.features} />
      </MapErrorBoundary>
      <div className="absolute bottom-4 left-4 z-[1000] flex items-center gap-1.5 rounded bg-background/90 px-2 py-1 text-xs shadow">
        <MapPin className="h-3 w-3" />
        {data.features.length === 1 ? "1 location" : `${data.features.length} locations`}
      </div>
    </div>
  );
}
