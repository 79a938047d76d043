"use client";

import { useState, useCallback, useEffect } from "react";
import type { LocationFeatureCollection } from "@/lib/types/ui";

export interface UseLocationsResult {
  data: LocationFeatureCollection | null;
  loading: boolean;
  error: string | null;
  refetch: () => Promise<void>;
}

export function useLocations(): UseLocationsResult {
  const [data, setData] = useState<LocationFeatureCollection | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const refetch = useCallback(async () => {
    setLoading(true);
    setError(null);
    try {
      const res = await fetch("/map/api/locations", { cache: "no-store" });
      if (!res.ok) {
        setError(res.status === 403 ? "Sign in to see the map" : "Failed to load locations");
        setData(null);
        return;
      }
      const collection: LocationFeatureCollection = await res.json();
      setData(collection);
    } catch {
      setError("Failed to load locations");
      setData(null);
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    void refetch();
  }, [refetch]);

  return { data, loading, error, refetch };
}
