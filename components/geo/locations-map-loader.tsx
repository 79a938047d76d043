"use client";

import dynamic from "next/dynamic";
import { MapSkeleton } from "./map-skeleton";

/** Leaflet touches window on import, so the map only renders in the browser. */
export const LocationsMapLoader = dynamic(() => import("./locations-map"), {
  ssr: false,
  loading: () => <MapSkeleton />,
});

export const LocationPickerLoader = dynamic(() => import("./location-picker"), {
  ssr: false,
  loading: () => <MapSkeleton />,
});
