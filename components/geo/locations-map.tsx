"use client";

import "leaflet/dist/leaflet.css";
import { useEffect } from "react";
import L from "leaflet";
import { MapContainer, Marker, Popup, TileLayer, useMap } from "react-leaflet";
import type { LocationFeature } from "@/lib/types/ui";
import { getMapSettings } from "@/lib/config/settings";
import { toLatLngTuple } from "@/lib/geo/point";
import { markerIcon } from "./marker-icon";

const SINGLE_MARKER_ZOOM = 13;

function FitToFeatures({ features }: { features: LocationFeature[] }) {
  const map = useMap();

  useEffect(() => {
    if (features.length === 0) return;
    if (features.length === 1) {
      map.setView(toLatLngTuple(features[0].geometry), SINGLE_MARKER_ZOOM);
      return;
    }
    const bounds = L.latLngBounds(features.map((f) => toLatLngTuple(f.geometry)));
    map.fitBounds(bounds, { padding: [32, 32] });
  }, [features, map]);

  return null;
}

export interface LocationsMapProps {
  features: LocationFeature[];
  className?: string;
}

export default function LocationsMap({ features, className }: LocationsMapProps) {
  const settings = getMapSettings();

  return (
    <MapContainer
      center={settings.defaultCenter}
      zoom={settings.defaultZoom}
      scrollWheelZoom
      className={className ?? "h-full w-full"}
    >
      <TileLayer attribution={settings.attribution} url={settings.tileUrl} />
      <FitToFeatures features={features} />
      {features.map((feature) => (
        <Marker
          key={feature.properties.id}
          position={toLatLngTuple(feature.geometry)}
          icon={markerIcon}
        >
          <Popup>
            <div className="space-y-1">
              <a href={`/profile/${encodeURIComponent(feature.properties.username)}`} className="font-semibold">
                {feature.properties.username}
              </a>
              {feature.properties.full_name !== feature.properties.username && (
                <div>{feature.properties.full_name}</div>
              )}
              {feature.properties.home_address && (
                <div className="text-xs text-muted-foreground whitespace-pre-line">
                  {feature.properties.home_address}
                </div>
              )}
            </div>
          </Popup>
        </Marker>
      ))}
    </MapContainer>
  );
}
