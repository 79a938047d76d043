"use client";

import "leaflet/dist/leaflet.css";
import { useRef } from "react";
import type { Marker as LeafletMarker } from "leaflet";
import { MapContainer, Marker, TileLayer, useMapEvents } from "react-leaflet";
import { getMapSettings } from "@/lib/config/settings";
import { markerIcon } from "./marker-icon";

const PICKED_ZOOM = 13;

export interface LocationPickerProps {
  /** Current [lat, lng], or null when no location is set. */
  value: [number, number] | null;
  onPick: (latitude: number, longitude: number) => void;
  className?: string;
}

function ClickToPick({ onPick }: Pick<LocationPickerProps, "onPick">) {
  useMapEvents({
    click(event) {
      const { lat, lng } = event.latlng.wrap();
      onPick(lat, lng);
    },
  });
  return null;
}

export default function LocationPicker({ value, onPick, className }: LocationPickerProps) {
  const settings = getMapSettings();
  const markerRef = useRef<LeafletMarker>(null);

  return (
    <MapContainer
      center={value ?? settings.defaultCenter}
      zoom={value ? PICKED_ZOOM : settings.defaultZoom}
      scrollWheelZoom
      className={className ?? "h-full w-full"}
    >
      <TileLayer attribution={settings.attribution} url={settings.tileUrl} />
      <ClickToPick onPick={onPick} />
      {value && (
        <Marker
          ref={markerRef}
          position={value}
          icon={markerIcon}
          draggable
          eventHandlers={{
            dragend() {
              const marker = markerRef.current;
              if (!marker) return;
              const { lat, lng } = marker.getLatLng().wrap();
              onPick(lat, lng);
            },
          }}
        />
      )}
    </MapContainer>
  );
}
