import L from "leaflet";

// Leaflet's default icon images do not survive bundling; draw a pin instead.
export const markerIcon = L.icon({
  iconUrl: `data:image/svg+xml;charset=utf-8,${encodeURIComponent(
    `<svg xmlns="http://www.w3.org/2000/svg" width="30" height="45" viewBox="0 0 30 45">
      <path d="M15 0C6.7 0 0 6.7 0 15c0 12 15 30 15 30s15-18 15-30C30 6.7 23.3 0 15 0z" fill="#2563EB" />
      <circle cx="15" cy="15" r="5.5" fill="#ffffff" fill-opacity="0.85" />
    </svg>`.trim()
  )}`,
  iconSize: [30, 45],
  iconAnchor: [15, 44],
  popupAnchor: [0, -36],
});
