import { CircleMarker, MapContainer, Popup, TileLayer } from "react-leaflet";
import type { LatLngBoundsExpression } from "leaflet";
import "leaflet/dist/leaflet.css";
import { LEGEND, PALETTE, type MarkerSet } from "../lib/markers";

const SOUTH_AFRICA: LatLngBoundsExpression = [
  [-35, 16.5],
  [-22, 33],
];

export default function DamMap({ markers, skipped }: MarkerSet) {
  return (
    <div className="space-y-3">
      <div className="h-[500px] overflow-hidden rounded-2xl border border-gray-100 shadow-sm">
        <MapContainer bounds={SOUTH_AFRICA} scrollWheelZoom className="h-full w-full">
          <TileLayer
            attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors'
            url="https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png"
          />
          {markers.map((m, i) => (
            <CircleMarker
              key={`${m.label}-${i}`}
              center={m.position}
              radius={m.size}
              pathOptions={{ color: m.color, fillColor: m.color, fillOpacity: 0.8, weight: 1 }}
            >
              <Popup>
                <b>{m.label}</b>
                {m.details.map(d => (
                  <div key={d}>{d}</div>
                ))}
              </Popup>
            </CircleMarker>
          ))}
        </MapContainer>
      </div>

      {skipped > 0 && (
        <p className="rounded-xl border border-amber-100 bg-amber-50 px-3 py-2 text-xs text-amber-700">
          ⚠️ {skipped} dam{skipped !== 1 ? "s" : ""} missing location data
        </p>
      )}

      <div className="rounded-2xl border border-gray-100 bg-white p-4 shadow-sm">
        <p className="text-xs font-bold text-gray-700">Map Legend</p>
        <ul className="mt-2 flex flex-wrap gap-x-4 gap-y-1">
          {LEGEND.map(l => (
            <li key={l.bucket} className="flex items-center gap-1.5 text-xs text-gray-600">
              <span className="h-2.5 w-2.5 rounded-full border border-gray-300" style={{ backgroundColor: PALETTE[l.bucket] }} />
              {l.label}
            </li>
          ))}
        </ul>
        <p className="mt-2 text-[11px] italic text-gray-400">Dot size represents dam storage capacity</p>
      </div>
    </div>
  );
}
