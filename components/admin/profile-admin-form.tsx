"use client";

import { useState, type FormEvent } from "react";
import { useRouter } from "next/navigation";
import { toast } from "sonner";
import { isApiError } from "@/lib/api/error-types";
import { latitudeSchema, longitudeSchema, type GeoPoint } from "@/lib/schemas";
import { latitudeOf, longitudeOf } from "@/lib/geo/point";
import { LocationPickerLoader } from "@/components/geo/locations-map-loader";
import { MapErrorBoundary } from "@/components/geo/map-error-boundary";
import type { ProfileRepresentation } from "@/lib/types/ui";

export interface AdminFormState {
  home_address: string;
  phone_number: string;
  latitude: string;
  longitude: string;
}

export interface AdminPatchBody {
  home_address: string | null;
  phone_number: string | null;
  location: GeoPoint | null;
}

export type AdminFormResult =
  | { ok: true; body: AdminPatchBody }
  | { ok: false; errors: Record<string, string[]> };

const COORDINATE_DIGITS = 6;

function initialState(profile: ProfileRepresentation): AdminFormState {
  const { location } = profile;
  return {
    home_address: profile.home_address ?? "",
    phone_number: profile.phone_number ?? "",
    latitude: location ? String(latitudeOf(location)) : "",
    longitude: location ? String(longitudeOf(location)) : "",
  };
}

/**
 * Body for PATCH /api/admin/profiles/:id. Blank text is stored as null and
 * blank coordinates clear the location; a half-filled pair is an error.
 */
export function toAdminPatchBody(state: AdminFormState): AdminFormResult {
  const lat = state.latitude.trim();
  const lng = state.longitude.trim();
  const errors: Record<string, string[]> = {};
  let location: GeoPoint | null = null;

  if (lat !== "" || lng !== "") {
    const latitude = latitudeSchema.safeParse(lat === "" ? NaN : Number(lat));
    const longitude = longitudeSchema.safeParse(lng === "" ? NaN : Number(lng));
    if (!latitude.success) errors.latitude = ["Enter a latitude between -90 and 90."];
    if (!longitude.success) errors.longitude = ["Enter a longitude between -180 and 180."];
    if (latitude.success && longitude.success) {
      location = { type: "Point", coordinates: [longitude.data, latitude.data] };
    }
  }

  if (Object.keys(errors).length > 0) return { ok: false, errors };
  return {
    ok: true,
    body: {
      home_address: state.home_address.trim() || null,
      phone_number: state.phone_number.trim() || null,
      location,
    },
  };
}

/** Server details for location.coordinates.N land under the matching input. */
function fieldErrors(details: Record<string, string[]>): Record<string, string[]> {
  const mapped: Record<string, string[]> = {};
  for (const [key, messages] of Object.entries(details)) {
    const field =
      key === "location.coordinates.0" ? "longitude"
      : key === "location.coordinates.1" ? "latitude"
      : key;
    (mapped[field] ??= []).push(...messages);
  }
  return mapped;
}

function formatTimestamp(iso: string): string {
  return iso.slice(0, 19).replace("T", " ");
}

function FieldErrors({ messages }: { messages?: string[] }) {
  return (
    <>
      {messages?.map((message) => (
        <p key={message} className="text-xs text-destructive">
          {message}
        </p>
      ))}
    </>
  );
}

const inputClass = "w-full rounded border border-border px-3 py-2 text-sm";
const readOnlyClass = "w-full rounded border border-border bg-secondary/40 px-3 py-2 text-sm";

export function ProfileAdminForm({ profile }: { profile: ProfileRepresentation }) {
  const router = useRouter();
  const [state, setState] = useState<AdminFormState>(() => initialState(profile));
  const [errors, setErrors] = useState<Record<string, string[]>>({});
  const [saving, setSaving] = useState(false);

  const update = (name: keyof AdminFormState, value: string) =>
    setState((prev) => ({ ...prev, [name]: value }));

  const pick = (latitude: number, longitude: number) =>
    setState((prev) => ({
      ...prev,
      latitude: latitude.toFixed(COORDINATE_DIGITS),
      longitude: longitude.toFixed(COORDINATE_DIGITS),
    }));

  const picked = toAdminPatchBody(state);
  const marker: [number, number] | null =
    picked.ok && picked.body.location
      ? [latitudeOf(picked.body.location), longitudeOf(picked.body.location)]
      : null;

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const result = toAdminPatchBody(state);
    if (!result.ok) {
      setErrors(result.errors);
      return;
    }
    setErrors({});

    setSaving(true);
    try {
      const res = await fetch(`/api/admin/profiles/${encodeURIComponent(profile.id)}`, {
        method: "PATCH",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(result.body),
      });
      if (!res.ok) {
        const payload: unknown = await res.json().catch(() => null);
        if (isApiError(payload) && payload.details) setErrors(fieldErrors(payload.details));
        toast.error(isApiError(payload) ? payload.message : "Failed to save profile");
        return;
      }
      toast.success(`The profile of ${profile.username} was changed successfully.`);
      router.push("/admin/profiles");
      router.refresh();
    } catch {
      toast.error("Failed to save profile");
    } finally {
      setSaving(false);
    }
  };

  return (
    <form onSubmit={(e) => void handleSubmit(e)} className="space-y-6">
      <fieldset className="space-y-3 rounded border border-border p-4">
        <legend className="px-1 text-sm font-semibold">User</legend>
        <div className="space-y-1">
          <label htmlFor="username" className="block text-sm font-medium">Username</label>
          <input id="username" value={profile.username} readOnly className={readOnlyClass} />
        </div>
        <div className="space-y-1">
          <label htmlFor="email" className="block text-sm font-medium">Email</label>
          <input id="email" value={profile.email} readOnly className={readOnlyClass} />
        </div>
      </fieldset>

      <fieldset className="space-y-3 rounded border border-border p-4">
        <legend className="px-1 text-sm font-semibold">Contact details</legend>
        <div className="space-y-1">
          <label htmlFor="home_address" className="block text-sm font-medium">Home address</label>
          <textarea
            id="home_address"
            rows={3}
            value={state.home_address}
            onChange={(e) => update("home_address", e.target.value)}
            className={inputClass}
          />
          <FieldErrors messages={errors.home_address} />
        </div>
        <div className="space-y-1">
          <label htmlFor="phone_number" className="block text-sm font-medium">Phone number</label>
          <input
            id="phone_number"
            value={state.phone_number}
            onChange={(e) => update("phone_number", e.target.value)}
            className={inputClass}
          />
          <FieldErrors messages={errors.phone_number} />
        </div>
      </fieldset>

      <fieldset className="space-y-3 rounded border border-border p-4">
        <legend className="px-1 text-sm font-semibold">Location</legend>
        <p className="text-xs text-muted-foreground">Click the map or drag the pin to set the location.</p>
        <div className="h-72 overflow-hidden rounded border border-border">
          <MapErrorBoundary>
            <LocationPickerLoader value={marker} onPick={pick} />
          </MapErrorBoundary>
        </div>
        <div className="grid grid-cols-2 gap-3">
          {(["latitude", "longitude"] as const).map((name) => (
            <div key={name} className="space-y-1">
              <label htmlFor={name} className="block text-sm font-medium capitalize">{name}</label>
              <input
                id={name}
                inputMode="decimal"
                value={state[name]}
                onChange={(e) => update(name, e.target.value)}
                className={inputClass}
              />
              <FieldErrors messages={errors[name]} />
            </div>
          ))}
        </div>
        <FieldErrors messages={errors.location} />
        <button
          type="button"
          onClick={() => setState((prev) => ({ ...prev, latitude: "", longitude: "" }))}
          className="rounded border border-border px-3 py-1.5 text-xs hover:bg-secondary"
        >
          Clear location
        </button>
      </fieldset>

      <fieldset className="space-y-3 rounded border border-border p-4">
        <legend className="px-1 text-sm font-semibold">Timestamps</legend>
        <dl className="grid grid-cols-[auto_1fr] gap-x-4 gap-y-1 text-sm">
          <dt className="text-muted-foreground">Created</dt>
          <dd>{formatTimestamp(profile.created_at)}</dd>
          <dt className="text-muted-foreground">Updated</dt>
          <dd>{formatTimestamp(profile.updated_at)}</dd>
        </dl>
      </fieldset>

      <button
        type="submit"
        disabled={saving}
        className="rounded bg-primary px-4 py-2 text-sm text-primary-foreground disabled:opacity-50"
      >
        {saving ? "Saving..." : "Save"}
      </button>
    </form>
  );
}
