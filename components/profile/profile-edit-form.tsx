"use client";

import { useState, type FormEvent } from "react";
import { useRouter } from "next/navigation";
import { toast } from "sonner";
import { isApiError } from "@/lib/api/error-types";
import { latitudeOf, longitudeOf } from "@/lib/geo/point";
import type { UserRepresentation } from "@/lib/types/ui";

interface ProfileEditFormProps {
  user: UserRepresentation;
}

export interface FormState {
  first_name: string;
  last_name: string;
  email: string;
  home_address: string;
  phone_number: string;
  latitude: string;
  longitude: string;
}

function initialState(user: UserRepresentation): FormState {
  const location = user.profile?.location ?? null;
  return {
    first_name: user.first_name,
    last_name: user.last_name,
    email: user.email,
    home_address: user.profile?.home_address ?? "",
    phone_number: user.profile?.phone_number ?? "",
    latitude: location ? String(latitudeOf(location)) : "",
    longitude: location ? String(longitudeOf(location)) : "",
  };
}

/** Empty input means "no value"; anything else is parsed, NaN when invalid. */
function parseCoordinate(raw: string): number | null {
  const trimmed = raw.trim();
  return trimmed === "" ? null : Number(trimmed);
}

/** Body for PUT /api/profile. Blank text fields are stored as null. */
export function toUpdateBody(state: FormState) {
  return {
    first_name: state.first_name.trim(),
    last_name: state.last_name.trim(),
    email: state.email.trim(),
    home_address: state.home_address.trim() || null,
    phone_number: state.phone_number.trim() || null,
    latitude: parseCoordinate(state.latitude),
    longitude: parseCoordinate(state.longitude),
  };
}

const FIELDS: { name: keyof FormState; label: string; placeholder?: string; type?: string }[] = [
  { name: "first_name", label: "First name" },
  { name: "last_name", label: "Last name" },
  { name: "email", label: "Email", type: "email" },
  { name: "phone_number", label: "Phone number", placeholder: "+1-555-123-4567" },
  { name: "latitude", label: "Latitude", placeholder: "e.g. 40.7128" },
  { name: "longitude", label: "Longitude", placeholder: "e.g. -74.0060" },
];

export function ProfileEditForm({ user }: ProfileEditFormProps) {
  const router = useRouter();
  const [state, setState] = useState<FormState>(() => initialState(user));
  const [errors, setErrors] = useState<Record<string, string[]>>({});
  const [saving, setSaving] = useState(false);

  const update = (name: keyof FormState, value: string) =>
    setState((prev) => ({ ...prev, [name]: value }));

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const body = toUpdateBody(state);
    const invalid: Record<string, string[]> = {};
    if (Number.isNaN(body.latitude)) invalid.latitude = ["Enter a number."];
    if (Number.isNaN(body.longitude)) invalid.longitude = ["Enter a number."];
    setErrors(invalid);
    if (Object.keys(invalid).length > 0) return;

    setSaving(true);
    try {
      const res = await fetch("/api/profile", {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      });
      if (!res.ok) {
        const payload: unknown = await res.json().catch(() => null);
        if (isApiError(payload) && payload.details) setErrors(payload.details);
        toast.error("Please correct the errors below.");
        return;
      }
      toast.success("Your profile has been updated successfully!");
      router.push("/profile");
      router.refresh();
    } catch {
      toast.error("Failed to save profile");
    } finally {
      setSaving(false);
    }
  };

  return (
    <form onSubmit={(e) => void handleSubmit(e)} className="space-y-4 max-w-xl">
      {FIELDS.map((field) => (
        <div key={field.name} className="space-y-1">
          <label htmlFor={field.name} className="block text-sm font-medium">
            {field.label}
          </label>
          <input
            id={field.name}
            type={field.type ?? "text"}
            inputMode={field.name === "latitude" || field.name === "longitude" ? "decimal" : undefined}
            placeholder={field.placeholder}
            value={state[field.name]}
            onChange={(e) => update(field.name, e.target.value)}
            className="w-full rounded border border-border px-3 py-2 text-sm"
          />
          {errors[field.name]?.map((message) => (
            <p key={message} className="text-xs text-destructive">
              {message}
            </p>
          ))}
        </div>
      ))}
      <div className="space-y-1">
        <label htmlFor="home_address" className="block text-sm font-medium">
          Home address
        </label>
        <textarea
          id="home_address"
          rows={3}
          placeholder="Enter your full home address"
          value={state.home_address}
          onChange={(e) => update("home_address", e.target.value)}
          className="w-full rounded border border-border px-3 py-2 text-sm"
        />
      </div>
      <p className="text-xs text-muted-foreground">
        Leave both coordinates empty to remove your location.
      </p>
      <div className="flex gap-2">
        <button
          type="submit"
          disabled={saving}
          className="rounded bg-primary px-4 py-2 text-sm font-medium text-primary-foreground disabled:opacity-50"
        >
          Save
        </button>
        <button
          type="button"
          onClick={() => router.push("/profile")}
          className="rounded border border-border px-4 py-2 text-sm hover:bg-secondary"
        >
          Cancel
        </button>
      </div>
    </form>
  );
}
