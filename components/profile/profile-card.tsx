import Link from "next/link";
import { Mail, MapPin, Pencil, Phone } from "lucide-react";
import { getFullName } from "@/lib/accounts/display";
import { latitudeOf, longitudeOf } from "@/lib/geo/point";
import type { LocationFeature, UserRepresentation } from "@/lib/types/ui";
import { LocationsMapLoader } from "@/components/geo/locations-map-loader";
import { MapErrorBoundary } from "@/components/geo/map-error-boundary";

interface ProfileCardProps {
  user: UserRepresentation;
  features: LocationFeature[];
  /** Show the edit link (own profile only). */
  editable?: boolean;
}

function formatCoordinate(value: number): string {
  return value.toFixed(6);
}

export function ProfileCard({ user, features, editable = false }: ProfileCardProps) {
  const profile = user.profile;
  const location = profile?.location ?? null;

  return (
    <section className="rounded-lg border border-border p-6 space-y-6">
      <div className="flex items-start justify-between gap-4">
        <div>
          <h2 className="text-xl font-semibold">{getFullName(user)}</h2>
          <p className="text-sm text-muted-foreground">@{user.username}</p>
        </div>
        {editable && (
          <Link
            href="/profile/edit"
            className="flex items-center gap-1 rounded border border-border px-3 py-1.5 text-sm hover:bg-secondary"
          >
            <Pencil className="h-3.5 w-3.5" />
            Edit profile
          </Link>
        )}
      </div>

      <dl className="grid grid-cols-[auto_1fr] gap-x-4 gap-y-2 text-sm">
        <dt className="flex items-center gap-1 text-muted-foreground">
          <Mail className="h-3.5 w-3.5" /> Email
        </dt>
        <dd>{user.email || "Not provided"}</dd>
        <dt className="flex items-center gap-1 text-muted-foreground">
          <Phone className="h-3.5 w-3.5" /> Phone
        </dt>
        <dd>{profile?.phone_number || "Not provided"}</dd>
        <dt className="flex items-center gap-1 text-muted-foreground">
          <MapPin className="h-3.5 w-3.5" /> Address
        </dt>
        <dd className="whitespace-pre-line">{profile?.home_address || "Not provided"}</dd>
        <dt className="text-muted-foreground">Location</dt>
        <dd data-testid="profile-location">
          {location
            ? `${formatCoordinate(latitudeOf(location))}, ${formatCoordinate(longitudeOf(location))}`
            : "Not set"}
        </dd>
      </dl>

      {location && (
        <div className="h-64 overflow-hidden rounded-lg border border-border">
          <MapErrorBoundary>
            <LocationsMapLoader features={features} />
          </MapErrorBoundary>
        </div>
      )}
    </section>
  );
}
