import { requireUser } from "@/lib/auth/current-user";
import { MapView } from "@/components/geo/map-view";

export default async function MapPage() {
  await requireUser("/map");

  return (
    <main className="h-[calc(100vh-57px)] w-full">
      <MapView />
    </main>
  );
}
