import { getDb } from "@/lib/db";
import { requireUser } from "@/lib/auth/current-user";
import { buildLocationsFeatureCollection } from "@/lib/geo";
import { serializeUser } from "@/lib/profiles/serializers";
import { ProfileCard } from "@/components/profile/profile-card";

export default async function ProfilePage() {
  const user = await requireUser("/profile");
  const profile = await getDb().getProfileByUserId(user.id);
  const { features } = buildLocationsFeatureCollection(profile ? [profile] : []);

  return (
    <main className="mx-auto max-w-3xl p-6">
      <ProfileCard user={serializeUser(user, profile)} features={features} editable />
    </main>
  );
}
