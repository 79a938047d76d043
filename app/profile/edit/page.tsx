import { getDb } from "@/lib/db";
import { requireUser } from "@/lib/auth/current-user";
import { serializeUser } from "@/lib/profiles/serializers";
import { ProfileEditForm } from "@/components/profile/profile-edit-form";

export default async function ProfileEditPage() {
  const user = await requireUser("/profile/edit");
  const profile = await getDb().getProfileByUserId(user.id);

  return (
    <main className="mx-auto max-w-3xl p-6 space-y-6">
      <h1 className="text-xl font-semibold">Edit profile</h1>
      <ProfileEditForm user={serializeUser(user, profile)} />
    </main>
  );
}
