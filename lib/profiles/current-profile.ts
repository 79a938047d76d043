/**
 * The signed-in user's own profile form: user details plus profile fields,
 * with the location given as a separate latitude/longitude pair.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import type { ProfileRecord, User } from "@/lib/schemas";
import { updateUserDetails } from "@/lib/accounts/users";
import { locationFromCoordinates } from "@/lib/geo/point";

export interface CurrentProfileUpdate {
  first_name?: string;
  last_name?: string;
  email?: string;
  home_address?: string | null;
  phone_number?: string | null;
  latitude?: number | null;
  longitude?: number | null;
}

export interface CurrentProfile {
  user: User;
  profile: ProfileRecord;
}

export async function updateCurrentProfile(
  db: DbAdapter,
  userId: string,
  input: CurrentProfileUpdate
): Promise<CurrentProfile> {
  return db.transaction(async (tx) => {
    // The userSaved receiver guarantees the profile exists afterwards.
    const user = await updateUserDetails(tx, userId, {
      first_name: input.first_name,
      last_name: input.last_name,
      email: input.email,
    });
    const profile = await tx.getProfileByUserId(userId);
    if (!profile) throw new Error(`Profile for user ${userId} missing after save`);

    await tx.updateProfile(profile.id, {
      home_address: input.home_address,
      phone_number: input.phone_number,
      location: locationFromCoordinates(input.latitude, input.longitude),
    });
    const updated = await tx.getProfile(profile.id);
    if (!updated) throw new Error(`Profile ${profile.id} missing after update`);
    return { user, profile: updated };
  });
}
