"use client";

import Link from "next/link";
import { useRouter } from "next/navigation";
import { LogOut, MapPin, ScrollText, User, Users } from "lucide-react";
import { toast } from "sonner";
import { useLogout } from "@/lib/hooks";
import type { HeaderUser } from "@/lib/types/ui";

interface SiteHeaderProps {
  user: HeaderUser | null;
}

export function SiteHeader({ user }: SiteHeaderProps) {
  const router = useRouter();
  const { logout, pending } = useLogout();

  const handleLogout = async () => {
    const ok = await logout();
    if (!ok) {
      toast.error("Logout failed");
      return;
    }
    router.push("/login");
    router.refresh();
  };

  return (
    <header className="border-b border-border bg-background px-6 py-3">
      <div className="flex items-center justify-between">
        <Link href="/" className="font-mono text-lg font-bold uppercase tracking-widest">
          Geo Profiles
        </Link>

        {user && (
          <nav className="flex items-center gap-4 text-sm">
            <Link href="/profile" className="flex items-center gap-1 hover:underline">
              <User className="h-4 w-4" />
              Profile
            </Link>
            <Link href="/map" className="flex items-center gap-1 hover:underline">
              <MapPin className="h-4 w-4" />
              Map
            </Link>
            {user.is_staff && (
              <Link href="/admin/profiles" className="flex items-center gap-1 hover:underline">
                <Users className="h-4 w-4" />
                Profiles
              </Link>
            )}
            {user.is_superuser && (
              <Link href="/admin/activity" className="flex items-center gap-1 hover:underline">
                <ScrollText className="h-4 w-4" />
                Activity
              </Link>
            )}
            <span className="text-muted-foreground">{user.username}</span>
            <button
              type="button"
              onClick={() => void handleLogout()}
              disabled={pending}
              className="flex items-center gap-1 rounded border border-border px-2 py-1 hover:bg-secondary disabled:opacity-50"
            >
              <LogOut className="h-4 w-4" />
              Log out
            </button>
          </nav>
        )}
      </div>
    </header>
  );
}
