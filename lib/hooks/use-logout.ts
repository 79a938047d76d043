"use client";

import { useState, useCallback } from "react";

export interface UseLogoutResult {
  logout: () => Promise<boolean>;
  pending: boolean;
}

/** POST /api/auth/logout; resolves true once the session is gone. */
export function useLogout(): UseLogoutResult {
  const [pending, setPending] = useState(false);

  const logout = useCallback(async () => {
    setPending(true);
    try {
      const res = await fetch("/api/auth/logout", { method: "POST" });
      return res.ok;
    } catch {
      return false;
    } finally {
      setPending(false);
    }
  }, []);

  return { logout, pending };
}
