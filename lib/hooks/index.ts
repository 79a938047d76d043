export { useLocations } from "./use-locations";
export type { UseLocationsResult } from "./use-locations";

export { useLogout } from "./use-logout";
export type { UseLogoutResult } from "./use-logout";
