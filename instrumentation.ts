/**
 * Server startup: merge the data-dir config file into process.env, then make
 * sure the Staff group (and, on a fresh install, the admin account) exists.
 */

export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;

  const [{ loadConfigIntoEnv }, { ensureFirstRunComplete }] = await Promise.all([
    import("@/lib/config/data-dir"),
    import("@/lib/config/first-run"),
  ]);
  loadConfigIntoEnv();
  await ensureFirstRunComplete();
}
