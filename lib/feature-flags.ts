/**
 * Build-time switches read from NEXT_PUBLIC_* env vars so client and server agree.
 */

/** Public sign-up: POST /api/auth/register and the /register page. On unless set to "false". */
export const SELF_REGISTRATION = process.env.NEXT_PUBLIC_SELF_REGISTRATION_ENABLED !== "false";
