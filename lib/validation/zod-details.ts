import type { ZodError } from "zod";

/**
 * Field path -> messages, for the `details` of a 400 response.
 * Issues without a path are reported under "body".
 */
export function zodErrorDetails(error: ZodError): Record<string, string[]> {
  return error.issues.reduce<Record<string, string[]>>((details, issue) => {
    const field = issue.path.length > 0 ? issue.path.join(".") : "body";
    (details[field] ??= []).push(issue.message);
    return details;
  }, {});
}
