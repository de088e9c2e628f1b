/**
 * Better Auth tables. Import from here rather than `./auth/*` so the
 * adapter wiring in the API has one stable entrypoint.
 */

export { sessions } from "./auth/sessions";
export { accounts } from "./auth/accounts";
export { verifications } from "./auth/verifications";

import { sessions } from "./auth/sessions";
import { accounts } from "./auth/accounts";
import { verifications } from "./auth/verifications";

/** Passed to the Better Auth drizzle adapter as `{ ...authSchema, users }`. */
export const authSchema = {
  sessions,
  accounts,
  verifications,
};
