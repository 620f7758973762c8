import { z } from "zod";

/**
 * Claims carried by the session token the REST layer issues at login
 */
export const UserSchema = z.object({
  user_id: z.string().min(1),
  username: z.string().min(1),
  is_owner: z.boolean().default(false),
});

export type AuthenticatedUser = z.infer<typeof UserSchema>;

export interface AuthSocketData {
  user: AuthenticatedUser;
}
