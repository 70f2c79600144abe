export const USER_ROLES = ["Admin", "Librarian", "Member"] as const;

export type UserRole = (typeof USER_ROLES)[number];

export type UserStatus = "active" | "inactive";

/**
 * A library account as stored in the users table
 */
export interface LibraryUser {
  id: number;
  username: string;
  passwordHash: string;
  fullName: string | null;
  email: string | null;
  role: UserRole;
  status: UserStatus;
  createdAt: Date | null;
  updatedAt: Date | null;
}

/**
 * The fields the authenticator reads when checking credentials
 */
export type UserCredentialRecord = Pick<
  LibraryUser,
  "id" | "username" | "passwordHash" | "role" | "status"
>;

/**
 * Resolves a username to its stored credentials
 */
export interface UserLookup {
  findUserByUsername(username: string): Promise<UserCredentialRecord | null>;
}

export interface CreateUserData {
  username: string;
  password: string;
  fullName?: string | null;
  email?: string | null;
  role?: UserRole;
  status?: UserStatus;
}
