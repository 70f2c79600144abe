import { eq } from "drizzle-orm";
import { db } from "@/drizzle/db";
import { users } from "@/drizzle/schema";
import { hashPassword } from "@/lib/security/digest";
import type { CreateUserData, LibraryUser, UserLookup, UserStatus } from "@/types/user";
import { toLibraryUser } from "./_shared/transformers";

export async function createUser(userData: CreateUserData): Promise<LibraryUser> {
  const [user] = await db
    .insert(users)
    .values({
      username: userData.username,
      passwordHash: hashPassword(userData.password),
      fullName: userData.fullName ?? null,
      email: userData.email ?? null,
      role: userData.role ?? "Member",
      status: userData.status ?? "active",
    })
    .returning();

  if (!user) {
    throw new Error(`Failed to create user ${userData.username}`);
  }

  return toLibraryUser(user);
}

export async function findUserByUsername(username: string): Promise<LibraryUser | null> {
  const [user] = await db.select().from(users).where(eq(users.username, username)).limit(1);

  if (!user) return null;

  return toLibraryUser(user);
}

export async function findUserById(id: number): Promise<LibraryUser | null> {
  const [user] = await db.select().from(users).where(eq(users.id, id)).limit(1);

  if (!user) return null;

  return toLibraryUser(user);
}

/**
 * Flips an account between active and inactive. Existing sessions are not
 * affected; revoke them on the authenticator if the change must be immediate.
 */
export async function updateUserStatus(id: number, status: UserStatus): Promise<LibraryUser | null> {
  const [user] = await db
    .update(users)
    .set({ status, updatedAt: new Date() })
    .where(eq(users.id, id))
    .returning();

  if (!user) return null;

  return toLibraryUser(user);
}

/**
 * Database-backed user lookup for the session authenticator
 */
export const userRepositoryLookup: UserLookup = {
  findUserByUsername,
};
