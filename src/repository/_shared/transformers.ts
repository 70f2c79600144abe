import type { users } from "@/drizzle/schema";
import type { LibraryUser } from "@/types/user";

type UserRow = typeof users.$inferSelect;

export function toLibraryUser(row: UserRow): LibraryUser {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.passwordHash,
    fullName: row.fullName ?? null,
    email: row.email ?? null,
    role: row.role,
    status: row.status,
    createdAt: row.createdAt ?? null,
    updatedAt: row.updatedAt ?? null,
  };
}
