import { getDb } from "@/db/client";
import { getMemoryStore } from "@/db/memory-store";
import { users } from "@/db/schema";

export interface UserProfile {
  id: string;
  email: string;
}

export async function upsertUserProfile(input: UserProfile): Promise<void> {
  const db = getDb();
  if (!db) {
    const store = getMemoryStore();
    const now = new Date().toISOString();
    const existing = store.users.get(input.id);

    store.users.set(input.id, {
      id: input.id,
      email: input.email,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    });
    return;
  }

  const now = new Date();
  await db
    .insert(users)
    .values({ id: input.id, email: input.email, createdAt: now, updatedAt: now })
    .onConflictDoUpdate({
      target: users.id,
      set: { email: input.email, updatedAt: now },
    });
}
