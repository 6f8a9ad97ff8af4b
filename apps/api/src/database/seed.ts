import { hash } from "bcryptjs";
import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import {
  resolveBcryptRounds,
  resolveDatabaseUrl,
} from "../common/config/app-config";
import * as schema from "./schema";

async function main(): Promise<void> {
  const adminUsername = (process.env.SEED_ADMIN_USERNAME || "admin").trim();
  const adminPassword = process.env.SEED_ADMIN_PASSWORD || "admin123";
  if (!adminUsername) {
    throw new Error("SEED_ADMIN_USERNAME must not be blank");
  }
  const passwordHash = await hash(adminPassword, resolveBcryptRounds());

  const pool = new Pool({ connectionString: resolveDatabaseUrl() });
  const db = drizzle(pool, { schema });

  try {
    await db
      .insert(schema.admins)
      .values({ username: adminUsername, passwordHash, isSuperadmin: true })
      .onConflictDoUpdate({
        target: schema.admins.username,
        set: { passwordHash, isSuperadmin: true },
      });
    console.log(`Seeded superadmin "${adminUsername}"`);
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
