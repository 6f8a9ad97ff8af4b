import { Client } from "pg";
import { resolveDatabaseUrl } from "../common/config/app-config";
import { applyMigrations, readMigrations } from "./migrations";

async function main(): Promise<void> {
  const client = new Client({ connectionString: resolveDatabaseUrl() });
  await client.connect();

  try {
    const applied = await applyMigrations(client, readMigrations());
    console.log(`Applied ${applied.length} migration(s): ${applied.join(", ")}`);
  } finally {
    await client.end();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
