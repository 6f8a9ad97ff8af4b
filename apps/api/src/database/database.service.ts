import { Injectable, OnModuleDestroy } from "@nestjs/common";
import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { resolveDatabaseUrl } from "../common/config/app-config";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly pool: Pool;
  readonly db: Database;

  constructor() {
    this.pool = new Pool({ connectionString: resolveDatabaseUrl() });
    this.db = drizzle(this.pool, { schema });
  }

  async recordAudit(event: schema.NewAuditEvent): Promise<void> {
    await this.db.insert(schema.auditEvents).values(event);
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }
}
