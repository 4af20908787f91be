import "dotenv/config";
import { createPool } from "./pool";
import { runMigrations } from "./runMigrations";

async function migrate() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("DATABASE_URL missing, nothing to migrate");
  }

  console.log("Starting database migration...\n");
  const pool = createPool(databaseUrl);
  try {
    await runMigrations(pool);
  } finally {
    await pool.end();
  }
  console.log("\n🎉 Migration complete");
}

if (require.main === module) {
  migrate()
    .then(() => process.exit(0))
    .catch((err) => {
      console.error("❌ Migration failed:", err);
      process.exit(1);
    });
}
