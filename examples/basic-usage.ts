import "@dotenvx/dotenvx/config";
import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { createAuditedConnection, initializeAuditLogging } from "../src/index.js";

async function main() {
  const dbUrl = process.env.DATABASE_URL;
  if (!dbUrl) {
    throw new Error("DATABASE_URL is not set");
  }

  // Connect to database
  const pool = new Pool({ connectionString: dbUrl });
  const db = drizzle(pool);

  await db.execute(`
    CREATE TABLE IF NOT EXISTS customers (
      id SERIAL PRIMARY KEY,
      email VARCHAR(255) NOT NULL,
      display_name TEXT,
      password TEXT
    )
  `);

  // Create audit table (run once; the default sink also creates it on first write)
  await initializeAuditLogging(db);

  const audited = createAuditedConnection(db, {
    tables: ["customers"],
    excludeFields: ["password"],
  });

  // Set context (e.g., from Express middleware)
  audited.setContext({
    userId: "user-123",
    userName: "Example User",
    ipAddress: "192.168.1.1",
    customProperties: { requestId: "req-1" },
  });

  console.log("\n--- INSERT Example ---");
  const insert = await audited.execute(
    "INSERT INTO customers (email, display_name, password) VALUES (@email, @displayName, @password)",
    { "@email": "jane@example.com", "@displayName": "Jane", "@password": "test-secret" },
  );
  console.log("Rows inserted:", insert.value, "audit:", insert.outcome.status);
  console.log("After image:", insert.outcome.record?.afterImage);

  console.log("\n--- UPDATE Example ---");
  const update = audited.createCommand("UPDATE customers SET display_name = :name WHERE email = :email", {
    name: "Jane Smith",
    email: "jane@example.com",
  });
  const updated = await update.executeAudited();
  console.log("Rows updated:", updated.value);
  console.log("Before:", updated.outcome.record?.beforeImage);
  console.log("After:", updated.outcome.record?.afterImage);

  console.log("\n--- DELETE Example ---");
  const deleted = await audited.execute("DELETE FROM customers WHERE email = $1", {
    $1: "jane@example.com",
  });
  console.log("Rows deleted:", deleted.value, "event:", deleted.outcome.record?.eventName);

  if (deleted.outcome.failures.length > 0) {
    console.warn("Audit problems:", deleted.outcome.failures.map((failure) => failure.message));
  }

  await audited.shutdown();
  await pool.end();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
