/// <reference types="node" />
import { defineConfig } from "drizzle-kit";

const url = process.env.DATABASE_URL;
if (!url) {
  throw new Error("DATABASE_URL must be set to run drizzle-kit");
}

export default defineConfig({
  dialect: "postgresql",
  // Explicit file list instead of glob: drizzle-kit uses CJS internally and can't resolve
  // the .js extension imports in our ESM barrel file (schema/index.ts).
  schema: ["./src/schema/drafts.ts", "./src/schema/edit-history.ts"],
  out: "./drizzle",
  dbCredentials: { url },
});
