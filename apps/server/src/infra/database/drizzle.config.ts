import { defineConfig } from "drizzle-kit";

export default defineConfig({
  out: "./src/infra/database/drizzle",
  schema: "./src/infra/database/schema/*.ts",
  dialect: "postgresql",
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "",
  },
});
