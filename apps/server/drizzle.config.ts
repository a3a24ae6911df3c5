import { defineConfig } from 'drizzle-kit';

const DATABASE_URL = process.env.DATABASE_URL;

if (!DATABASE_URL) {
  throw new Error('DATABASE_URL is required to push or generate the trades schema');
}

export default defineConfig({
  dialect: 'postgresql',
  schema: './src/db/schema.ts',
  out: './drizzle',
  tablesFilter: ['trades'],
  strict: true,
  dbCredentials: {
    url: DATABASE_URL,
  },
});
