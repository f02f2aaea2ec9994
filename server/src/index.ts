import fs from 'fs';
import path from 'path';
import { createApp } from './app.js';
import { DEFAULT_DB_PATH, openDatabase } from './db.js';

const PORT = Number(process.env.PORT ?? 8787);
const DB_PATH = process.env.BUDGET_DB_PATH ?? DEFAULT_DB_PATH;

if (DB_PATH !== ':memory:') {
  fs.mkdirSync(path.dirname(DB_PATH), { recursive: true });
}

const db = openDatabase(DB_PATH);
const app = createApp(db);

app.listen(PORT, () => {
  console.log(`[API] Budget server listening on http://localhost:${PORT}`);
  console.log(`[API] Database: ${DB_PATH}`);
});
