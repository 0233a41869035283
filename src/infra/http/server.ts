import { loadConfig } from '../../config.js';
import { UserStore } from '../../application/userStore.js';
import { createPool } from '../db/pool.js';
import { PgUserStore } from '../db/userRepo.js';
import { InMemoryUserStore } from '../db/memoryUserStore.js';
import { createApp } from './app.js';

const config = loadConfig();

let store: UserStore;
if (config.databaseUrl) {
  store = new PgUserStore(createPool(config.databaseUrl));
} else {
  console.log('DATABASE_URL not set, using in-memory user store');
  store = new InMemoryUserStore();
}

const app = createApp({ store, rateLimit: config.rateLimit });

app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/healthz`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
});
