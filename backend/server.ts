import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import { connectDatabase, disconnectDatabase } from './config/database';
import { loadEnvironment } from './config/environment';
import type { AcademicStore } from './persistence/AcademicStore';
import { InMemoryAcademicStore } from './persistence/InMemoryAcademicStore';
import { MongoAcademicStore } from './persistence/MongoAcademicStore';

const start = async (): Promise<void> => {
  const environment = loadEnvironment();

  let store: AcademicStore;
  if (environment.STORE_DRIVER === 'mongo') {
    await connectDatabase();
    store = new MongoAcademicStore({ maxRetries: environment.TRANSACTION_MAX_RETRIES });
  } else {
    console.log('Using the in-process store; data is lost on exit');
    store = new InMemoryAcademicStore();
  }

  const app = createApp(store, { environment });
  const server = app.listen(environment.PORT, () => console.log(`Server running on port ${environment.PORT}`));

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Error closing the records store:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

start().catch(async (error: unknown) => {
  console.error('Failed to start the academic records server:', error);
  await disconnectDatabase().catch(() => undefined);
  process.exit(1);
});
