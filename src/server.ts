import 'reflect-metadata';
import { createApp } from './app';
import { loadConfig, loadEnvFile } from './config';
import { createDataSource } from './ormconfig';
import { StaffStore } from './services/staffStore';

loadEnvFile();

async function main() {
  const config = loadConfig();
  const store = new StaffStore(createDataSource(config.database));
  await store.initialize();

  const app = createApp(store, config);
  const server = app.listen(config.port, () => console.log(`Server listening at http://localhost:${config.port}`));

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close((closeErr) => {
      if (closeErr) console.error('HTTP server close error', closeErr);
      store
        .close()
        .then(() => process.exit(closeErr ? 1 : 0))
        .catch((err) => {
          console.error('Store close error', err);
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('Startup error', err);
  process.exit(1);
});
