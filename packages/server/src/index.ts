import { info } from 'firebase-functions/logger';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { initializeDatabase } from './db/index.js';

const config = loadConfig();

// Initialize database
initializeDatabase(config.databasePath);

const app = createApp(config);

// Start server
app.listen(config.port, (): void => {
  info(`Server running on http://localhost:${String(config.port)}`, {
    databasePath: config.databasePath,
  });
});
