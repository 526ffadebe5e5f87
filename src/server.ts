import dotenv from 'dotenv';

dotenv.config();

import { createApp } from './app';
import { loadConfig } from './lib/config';
import { createServices } from './lib/services';

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);
const PORT = config.server.port;

// ============================
// START SERVER
// ============================

const server = app.listen(PORT, () => {
  console.log(`
🚀 Server is running!
📡 Port: ${PORT}
🌍 Environment: ${config.server.nodeEnv}
🔎 Search provider: ${services.search?.provider ?? 'none configured'}
🔗 Base URL: http://localhost:${PORT}
  `);
});

// Graceful shutdown
function shutdown(signal: string) {
  console.log(`${signal} received, shutting down gracefully...`);
  server.close(() => {
    services
      .close()
      .then(() => {
        console.log('Server closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
