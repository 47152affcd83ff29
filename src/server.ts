import { app } from './app';
import { config } from './config/env';
import { connectDatabase, disconnectDatabase } from './lib/database';

const start = async () => {
  await connectDatabase(config);

  const server = app.listen(config.port, () => {
    console.log(`🚀 Server is running on http://localhost:${config.port}`);
  });

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach(signal => {
    process.on(signal, () => {
      console.log(`\nReceived ${signal}, shutting down gracefully...`);
      server.close(() => {
        console.log('Server closed.');
        disconnectDatabase()
          .catch((error: unknown) => console.error('Failed to close database connection:', error))
          .finally(() => process.exit(0));
      });
    });
  });
};

start().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
