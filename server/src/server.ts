import http from 'http';
import app from './app';
import config from './config';
import connectDB, { disconnectDB } from './utils/db';
import userService from './api/user/user.service';
import { voiceProcessor } from './api/voice/voice.processor';
import { voiceCache } from './api/voice/voice.cache';

const httpServer = http.createServer(app);

const startServer = async () => {
  await connectDB();
  await userService.ensureFirstSuperuser();

  const loaded = await voiceProcessor.loadAllVoicesToCache();
  console.log(`[voices] Warmed cache with ${loaded} ready voice(s)`);

  httpServer.listen(config.port, () => {
    console.log(`Server is running on http://localhost:${config.port}${config.apiPrefix}`);
  });
};

const shutdown = (signal: string) => {
  console.log(`[server] ${signal} received, shutting down`);
  httpServer.close(() => {
    Promise.all([voiceCache.close(), disconnectDB()])
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[server] Shutdown failed:', err);
        process.exit(1);
      });
  });
};

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

startServer().catch((err: unknown) => {
  console.error('[server] Failed to start:', err);
  process.exit(1);
});
