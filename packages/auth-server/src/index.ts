import dotenv from 'dotenv';
import { AuthCoordinator } from '@cp-auth/sdk';
import { createApp } from './app';
import { loadConfig } from './config';

dotenv.config();

function main() {
  const config = loadConfig();

  const coordinator = new AuthCoordinator({
    params: config.params,
    challengeTtlMs: config.challengeTtlMs,
    sessionTtlMs: config.sessionTtlMs,
  });

  const app = createApp({
    coordinator,
    groupName: config.groupName,
    corsOrigin: config.corsOrigin,
    apiRateLimit: config.apiRateLimit,
    nodeEnv: config.nodeEnv,
  });

  // Start server
  const server = app.listen(config.port, config.host, () => {
    console.log(`\ncp-auth verifier`);
    console.log(`   Address: http://${config.host}:${config.port}`);
    console.log(`   Group: ${config.groupName}`);
    console.log(`   Environment: ${config.nodeEnv}`);
    console.log(`\nEndpoints:`);
    console.log(`   GET  /health              - Health check`);
    console.log(`   POST /register            - Store commitment (y1, y2) for a user`);
    console.log(`   POST /challenge           - Open an attempt with (r1, r2)`);
    console.log(`   POST /verify              - Answer an attempt with s`);
    console.log(`   GET  /session/:sessionId  - Look up an issued session`);
    console.log('');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully`);
    server.close((error) => {
      coordinator.dispose();
      if (error) {
        console.error('Error while closing server:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  main();
} catch (error) {
  console.error('Failed to start auth server:', error);
  process.exit(1);
}
