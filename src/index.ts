import { buildApp } from './app.js';
import { config } from './config.js';

async function main(): Promise<void> {
  const { app, engine, worker, executor, logger } = await buildApp(config);

  const shutdown = async (signal: string): Promise<void> => {
    await logger.log('info', 'shutdown.start', { signal });
    await engine.stop();
    await worker.stop();
    await executor.close();
    await app.close();
    await logger.log('info', 'shutdown.complete', { signal });
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await app.listen({ port: config.app.port, host: config.app.host });
  worker.start();
  if (config.engine.autoStart) {
    await engine.start();
  }

  await logger.log('info', 'server.started', {
    port: config.app.port,
    env: config.app.env,
    engineConfigFile: config.paths.engineConfigFile,
    running: engine.isRunning(),
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
