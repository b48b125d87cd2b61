import { mkdir } from 'fs/promises';
import { createApp, createAppContext } from './app.js';
import { loadConfig, maskApiKey } from './config.js';

async function main() {
  const config = loadConfig();
  await mkdir(config.uploadDir, { recursive: true, mode: 0o755 });

  const app = createApp(createAppContext(config));

  const server = app.listen(config.port, () => {
    console.log(`[epub-intake] listening port=${config.port}`);
    console.log(`[epub-intake] upload_dir=${config.uploadDir}`);
    console.log(`[epub-intake] api_key=${maskApiKey(config.apiKey)}`);
  });

  const shutdown = () => {
    server.close(() => {
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[epub-intake] fatal startup error', error);
  process.exit(1);
});
