/**
 * PDF workbench HTTP service
 *
 * Accepts PDF and image uploads and returns the transformed document,
 * a ZIP of pages, or a JSON description. Each operation delegates to
 * a library engine (pdf-lib, @cantoo/pdf-lib, sharp, pdf-to-img, jszip);
 * engines that fail to load switch off the operations that need them.
 */

import 'dotenv/config';
import { ArtifactStore, startSweeper } from './artifact-store.js';
import { CapabilityRegistry, ENGINE_PACKAGES, ENGINE_NAMES } from './capabilities.js';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { createR2Mirror } from './r2-client.js';

function printBanner(registry: CapabilityRegistry, port: number): void {
  console.log('\n' + '='.repeat(50));
  console.log('  PDF workbench starting...');
  console.log('='.repeat(50));
  for (const name of ENGINE_NAMES) {
    const pkg = ENGINE_PACKAGES[name];
    const status = registry.hasEngine(name) ? '✓ Ready' : `✗ Not installed (npm install ${pkg})`;
    console.log(`  ${pkg.padEnd(26)} ${status}`);
  }
  console.log(`  Tools: ${registry.listAvailable().join(', ') || 'none'}`);
  console.log('='.repeat(50));
  console.log(`  Listening on http://localhost:${port}`);
  console.log('='.repeat(50) + '\n');
}

async function main(): Promise<void> {
  const config = loadConfig();

  const store = new ArtifactStore({
    uploadDir: config.uploadDir,
    outputDir: config.outputDir,
    retentionMs: config.retentionMs,
  });
  await store.init();

  const registry = await CapabilityRegistry.load();

  const mirror = createR2Mirror(config.r2);
  if (mirror) {
    await mirror.testConnection();
  }

  const stopSweeper = startSweeper(store, config.sweepIntervalMs);
  const app = createApp({ store, registry, maxUploadBytes: config.maxUploadBytes, mirror });

  const server = app.listen(config.port, () => {
    printBanner(registry, config.port);
  });

  const shutdown = (signal: string) => {
    console.info(`[server] ${signal} received, shutting down`);
    stopSweeper();
    server.close((error) => {
      if (error) {
        console.error('[server] Error while closing:', error);
        process.exitCode = 1;
      }
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('[server] Failed to start:', error);
  process.exit(1);
});
