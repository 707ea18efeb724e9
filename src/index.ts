import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createRuntime } from './bot';
import { errorMessage } from './utils/platform-error';
import { sleep } from './utils/time';

function loadEnv(): void {
  const candidatePaths = [
    path.resolve(process.cwd(), '.env'),
    path.resolve(__dirname, '../.env'),
    path.resolve(__dirname, '../../.env'),
  ];

  const seen = new Set<string>();
  for (const envPath of candidatePaths) {
    if (seen.has(envPath)) continue;
    seen.add(envPath);

    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, override: false });
    }
  }
}

async function main(): Promise<void> {
  loadEnv();
  const config = loadConfig();
  const runtime = createRuntime(config);
  const startedAtTs = Date.now();

  const cleanupTimer = setInterval(() => {
    runtime.cleanupService.run().catch((error) => {
      void runtime.logger.error('Cleanup job failed', { error: errorMessage(error) });
    });
  }, config.cleanupIntervalSec * 1_000);

  cleanupTimer.unref();

  let stopRequested = false;

  const shutdown = async (signal: string): Promise<void> => {
    stopRequested = true;
    await runtime.logger.info('Shutting down', {
      signal,
      actions: runtime.repos.moderationActions.summarizeSince(startedAtTs),
    });
    clearInterval(cleanupTimer);
    await runtime.client.destroy();
    runtime.db.close();
  };

  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await runtime.logger.info('Moderation agent initialized', { trustedAccounts: runtime.trust.size });

  let backoffMs = 1_000;

  // The client reconnects on its own once logged in; only the initial login is retried here.
  while (!stopRequested) {
    try {
      await runtime.client.login(config.botToken);
      return;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'TokenInvalid') {
        throw error;
      }

      await runtime.logger.error('Login failed, retrying with backoff', {
        error: errorMessage(error),
        backoffMs,
      });
    }

    await sleep(backoffMs);
    backoffMs = Math.min(backoffMs * 2, 30_000);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
