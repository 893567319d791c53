import 'dotenv/config';
import { buildServer } from '#patchbot/api/server.js';
import { checkModelReadiness, createAppComponents } from '#patchbot/app.js';
import { loadSettings, Settings } from '#patchbot/config.js';
import {
  logApplicationEvent,
  logSafeEnvironmentInfo,
  logSecretStatus,
} from '#patchbot/util/safe-logging.js';

export async function startServer(settings: Settings = loadSettings()): Promise<void> {
  logApplicationEvent('web-api', 'starting');
  logSafeEnvironmentInfo();
  logSecretStatus('PATCHBOT_API_KEY', settings.apiKey);

  await checkModelReadiness(settings);
  const components = await createAppComponents(settings);
  const server = await buildServer({ ...components, apiKey: settings.apiKey });

  try {
    await server.listen({ port: settings.port, host: settings.host });
    logApplicationEvent('web-api', 'started', { port: settings.port, host: settings.host });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

if (require.main === module) {
  startServer().catch((error) => {
    console.error('[web-api] Failed to start:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
