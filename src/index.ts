import 'dotenv/config';
import { createServices } from './bootstrap.js';
import { loadEnv, runtimeFromEnv } from './config.js';
import { GROUPS } from './groups.js';
import { WebServer } from './server.js';
import { openStores } from './store/index.js';

async function main() {
  const env = loadEnv();
  const runtime = runtimeFromEnv(env);

  console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  console.log('🎯 Editais Watcher - Server Starting');
  console.log(`📅 ${new Date().toISOString()}`);
  console.log(`🗄️  Store: ${env.STORE_BACKEND}`);
  console.log(`🕒 Time zone: ${env.TIMEZONE}`);
  console.log(`📂 Groups: ${GROUPS.map((group) => group.label).join(', ')}`);
  console.log(`🔎 Perplexity: ${env.PERPLEXITY_API_KEY ? 'configured' : 'not configured'}`);
  console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n');

  const stores = openStores(env);
  const services = createServices(env, runtime, stores);
  console.log(`🔌 ${services.registry.all().length} providers registered`);

  const server = new WebServer(services, env.PORT);
  await server.start();

  const shutdown = (signal: string) => {
    console.log(`\n👋 ${signal} received, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('💥 Error while stopping:', error);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
