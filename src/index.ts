import { getExportConfig } from './config/exportConfig.js';
import { createApp } from './server.js';
import { createServices } from './services/index.js';

async function main() {
  const config = getExportConfig();

  console.log('========================================');
  console.log('Tour Export Backend');
  console.log('GPX tracks, images and collection metadata, exported locally');
  console.log('========================================\n');
  console.log('[STARTUP] Backend starting at:', new Date().toISOString());
  console.log('[STARTUP] Node version:', process.version);
  console.log('[STARTUP] Output directory:', config.outputDir);
  console.log('[STARTUP] Detailed tour API:', config.detailedTourApi ? 'enabled' : 'disabled');
  console.log('');

  const services = createServices(config);
  const app = createApp(services);

  app.listen(config.port, config.host, () => {
    console.log(`🚀 API listening on http://${config.host}:${config.port}`);
    console.log(`   Resolver strategies: ${services.resolver.strategyNames.join(' → ')}`);
  });
}

main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
