import { serve } from '@hono/node-server';
import { loadConfig } from '@pemc/chain';
import { createApp } from './app.js';

const PORT = parseInt(process.env.PORT ?? '3000', 10);

function main() {
  const { app, api } = createApp({ config: loadConfig() });

  console.log(`[pemc] Default cipher: ${api.getDefaultCipher().name}`);
  console.log(`[pemc] Default signer: ${api.getDefaultSigner().name}`);
  console.log(`[pemc] Starting API server on port ${PORT}...`);

  serve({ fetch: app.fetch, port: PORT }, (info) => {
    console.log(`[pemc] Server running at http://localhost:${info.port}`);
  });
}

main();
