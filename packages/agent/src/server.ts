import { info } from 'firebase-functions/logger';
import { createApp } from './app.js';
import { getConfig } from './config.js';

const { port, dataDir, timezone } = getConfig();

createApp().listen(port, () => {
  info(`[Server] Listening on port ${port}`, { data_dir: dataDir, timezone });
});
