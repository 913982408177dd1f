import 'dotenv/config';

import { createApp } from './app';
import { loadConfig } from './config/appConfig';
import { logInfo } from './observability/logger';

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  logInfo('api_server_started', { port: config.port });
});
