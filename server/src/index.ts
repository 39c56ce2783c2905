import { createApp } from './app.js';
import { loadServerConfig } from './config.js';
import { debugLog } from './utils/debug.js';

const config = loadServerConfig();
const app = createApp(config);

debugLog(`[Server] ICC profiles: ${config.iccProfilesDir}`);
debugLog(`[Server] DocRaptor API: ${config.docRaptorApiUrl}`);

app.listen(config.port, config.host, () => {
    console.log(`Server listening on port ${config.port}`);
});
