import dotenv from 'dotenv';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { scheduleFileSource } from './league/schedule-file.js';
import { createHtmlFetcher } from './providers/http.js';
import { PdgaResultsProvider } from './providers/pdga.js';
import { getStore } from './store/index.js';

dotenv.config();

const config = loadConfig();
const store = getStore({ databaseUrl: config.databaseUrl, dataDir: config.dataDir });
const schedule = scheduleFileSource(config.scheduleFile, {
  info: () => undefined,
  warn: console.warn,
  error: console.error,
});
const provider = new PdgaResultsProvider({
  baseUrl: config.results.baseUrl,
  fetchHtml: createHtmlFetcher({ timeoutMs: config.results.timeoutMs, retries: config.results.retries }),
});

const app = createApp({ store, schedule, provider, config });

export { app };

if (config.env !== 'test') {
  app.listen(config.port, () => console.log(`League scorer listening on :${config.port}`));
}
