import { config } from 'dotenv';
import { createServer } from 'http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

config();

const appConfig = loadConfig();

if (!appConfig.firebase) {
  console.warn('⚠️ FIREBASE_API_KEY is missing; every request will be treated as signed out');
}
if (!appConfig.gemini) {
  console.warn('⚠️ GEMINI_API_KEY is missing; trend summaries are disabled');
}

const server = createServer(createApp(appConfig));
server.listen(appConfig.port, () => {
  console.log(`🚀 Server running at http://localhost:${appConfig.port}`);
});
