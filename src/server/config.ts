export interface AppConfig {
  port: number;
  isProd: boolean;
  fetchTimeoutMs: number;
  maxContentChars: number;
  maxKeywords: number;
  defaultBrands: string[];
  firebase: {
    apiKey: string;
    authDomain: string;
    projectId: string;
    appId: string;
  } | null;
  gemini: {
    apiKey: string;
    model: string;
  } | null;
}

const DEFAULT_BRANDS = ['Apple', 'Google', 'Microsoft', 'Amazon', 'Meta', 'Tesla', 'Netflix'];

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) || num <= 0 ? defaultValue : num;
}

function parseListEnv(value: string | undefined, defaultValue: string[]): string[] {
  if (!value) return defaultValue;
  const items = value.split(',').map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : defaultValue;
}

/**
 * Reads the environment once at startup. `.env` is loaded by the entry point,
 * so this stays a pure function of the map it is given.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const firebaseKey = env.FIREBASE_API_KEY?.trim();
  const geminiKey = env.GEMINI_API_KEY?.trim();

  return {
    port: parseNumericEnv(env.PORT, 3001),
    isProd: env.NODE_ENV === 'production',
    fetchTimeoutMs: parseNumericEnv(env.FETCH_TIMEOUT_MS, 10_000),
    maxContentChars: parseNumericEnv(env.MAX_CONTENT_CHARS, 8000),
    maxKeywords: parseNumericEnv(env.MAX_KEYWORDS, 15),
    defaultBrands: parseListEnv(env.DEFAULT_BRANDS, DEFAULT_BRANDS),
    firebase: firebaseKey
      ? {
          apiKey: firebaseKey,
          authDomain: env.FIREBASE_AUTH_DOMAIN || '',
          projectId: env.FIREBASE_PROJECT_ID || '',
          appId: env.FIREBASE_APP_ID || '',
        }
      : null,
    gemini: geminiKey
      ? { apiKey: geminiKey, model: env.GEMINI_MODEL || 'gemini-2.5-flash' }
      : null,
  };
}
