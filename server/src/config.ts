import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Settings } from './types.js';
import { log } from './logging.js';

const SettingsSchema = z.object({
  provider: z.enum(['TMDB']).default('TMDB'),
  apiKey: z.string().default(''),
});

export const DEFAULT_SETTINGS: Settings = { provider: 'TMDB', apiKey: '' };

export function configPath() {
  return process.env.CONFIG_PATH || path.resolve(process.cwd(), 'config', 'config.json');
}

export function loadSettings(file = configPath()): Settings {
  if (!fs.existsSync(file)) return { ...DEFAULT_SETTINGS };
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    const parsed = SettingsSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
    log('warn', `Ignoring invalid settings in ${file}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
  } catch (e) {
    log('warn', `Could not read settings from ${file}: ${String(e)}`);
  }
  return { ...DEFAULT_SETTINGS };
}

export function saveSettings(settings: Settings, file = configPath()) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const normalized: Settings = { provider: settings.provider, apiKey: settings.apiKey.trim() };
  fs.writeFileSync(file, JSON.stringify(normalized, null, 2));
  return normalized;
}

// TMDB_API_KEY takes precedence over the stored key.
export function effectiveApiKey(settings: Settings) {
  return process.env.TMDB_API_KEY || settings.apiKey;
}

export function serverPort() {
  const n = Number(process.env.PORT ?? 8787);
  return Number.isInteger(n) && n > 0 ? n : 8787;
}
