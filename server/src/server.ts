// server/src/server.ts
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';

import { configPath, effectiveApiKey, loadSettings, saveSettings } from './config.js';
import { LOG_LEVELS, getLogLevel, getLogs, log, setLogLevel } from './logging.js';
import type { CatalogClient } from './catalog.js';
import { createTmdbClient } from './tmdb.js';
import { scanFolder } from './scan.js';
import { applyRenamePlan, fsRenameOps, type RenameOps } from './renamer.js';
import { ConfigError, LookupFailure, ValidationError } from './errors.js';

const PlanEntrySchema = z.object({
  originalRelativePath: z.string().min(1),
  newRelativePath: z.string().min(1),
});

const ScanBodySchema = z.object({ root: z.string().trim().min(1, 'Please select a valid directory') });

const RenameBodySchema = z.object({
  root: z.string().trim().min(1),
  folders: z.array(PlanEntrySchema).default([]),
  files: z.array(PlanEntrySchema).default([]),
});

const SettingsBodySchema = z.object({
  provider: z.enum(['TMDB']).default('TMDB'),
  apiKey: z.string(),
});

const LogLevelBodySchema = z.object({ level: z.enum(['debug', 'info', 'warn', 'error']) });

export interface ServerDeps {
  configFile?: string;
  createClient?: (apiKey: string) => CatalogClient;
  renameOps?: RenameOps;
  enableCors?: boolean;
}

function statusOf(err: FastifyError) {
  if (err instanceof ValidationError || err instanceof ConfigError || err instanceof LookupFailure) return err.statusCode;
  if (err instanceof z.ZodError) return 400;
  // fastify's own errors (malformed JSON, oversized body) carry a status
  return err.statusCode ?? 500;
}

function messageOf(err: unknown) {
  if (err instanceof z.ZodError) return err.issues.map(i => i.message).join('; ');
  return err instanceof Error ? err.message : String(err);
}

export async function buildServer(deps: ServerDeps = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  const file = deps.configFile ?? configPath();
  const createClient = deps.createClient ?? ((key: string) => createTmdbClient(key));
  const renameOps = deps.renameOps ?? fsRenameOps;

  // The catalog client is rebuilt whenever the effective key changes.
  let client: CatalogClient | null = null;
  let clientKey = '';
  function catalog() {
    const key = effectiveApiKey(loadSettings(file)).trim();
    if (!key) throw new ConfigError('Please enter your API key in the settings');
    if (!client || key !== clientKey) {
      client = createClient(key);
      clientKey = key;
      log('info', 'catalog client initialised');
    }
    return client;
  }

  if (deps.enableCors ?? process.env.ENABLE_CORS === '1') {
    await app.register(cors, { origin: true });
    log('info', 'CORS enabled');
  }

  app.setErrorHandler((err: FastifyError, req, reply) => {
    const status = statusOf(err);
    log(status >= 500 ? 'error' : 'warn', `${req.method} ${req.url} failed: ${messageOf(err)}`);
    reply.status(status).send({ error: messageOf(err) });
  });

  app.get('/health', async () => ({ ok: true }));

  app.get('/api/settings', async () => {
    const s = loadSettings(file);
    return { provider: s.provider, hasApiKey: !!effectiveApiKey(s) };
  });

  app.post('/api/settings', async (req) => {
    const body = SettingsBodySchema.parse(req.body);
    const saved = saveSettings(body, file);
    client = null;
    log('info', `settings saved (provider=${saved.provider})`);
    return { ok: true, provider: saved.provider, hasApiKey: !!saved.apiKey };
  });

  app.post('/api/scan', async (req) => {
    const { root } = ScanBodySchema.parse(req.body);
    const result = await scanFolder(root, catalog());
    return result;
  });

  app.post('/api/rename', async (req) => {
    const { root, folders, files } = RenameBodySchema.parse(req.body);
    const errors = applyRenamePlan(root, folders, files, renameOps);
    if (errors.length) log('warn', `Rename of ${root} reported ${errors.length} error(s)`);
    else log('info', `Rename of ${root} completed`);
    return { ok: errors.length === 0, errors };
  });

  app.get('/api/logs', async (req) => {
    const q = z.object({ since: z.coerce.number().optional() }).parse(req.query);
    return getLogs(q.since);
  });

  app.get('/api/loglevel', async () => ({ level: getLogLevel(), levels: LOG_LEVELS }));
  app.post('/api/loglevel', async (req) => {
    const { level } = LogLevelBodySchema.parse(req.body);
    setLogLevel(level);
    log('info', `log level set to ${level}`);
    return { ok: true, level };
  });

  return app;
}
