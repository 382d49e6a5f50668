import { z } from 'zod';
import fs from 'fs';
import path from 'path';
export const DEFAULT_PRIORITY = 10_000;

const ConfigSchema = z.object({
  bus: z.object({
    defaultPriority: z.number().int().default(DEFAULT_PRIORITY),
    maxWorkers: z.number().int().positive().optional(),
  }),
  logging: z.object({
    level: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    json: z.boolean().default(true),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

export function loadConfig(configPath = 'tierbus.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(full, 'utf8'));
      if (isRecord(parsed)) fileRaw = parsed;
    } catch (e) {
      throw new Error(
        `Failed to parse config file ${full}: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
  }
  const merged = {
    bus: {
      defaultPriority: envInt('BUS_DEFAULT_PRIORITY'),
      maxWorkers: envInt('BUS_MAX_WORKERS'),
      ...(isRecord(fileRaw.bus) ? fileRaw.bus : {}),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: process.env.LOG_JSON !== '0',
      ...(isRecord(fileRaw.logging) ? fileRaw.logging : {}),
    },
  };
  return ConfigSchema.parse(merged);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
