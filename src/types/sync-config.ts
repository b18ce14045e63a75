import { dirname } from 'path';
import { z } from 'zod';
import { LogLevel } from '../utils/logger.js';

export const SyncConfigSchema = z.object({
  searchUrl: z.string().url(),
  offsetParam: z.string().min(1),
  pageSize: z.number().int().positive(),
  orphanMarker: z.string().min(1),
  packagePathPrefix: z.string().startsWith('/'),
  dataDir: z.string().min(1),
  listFile: z.string().min(1),
  backupFile: z.string().min(1),
  scratchDir: z.string().min(1),
  logFile: z.string().min(1),
  notify: z.boolean(),
  logLevel: z.nativeEnum(LogLevel),
  userAgent: z.string().min(1)
}).refine(config => config.listFile !== config.backupFile, {
  message: 'listFile and backupFile must differ',
  path: ['backupFile']
}).refine(config => dirname(config.scratchDir) === dirname(config.listFile), {
  message: 'scratchDir must sit in the same directory as listFile',
  path: ['scratchDir']
});

export type SyncConfig = Readonly<z.infer<typeof SyncConfigSchema>>;

/** Flags a caller may override; backup and scratch paths follow listFile. */
export interface SyncConfigOverrides {
  searchUrl?: string;
  offsetParam?: string;
  pageSize?: number;
  orphanMarker?: string;
  dataDir?: string;
  listFile?: string;
  logFile?: string;
  notify?: boolean;
  logLevel?: LogLevel;
}
