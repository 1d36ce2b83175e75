/**
 * rootbox Configuration Types
 */

import { z } from 'zod';
import { EXECUTOR_MODES } from '../unix/command-executor.js';
import { LOG_LEVELS } from '../utils/logger.js';

/**
 * Default chroot options, applied before command-line flags
 */
export const ChrootDefaultsSchema = z
  .object({
    /** Pass --skip-chdir (default: false) */
    skipChdir: z.boolean().optional(),

    /** User to run as (name or ID) */
    user: z.string().min(1).optional(),

    /** Group to run as; only meaningful together with user */
    group: z.string().min(1).optional(),

    /** Supplementary groups */
    groups: z.array(z.string().min(1)).optional(),
  })
  .strict()
  .refine((value) => value.group === undefined || value.user !== undefined, {
    message: 'group requires user to be set',
    path: ['group'],
  });

/**
 * How invocations are launched
 */
export const ExecutionSettingsSchema = z
  .object({
    /** Executor mode (default: direct) */
    mode: z.enum(EXECUTOR_MODES).optional(),
  })
  .strict();

export const LoggingSettingsSchema = z
  .object({
    /** Console log level; LOG_LEVEL overrides it (default: info) */
    level: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

/**
 * Complete config file structure (~/.rootbox/config.yaml)
 */
export const RootboxConfigSchema = z
  .object({
    chroot: ChrootDefaultsSchema.optional(),
    execution: ExecutionSettingsSchema.optional(),
    logging: LoggingSettingsSchema.optional(),
  })
  .strict();

export type ChrootDefaults = z.infer<typeof ChrootDefaultsSchema>;
export type ExecutionSettings = z.infer<typeof ExecutionSettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type RootboxConfig = z.infer<typeof RootboxConfigSchema>;
