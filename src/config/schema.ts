/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const outputFormatSchema = z.enum(['table', 'csv', 'json', 'markdown']);

export const scanConfigSchema = z.object({
  directory: z.string().default('.'),
  exclude: z.array(z.string()).default([
    'node_modules/',
    'dist/',
    'build/',
    'coverage/',
  ]),
  extensions: z.array(z.string().regex(/^[^.]/, 'extensions are given without the leading dot')).optional(),
  respectGitignore: z.boolean().default(true),
  concurrency: z.number().int().min(1).max(1024).default(32),
  maxFileSize: z.number().int().min(0).default(0), // bytes, 0 = unlimited
  paramPattern: z.string().min(1).default('[^/]+'),
});

export const configSchema = scanConfigSchema.extend({
  spec: z.string().optional(),
  unusedOnly: z.boolean().default(false),
  pattern: z.string().optional(),
  format: outputFormatSchema.default('table'),
  truncate: z.boolean().default(false),
  colors: z.boolean().default(true),
});

export type Config = z.infer<typeof configSchema>;
export type ScanConfig = z.infer<typeof scanConfigSchema>;
export type OutputFormat = z.infer<typeof outputFormatSchema>;
