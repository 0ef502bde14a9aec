/**
 * Minimal API specification schema using Zod.
 * Only the path table is required; everything else is carried through untouched.
 */

import { z } from 'zod';

export const specInfoSchema = z.object({
  title: z.string().optional(),
  version: z.string().optional(),
}).passthrough();

export const specDocumentSchema = z.object({
  openapi: z.string().optional(),
  swagger: z.string().optional(),
  info: specInfoSchema.optional(),
  paths: z.record(z.string(), z.unknown()),
}).passthrough();

export type SpecDocument = z.infer<typeof specDocumentSchema>;
export type SpecInfo = z.infer<typeof specInfoSchema>;
